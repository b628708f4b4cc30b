import type { Artifact } from "../types.js";

/**
 * Lays out a distribution for one OS family.
 *
 * `root` already exists and is empty. Artifacts are copied since cargo still
 * owns the originals. Resolves to the path of the copied GUI executable.
 */
export interface Exporter {
  export(root: string, kernel: Artifact, gui: Artifact): Promise<string>;
}

/** Files copied verbatim into the macOS bundle. */
export interface MacosAssets {
  icon: string;
  infoPlist: string;
  entitlements: string;
}
