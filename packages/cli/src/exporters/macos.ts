import { copyFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Artifact } from "../types.js";
import { SigningFailureError } from "../utils/errors.js";
import type { Launcher } from "../utils/exec.js";
import { copyExecutable, copyInto, createDirectories } from "../utils/file.js";
import { log } from "../utils/logger.js";
import type { Exporter, MacosAssets } from "./types.js";

export const bundleName = "Obliteration.app";

export function capitalize(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

export class MacosExporter implements Exporter {
  constructor(
    private readonly assets: MacosAssets,
    private readonly launcher: Launcher,
    private readonly codesign = "codesign",
  ) {}

  async export(root: string, kernel: Artifact, gui: Artifact): Promise<string> {
    const bundle = join(root, bundleName);
    const contents = join(bundle, "Contents");
    const macos = join(contents, "MacOS");
    const resources = join(contents, "Resources");

    await createDirectories([macos, resources]);

    // The bundle executable is named after the app.
    const start = join(macos, capitalize(basename(gui.executable)));

    await copyInto(kernel.executable, resources);
    await copyExecutable(gui.executable, start);
    await copyFile(this.assets.icon, join(resources, "obliteration.icns"));
    await copyFile(this.assets.infoPlist, join(contents, "Info.plist"));

    await this.sign(bundle);

    return start;
  }

  private async sign(bundle: string): Promise<void> {
    log.step(`Signing ${bundle}...`);

    const exitCode = await this.launcher(this.codesign, [
      "-s",
      "-",
      "--entitlements",
      this.assets.entitlements,
      bundle,
    ]);

    if (exitCode !== 0) {
      throw new SigningFailureError(bundle, exitCode);
    }
  }
}
