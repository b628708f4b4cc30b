import { z } from "zod";

/**
 * What to ask the toolchain to build.
 */
export interface BuildRequest {
  /** Package name inside the cargo workspace */
  package: string;
  /** Toolchain channel override, passed as `+<channel>` */
  toolchain?: string;
  /** Target triple for cross compilation */
  target?: string;
  /** Build with optimizations */
  release: boolean;
  /** Extra arguments appended to `cargo build` */
  args: string[];
}

export interface Artifact {
  packageId: string;
  executable: string;
}

export const compilerArtifactSchema = z
  .object({
    reason: z.literal("compiler-artifact"),
    package_id: z.string(),
    executable: z.string().nullable().optional(),
  })
  .passthrough();

export const buildFinishedSchema = z
  .object({
    reason: z.literal("build-finished"),
    success: z.boolean(),
  })
  .passthrough();

export const otherEventSchema = z
  .object({
    reason: z.string(),
  })
  .passthrough();

export type CompilerArtifactEvent = {
  reason: "compiler-artifact";
  packageId: string;
  executable: string | null;
};

export type BuildFinishedEvent = {
  reason: "build-finished";
  success: boolean;
};

/** Any record we do not act on, such as `compiler-message` or `build-script-executed`. */
export type OtherEvent = {
  reason: "other";
  kind: string;
};

export type BuildEvent = CompilerArtifactEvent | BuildFinishedEvent | OtherEvent;
