import type { Artifact, BuildRequest } from "../types.js";
import { type BuildEventsResult, consumeBuildEvents } from "./build-events.js";
import { ProtocolViolationError, ToolchainFailureError } from "./errors.js";
import type { Toolchain } from "./exec.js";
import { resolvePackagePath } from "./package-path.js";

export interface CargoResult {
  sourceDir: string;
  artifact: Artifact;
}

export function buildArguments(request: BuildRequest): string[] {
  const args = toolchainSelector(request);

  args.push("build", "-p", request.package);

  if (request.target) {
    args.push("--target", request.target);
  }

  if (request.release) {
    args.push("-r");
  }

  args.push(...request.args, "--message-format", "json-render-diagnostics");

  return args;
}

function toolchainSelector(request: BuildRequest): string[] {
  return request.toolchain ? [`+${request.toolchain}`] : [];
}

export async function invokeCargo(
  request: BuildRequest,
  toolchain: Toolchain,
  platform: string = process.platform,
): Promise<CargoResult> {
  // Get package ID.
  const id = await toolchain.query([
    ...toolchainSelector(request),
    "pkgid",
    "-p",
    request.package,
  ]);
  const sourceDir = resolvePackagePath(id, platform);

  // Build.
  const proc = toolchain.spawn(buildArguments(request), sourceDir);
  let result: BuildEventsResult;

  try {
    result = await consumeBuildEvents(proc.lines, id);
  } catch (error) {
    // A failed build ends on its own; only a broken stream needs stopping.
    if (error instanceof ProtocolViolationError) {
      proc.kill();
    }
    await proc.wait();
    throw error;
  }

  const exitCode = await proc.wait();

  if (!result.finished && exitCode !== 0) {
    throw new ToolchainFailureError(
      `Failed to build ${request.package} (exit code ${exitCode})`,
    );
  }

  const { artifact } = result;

  if (!artifact) {
    throw new ProtocolViolationError(
      `Toolchain did not report an executable for ${request.package}`,
    );
  }

  if (artifact.packageId !== id) {
    throw new ProtocolViolationError(
      `Expected artifact of ${id} but got ${artifact.packageId}`,
    );
  }

  return { sourceDir, artifact };
}
