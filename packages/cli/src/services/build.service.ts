import { relative } from "node:path";
import { createExporter } from "../exporters/index.js";
import type { Artifact, BuildRequest } from "../types.js";
import { invokeCargo } from "../utils/cargo.js";
import type { Launcher, Toolchain } from "../utils/exec.js";
import { collectFiles, recreateDirectory } from "../utils/file.js";
import { type Host, guiRequest, kernelRequest } from "../utils/host.js";
import { log } from "../utils/logger.js";

export interface BuildOptions {
  release: boolean;
  /** Output root supplied by the caller, used as-is */
  root?: string;
  /** Address passed to `--debug` when relaunching the exported GUI */
  debug?: string;
}

export interface BuildDependencies {
  toolchain: Toolchain;
  launcher: Launcher;
  host: Host;
  /** Used when no root is given; deleted and recreated on every run */
  defaultRoot: string;
  assetsDir: string;
  codesign: string;
}

async function build(
  request: BuildRequest,
  deps: BuildDependencies,
): Promise<Artifact> {
  const target = request.target ? ` for ${request.target}` : "";
  log.step(`Building ${request.package}${target}...`);

  const { artifact } = await invokeCargo(
    request,
    deps.toolchain,
    deps.host.platform,
  );

  log.debug(`Built ${artifact.executable}`);
  return artifact;
}

/**
 * Builds the kernel and the GUI, exports them to the output root and
 * optionally starts the exported GUI in debug mode.
 *
 * Resolves to the exit code of the process.
 */
export async function buildDistribution(
  options: BuildOptions,
  deps: BuildDependencies,
): Promise<number> {
  const kern = await build(kernelRequest(deps.host.arch, options.release), deps);
  const gui = await build(guiRequest(options.release), deps);

  // Create output directory.
  let dest = options.root;

  if (dest === undefined) {
    dest = deps.defaultRoot;
    await recreateDirectory(dest);
  }

  // Export artifacts.
  const exporter = createExporter(deps.host.platform, {
    assetsDir: deps.assetsDir,
    codesign: deps.codesign,
    launcher: deps.launcher,
  });

  log.step(`Exporting to ${dest}...`);

  const start = await exporter.export(dest, kern, gui);

  for (const file of await collectFiles(dest)) {
    log.debug(relative(dest, file));
  }

  log.success(`Distribution is ready at ${dest}`);

  // Start VMM.
  if (options.debug === undefined) {
    return 0;
  }

  log.step(`Starting ${start} with debug address ${options.debug}...`);

  return deps.launcher(start, ["--debug", options.debug]);
}
