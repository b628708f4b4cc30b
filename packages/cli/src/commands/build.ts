import { Command, Option } from "clipanion";
import { loadConfig } from "../config.js";
import { buildDistribution } from "../services/build.service.js";
import { DistError } from "../utils/errors.js";
import { createCargo, runProgram } from "../utils/exec.js";
import { detectHost } from "../utils/host.js";
import { log } from "../utils/logger.js";

export const defaultDebugAddress = "127.0.0.1:1234";

export class BuildCommand extends Command {
  static paths = [Command.Default, ["build"]];

  static usage = Command.Usage({
    description: "Build Obliteration and create the distribution",
    details:
      "Builds the kernel and the GUI with cargo, then lays them out for the current OS. The default output directory is deleted and recreated on every run.",
    examples: [
      ["Create a debug distribution in ./dist", "$0"],
      ["Create an optimized distribution in /tmp/out", "$0 -r --root /tmp/out"],
      ["Build and start the GUI waiting for a debugger", "$0 --debug"],
      ["Use a custom debug address", "$0 --debug=0.0.0.0:5000"],
    ],
  });

  release = Option.Boolean("-r,--release", false, {
    description: "Enable optimization.",
  });

  root = Option.String("--root", {
    description: "Output directory to use as-is instead of the default one.",
  });

  debug = Option.String("--debug", {
    tolerateBoolean: true,
    description: `Start the exported GUI in debug mode on the given address (${defaultDebugAddress} when omitted).`,
  });

  async execute() {
    try {
      const config = loadConfig();

      return await buildDistribution(
        {
          release: this.release,
          root: this.root,
          debug: this.debugAddress(),
        },
        {
          toolchain: createCargo(config.cargo),
          launcher: runProgram,
          host: detectHost(),
          defaultRoot: config.outputDir,
          assetsDir: config.assetsDir,
          codesign: config.codesign,
        },
      );
    } catch (error) {
      if (error instanceof DistError) {
        log.error(error.message);
        return 1;
      }
      throw error;
    }
  }

  debugAddress(): string | undefined {
    if (this.debug === undefined || this.debug === false) {
      return undefined;
    }
    return this.debug === true ? defaultDebugAddress : this.debug;
  }
}
