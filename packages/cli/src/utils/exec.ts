import readline from "node:readline";
import { execa } from "execa";
import { ToolchainFailureError } from "./errors.js";
import { log } from "./logger.js";

export interface ToolchainProcess {
  /** Standard output, one line per item */
  lines: AsyncIterable<string>;
  /** Discards unread output and resolves to the exit status */
  wait(): Promise<number>;
  kill(): void;
}

export interface Toolchain {
  /** Runs a non-streaming command and returns its trimmed stdout */
  query(args: string[]): Promise<string>;
  spawn(args: string[], cwd: string): ToolchainProcess;
}

export type Launcher = (program: string, args: string[]) => Promise<number>;

export function createCargo(program: string): Toolchain {
  return {
    async query(args) {
      try {
        const { stdout } = await execa(program, args, {
          stdin: "ignore",
          stderr: "inherit",
        });
        return stdout.trim();
      } catch (error) {
        throw new ToolchainFailureError(
          `Command failed: ${program} ${args.join(" ")}`,
          { cause: error },
        );
      }
    },
    spawn(args, cwd) {
      log.debug(`Executing: ${program} ${args.join(" ")}`);

      const subprocess = execa(program, args, {
        cwd,
        stdin: "ignore",
        stdout: "pipe",
        stderr: "inherit",
        buffer: false,
        reject: false,
      });

      const rl = readline.createInterface({
        input: subprocess.stdout,
        crlfDelay: Number.POSITIVE_INFINITY,
      });
      // Ends the iteration when stdout is destroyed without 'end'.
      subprocess.stdout.once("close", () => rl.close());
      let killed = false;

      return {
        lines: rl,
        async wait() {
          rl.close();
          subprocess.stdout.resume();
          const result = await subprocess;
          if (result.exitCode === undefined) {
            if (!killed) {
              log.error(`${program} terminated abnormally`);
            }
            return 1;
          }
          return result.exitCode;
        },
        kill() {
          killed = true;
          subprocess.kill();
        },
      };
    },
  };
}

export const runProgram: Launcher = async (program, args) => {
  log.debug(`Executing: ${program} ${args.join(" ")}`);

  const result = await execa(program, args, {
    stdio: "inherit",
    reject: false,
  });

  if (result.exitCode === undefined) {
    log.error(`${program} terminated abnormally`);
    return 1;
  }
  return result.exitCode;
};
