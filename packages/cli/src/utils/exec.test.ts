import { chmodSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { artifactLine, finishedLine } from "../testing/fake-toolchain.js";
import { consumeBuildEvents } from "./build-events.js";
import { invokeCargo } from "./cargo.js";
import { ProtocolViolationError, ToolchainFailureError } from "./errors.js";
import { createCargo, runProgram } from "./exec.js";
import { log } from "./logger.js";

const stubId = "path+file:///work/stub#stub@0.1.0";

/** A node script that writes `lines` to stdout, then runs `after`. */
function script(lines: string[], after = ""): string {
  const output = lines.map((line) => `${line}\n`).join("");
  return `process.stdout.write(${JSON.stringify(output)});${after}`;
}

interface StubPlan {
  id: string;
  lines: string[];
  /** Exit status set once `delay` ms have passed */
  exitCode: number;
  delay: number;
}

describe("process execution", () => {
  let dir: string;

  /**
   * Writes an executable standing in for cargo: `pkgid` prints the id and
   * `build` prints the planned lines.
   */
  function writeStub(plan: StubPlan): string {
    const stub = join(dir, "cargo-stub.cjs");
    writeFileSync(join(dir, "plan.json"), JSON.stringify(plan));
    writeFileSync(
      stub,
      [
        `#!${process.execPath}`,
        `const { readFileSync } = require("node:fs");`,
        `const plan = JSON.parse(readFileSync(${JSON.stringify(join(dir, "plan.json"))}, "utf-8"));`,
        `if (process.argv[2] === "pkgid") {`,
        `  process.stdout.write(plan.id + "\\n");`,
        `} else {`,
        `  process.stdout.write(plan.lines.map((line) => line + "\\n").join(""));`,
        `  setTimeout(() => { process.exitCode = plan.exitCode; }, plan.delay);`,
        `}`,
        "",
      ].join("\n"),
    );
    chmodSync(stub, 0o755);
    return stub;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "obdist-exec-"));
    vi.spyOn(log, "debug").mockImplementation(() => {});
    vi.spyOn(log, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  describe("createCargo", () => {
    it("returns the trimmed output of a query", async () => {
      const cargo = createCargo(process.execPath);

      await expect(
        cargo.query(["-e", script([`  ${stubId}  `])]),
      ).resolves.toBe(stubId);
    });

    it("fails a query when the program cannot run", async () => {
      const cargo = createCargo(join(dir, "no-such-cargo"));

      await expect(cargo.query(["pkgid", "-p", "obkrnl"])).rejects.toBeInstanceOf(
        ToolchainFailureError,
      );
    });

    it("stops at build-finished and discards the rest of the output", async () => {
      const cargo = createCargo(process.execPath);
      const noise = "x".repeat(80);
      const proc = cargo.spawn(
        [
          "-e",
          script(
            [artifactLine(stubId, "/target/stub"), finishedLine(true)],
            `process.stdout.write(${JSON.stringify(`${noise}\n`)}.repeat(20000));`,
          ),
        ],
        dir,
      );

      const result = await consumeBuildEvents(proc.lines, stubId);

      expect(result).toEqual({
        finished: true,
        artifact: { packageId: stubId, executable: "/target/stub" },
      });
      await expect(proc.wait()).resolves.toBe(0);
      expect(log.error).not.toHaveBeenCalled();
    });

    it("reports the exit status of a build that never finished", async () => {
      const cargo = createCargo(process.execPath);
      const proc = cargo.spawn(["-e", "process.exitCode = 101;"], dir);

      const result = await consumeBuildEvents(proc.lines, stubId);

      expect(result).toEqual({ finished: false, artifact: undefined });
      await expect(proc.wait()).resolves.toBe(101);
    });

    it("gives status 1 when the program does not exist", async () => {
      const program = join(dir, "no-such-cargo");
      const proc = createCargo(program).spawn(["build"], dir);

      const result = await consumeBuildEvents(proc.lines, stubId);

      expect(result.finished).toBe(false);
      await expect(proc.wait()).resolves.toBe(1);
      expect(log.error).toHaveBeenCalledWith(`${program} terminated abnormally`);
    });
  });

  describe("invokeCargo with a real process", () => {
    it("builds inside the package directory", async () => {
      const id = `path+file://${dir}#stub@0.1.0`;
      const stub = writeStub({
        id,
        lines: [artifactLine(id, join(dir, "stub-bin")), finishedLine(true)],
        exitCode: 0,
        delay: 0,
      });

      const result = await invokeCargo(
        { package: "stub", release: false, args: [] },
        createCargo(stub),
        "linux",
      );

      expect(result).toEqual({
        sourceDir: dir,
        artifact: { packageId: id, executable: join(dir, "stub-bin") },
      });
    });

    it("waits for a failed build to exit by itself", async () => {
      const id = `path+file://${dir}#stub@0.1.0`;
      const stub = writeStub({
        id,
        lines: [artifactLine(id, join(dir, "stub-bin")), finishedLine(false)],
        exitCode: 101,
        delay: 300,
      });

      await expect(
        invokeCargo(
          { package: "stub", release: false, args: [] },
          createCargo(stub),
          "linux",
        ),
      ).rejects.toThrow("Toolchain reported a failed build");
      expect(log.error).not.toHaveBeenCalled();
    });

    it("stops a toolchain that breaks the output format", async () => {
      const id = `path+file://${dir}#stub@0.1.0`;
      const stub = writeStub({
        id,
        lines: ["error: not json"],
        exitCode: 0,
        delay: 20000,
      });

      await expect(
        invokeCargo(
          { package: "stub", release: false, args: [] },
          createCargo(stub),
          "linux",
        ),
      ).rejects.toBeInstanceOf(ProtocolViolationError);
      expect(log.error).not.toHaveBeenCalled();
    });
  });

  describe("runProgram", () => {
    it("passes the exit status through", async () => {
      await expect(
        runProgram(process.execPath, ["-e", "process.exitCode = 3;"]),
      ).resolves.toBe(3);
    });

    it("gives status 1 when the program does not exist", async () => {
      const program = join(dir, "no-such-program");

      await expect(runProgram(program, [])).resolves.toBe(1);
      expect(log.error).toHaveBeenCalledWith(`${program} terminated abnormally`);
    });
  });
});
