import type { BuildRequest } from "../types.js";
import { UnsupportedPlatformError } from "./errors.js";

export interface Host {
  arch: string;
  platform: string;
}

export function detectHost(): Host {
  return { arch: process.arch, platform: process.platform };
}

export function kernelRequest(arch: string, release: boolean): BuildRequest {
  switch (arch) {
    case "arm64":
    case "aarch64":
      return {
        package: "obkrnl",
        toolchain: "nightly",
        target: "aarch64-unknown-none-softfloat",
        release,
        args: ["-Z", "build-std=core,alloc"],
      };
    case "x64":
    case "x86_64":
      return {
        package: "obkrnl",
        target: "x86_64-unknown-none",
        release,
        args: [],
      };
    default:
      throw new UnsupportedPlatformError(
        `Architecture ${arch} is not supported.`,
      );
  }
}

export function guiRequest(release: boolean): BuildRequest {
  return {
    package: "gui",
    release,
    args: ["--bin", "obliteration"],
  };
}
