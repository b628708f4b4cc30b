import { join } from "node:path";
import { UnsupportedPlatformError } from "../utils/errors.js";
import type { Launcher } from "../utils/exec.js";
import { LinuxExporter } from "./linux.js";
import { MacosExporter } from "./macos.js";
import type { Exporter, MacosAssets } from "./types.js";
import { WindowsExporter } from "./windows.js";

export type { Exporter, MacosAssets } from "./types.js";

export interface ExporterOptions {
  /** Directory holding `obliteration.icns`, `Info.plist` and `entitlements.plist` */
  assetsDir: string;
  codesign: string;
  launcher: Launcher;
}

export function macosAssets(assetsDir: string): MacosAssets {
  return {
    icon: join(assetsDir, "obliteration.icns"),
    infoPlist: join(assetsDir, "Info.plist"),
    entitlements: join(assetsDir, "entitlements.plist"),
  };
}

export function createExporter(
  platform: string,
  options: ExporterOptions,
): Exporter {
  switch (platform) {
    case "darwin":
      return new MacosExporter(
        macosAssets(options.assetsDir),
        options.launcher,
        options.codesign,
      );
    case "linux":
      return new LinuxExporter();
    case "win32":
      return new WindowsExporter();
    default:
      throw new UnsupportedPlatformError(`OS ${platform} is not supported.`);
  }
}
