import "dotenv/config";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigInvalidError } from "./utils/errors.js";

const defaultAssetsDir = fileURLToPath(
  new URL("../assets/macos", import.meta.url),
);

export const configSchema = z.object({
  OBDIST_CARGO: z.string().min(1).default("cargo"),
  OBDIST_CODESIGN: z.string().min(1).default("codesign"),
  OBDIST_ASSETS_DIR: z.string().min(1).default(defaultAssetsDir),
  OBDIST_OUTPUT_DIR: z.string().min(1).default("dist"),
});

export type DistConfig = {
  cargo: string;
  codesign: string;
  assetsDir: string;
  outputDir: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DistConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map(
      (err) => `${err.path.join(".")}: ${err.message}`,
    );
    throw new ConfigInvalidError(
      `Invalid environment variables:\n- ${problems.join("\n- ")}`,
    );
  }

  return {
    cargo: parsed.data.OBDIST_CARGO,
    codesign: parsed.data.OBDIST_CODESIGN,
    assetsDir: parsed.data.OBDIST_ASSETS_DIR,
    outputDir: parsed.data.OBDIST_OUTPUT_DIR,
  };
}
