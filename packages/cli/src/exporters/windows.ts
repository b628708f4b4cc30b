import { copyFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Artifact } from "../types.js";
import { copyInto, createDirectories } from "../utils/file.js";
import type { Exporter } from "./types.js";

export class WindowsExporter implements Exporter {
  async export(root: string, kernel: Artifact, gui: Artifact): Promise<string> {
    const share = join(root, "share");
    const start = join(root, basename(gui.executable));

    await createDirectories([share]);
    await copyInto(kernel.executable, share);
    await copyFile(gui.executable, start);

    return start;
  }
}
