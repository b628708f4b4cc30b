import { basename, join } from "node:path";
import type { Artifact } from "../types.js";
import { copyExecutable, copyInto, createDirectories } from "../utils/file.js";
import type { Exporter } from "./types.js";

export class LinuxExporter implements Exporter {
  async export(root: string, kernel: Artifact, gui: Artifact): Promise<string> {
    const bin = join(root, "bin");
    const share = join(root, "share");

    await createDirectories([bin, share]);
    await copyInto(kernel.executable, share);

    return copyExecutable(gui.executable, join(bin, basename(gui.executable)));
  }
}
