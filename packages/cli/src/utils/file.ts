import { chmod, copyFile, mkdir, readdir, rm, stat } from "node:fs/promises";
import { basename, join } from "node:path";

export async function createDirectories(dirs: string[]): Promise<void> {
  for (const dir of dirs) await mkdir(dir, { recursive: true });
}

/**
 * Removes `dir` with everything inside and creates it again empty.
 */
export async function recreateDirectory(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
  await mkdir(dir, { recursive: true });
}

/** Copies `file` into `dir` keeping its name. */
export async function copyInto(file: string, dir: string): Promise<string> {
  const dest = join(dir, basename(file));
  await copyFile(file, dest);
  return dest;
}

export async function copyExecutable(file: string, dest: string): Promise<string> {
  await copyFile(file, dest);
  await chmod(dest, 0o755);
  return dest;
}

export async function collectFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  const walkDir = async (dir: string) => {
    for (const file of await readdir(dir)) {
      const fullPath = join(dir, file);
      if ((await stat(fullPath)).isDirectory()) {
        await walkDir(fullPath);
      } else {
        files.push(fullPath);
      }
    }
  };
  await walkDir(dir);
  return files;
}
