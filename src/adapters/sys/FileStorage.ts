import { promises as fs } from "fs";
import path from "path";
import type { StoragePort } from "../../ports/sys/StoragePort";

/** Stores each key as a UTF-8 file; relative keys resolve against `baseDir`. */
export class FileStorage implements StoragePort {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async write(key: string, value: string): Promise<void> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    // replaced atomically; readers see the old or the new document
    const temp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(temp, value, "utf8");
    await fs.rename(temp, target);
  }

  async read(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(key), "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async remove(key: string): Promise<void> {
    await fs.rm(this.resolve(key), { force: true });
  }

  private resolve(key: string): string {
    return path.resolve(this.baseDir, key);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
