import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import type { IBlobStorage } from "../../domain/interfaces/iblob.storage";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Blob storage on the local filesystem, one file per key under `rootDir`.
 */
export class LocalBlobStorage implements IBlobStorage {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async put(key: string, data: Buffer, _contentType: string): Promise<void> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });

    // Write then rename so readers never see a partial file
    const temporary = `${target}.${randomUUID()}.tmp`;
    await fs.writeFile(temporary, data);
    await fs.rename(temporary, target);
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.resolve(key));
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(key));
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.resolve(key), { force: true });
  }

  // Prefixes name directories, e.g. "sessions/abc/"
  async deletePrefix(prefix: string): Promise<number> {
    const directory = this.resolve(prefix.replace(/\/+$/, ""));
    let deleted: number;
    try {
      deleted = await this.countFiles(directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }

    await fs.rm(directory, { recursive: true, force: true });
    return deleted;
  }

  private async countFiles(directory: string): Promise<number> {
    let count = 0;
    for (const entry of await fs.readdir(directory, { withFileTypes: true })) {
      count += entry.isDirectory() ? await this.countFiles(path.join(directory, entry.name)) : 1;
    }
    return count;
  }

  private resolve(key: string): string {
    const target = path.resolve(this.rootDir, key);
    if (target !== this.rootDir && !target.startsWith(this.rootDir + path.sep)) {
      throw new Error(`Blob key escapes storage root: ${key}`);
    }
    return target;
  }
}
