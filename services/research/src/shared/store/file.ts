/**
 * File Store
 * File system implementation of IStore, one JSON file per key
 */

import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import type { IStore, StoreOptions } from "./types.js";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileStore implements IStore {
  private readonly basePath: string;
  private readonly prettyPrint: boolean;

  constructor(options: StoreOptions) {
    this.basePath = options.basePath;
    this.prettyPrint = options.prettyPrint ?? true;
  }

  getPath(key: string): string {
    const normalizedKey = key.endsWith(".json") ? key : `${key}.json`;
    return path.join(this.basePath, normalizedKey);
  }

  async read<T>(key: string): Promise<T | null> {
    const filePath = this.getPath(key);

    try {
      const content = await fs.readFile(filePath, "utf-8");
      return JSON.parse(content) as T;
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async write<T>(key: string, data: T): Promise<void> {
    const filePath = this.getPath(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    const content = this.prettyPrint
      ? JSON.stringify(data, null, 2)
      : JSON.stringify(data);

    await fs.writeFile(filePath, content, "utf-8");
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.getPath(key));
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(pattern?: string): Promise<string[]> {
    const keys: string[] = [];

    async function walk(dir: string, baseDir: string): Promise<void> {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isMissingFile(error)) {
          return;
        }
        throw error;
      }

      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);

        if (entry.isDirectory()) {
          await walk(fullPath, baseDir);
        } else if (entry.isFile() && entry.name.endsWith(".json")) {
          const key = path
            .relative(baseDir, fullPath)
            .split(path.sep)
            .join("/")
            .replace(/\.json$/, "");

          if (!pattern || key.includes(pattern)) {
            keys.push(key);
          }
        }
      }
    }

    await walk(this.basePath, this.basePath);
    return keys.sort();
  }
}

export function createFileStore(basePath: string, options?: Partial<StoreOptions>): IStore {
  return new FileStore({
    basePath,
    prettyPrint: options?.prettyPrint ?? true,
  });
}
