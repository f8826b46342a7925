/**
 * Memory Store
 * In-process IStore; values are kept serialized so readers never share
 * references with writers
 */

import type { IStore } from "./types.js";

export class MemoryStore implements IStore {
  private readonly entries = new Map<string, string>();

  constructor(private readonly namespace = "memory") {}

  getPath(key: string): string {
    return `${this.namespace}://${key}`;
  }

  async read<T>(key: string): Promise<T | null> {
    const raw = this.entries.get(key);
    return raw === undefined ? null : (JSON.parse(raw) as T);
  }

  async write<T>(key: string, data: T): Promise<void> {
    this.entries.set(key, JSON.stringify(data));
  }

  async exists(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  async list(pattern?: string): Promise<string[]> {
    return [...this.entries.keys()]
      .filter((key) => !pattern || key.includes(pattern))
      .sort();
  }
}
