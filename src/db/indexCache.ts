import path from "path";
import { loadIndex } from "./indexStore.js";
import type { FunctionIndex } from "../types/entities.js";

export type IndexLoader = (location: string) => Promise<FunctionIndex>;

/**
 * Memoizes loaded indexes by resolved location for the lifetime of the cache
 * object. Failed loads are not remembered.
 */
export class IndexCache {
  private readonly entries = new Map<string, Promise<FunctionIndex>>();

  constructor(private readonly loader: IndexLoader = loadIndex) {}

  async load(
    location: string,
    opts: { force?: boolean } = {},
  ): Promise<FunctionIndex> {
    const key = path.resolve(location);
    if (opts.force) this.entries.delete(key);

    let pending = this.entries.get(key);
    if (!pending) {
      pending = this.loader(key);
      this.entries.set(key, pending);
    }

    try {
      return await pending;
    } catch (error) {
      if (this.entries.get(key) === pending) this.entries.delete(key);
      throw error;
    }
  }

  /** Drops one location, or everything when called without one. */
  invalidate(location?: string): void {
    if (location === undefined) {
      this.entries.clear();
      return;
    }
    this.entries.delete(path.resolve(location));
  }

  has(location: string): boolean {
    return this.entries.has(path.resolve(location));
  }
}
