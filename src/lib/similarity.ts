import { distance } from "fastest-levenshtein";

export const DEFAULT_JUNK_CHARACTERS = [" ", "_"] as const;

/**
 * Memo table for pair scores, keyed by the canonical (sorted) pair.
 *
 * Unbounded unless `maxEntries` is given, in which case the least recently
 * used entry is evicted first.
 */
export class ScoreCache {
  private readonly entries = new Map<string, number>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxEntries?: number) {
    if (
      maxEntries !== undefined &&
      (!Number.isInteger(maxEntries) || maxEntries <= 0)
    ) {
      throw new Error("maxEntries must be a positive integer");
    }
  }

  private static key(a: string, b: string): string {
    return `${a}\u0000${b}`;
  }

  get(a: string, b: string): number | undefined {
    const key = ScoreCache.key(a, b);
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    if (this.maxEntries !== undefined) {
      // Re-insert to mark as most recently used
      this.entries.delete(key);
      this.entries.set(key, value);
    }
    return value;
  }

  set(a: string, b: string, value: number): void {
    const key = ScoreCache.key(a, b);
    this.entries.delete(key);
    this.entries.set(key, value);
    if (this.maxEntries !== undefined && this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): { size: number; hits: number; misses: number } {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}

/**
 * Removes every junk character and lowercases what is left.
 */
export function normalize(
  value: string,
  junk: readonly string[] = DEFAULT_JUNK_CHARACTERS,
): string {
  let result = value;
  for (const ch of junk) {
    if (ch.length > 0) result = result.split(ch).join("");
  }
  return result.toLowerCase();
}

/**
 * Levenshtein similarity, `1 - distance / longer length`, rounded to two
 * decimals. Either string being empty scores 0.
 */
export function levenshteinRatio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (a.length === 0 || b.length === 0) return 0;
  const ratio = (longest - distance(a, b)) / longest;
  return Math.round(ratio * 100) / 100;
}

export interface ScorerOptions {
  junk?: readonly string[];
  cache?: ScoreCache;
}

export class SimilarityScorer {
  readonly junk: readonly string[];
  readonly cache: ScoreCache;

  constructor(opts: ScorerOptions = {}) {
    this.junk = opts.junk ?? DEFAULT_JUNK_CHARACTERS;
    this.cache = opts.cache ?? new ScoreCache();
  }

  normalize(value: string): string {
    return normalize(value, this.junk);
  }

  /** Scores two already-normalized strings. Commutative. */
  score(a: string, b: string): number {
    const [first, second] = a <= b ? [a, b] : [b, a];
    const cached = this.cache.get(first, second);
    if (cached !== undefined) return cached;

    const value = levenshteinRatio(first, second);
    this.cache.set(first, second, value);
    return value;
  }
}
