import { logger } from "../logger.js";
import { IndexCache } from "../db/indexCache.js";
import { SimilarityScorer } from "./similarity.js";
import type { FunctionIndex, Match, QueryOptions } from "../types/entities.js";

function validateOptions(opts: QueryOptions): void {
  if (!Number.isInteger(opts.minLength) || opts.minLength < 0) {
    throw new Error("minLength must be a non-negative integer");
  }
  if (!Number.isFinite(opts.threshold)) {
    throw new Error("threshold must be a finite number");
  }
  if (
    opts.limit !== undefined &&
    (!Number.isInteger(opts.limit) || opts.limit <= 0)
  ) {
    throw new Error("limit must be a positive integer");
  }
}

/**
 * Scores every name in files whose path contains `pathFilter` and returns
 * those scoring strictly above `threshold`, best first.
 *
 * Matches are keyed by `filePath:name`; a repeated key keeps its first
 * position and the score seen last. Equal scores stay in discovery order.
 */
export function queryIndex(
  index: FunctionIndex,
  input: string,
  opts: QueryOptions,
  scorer: SimilarityScorer,
): Match[] {
  validateOptions(opts);

  const query = scorer.normalize(input);
  const found = new Map<string, Match>();

  for (const [filePath, names] of index) {
    if (!filePath.includes(opts.pathFilter)) continue;

    for (const name of names) {
      if (name.length < opts.minLength) continue;

      const score = scorer.score(scorer.normalize(name), query);
      if (score > opts.threshold) {
        found.set(`${filePath}:${name}`, { filePath, name, score });
      }
    }
  }

  const ranked = Array.from(found.values()).sort((a, b) => b.score - a.score);
  return opts.limit === undefined ? ranked : ranked.slice(0, opts.limit);
}

export interface QueryEngineDeps {
  cache?: IndexCache;
  scorer?: SimilarityScorer;
}

/**
 * Ties an index cache and a scorer to one query session.
 */
export class QueryEngine {
  readonly cache: IndexCache;
  readonly scorer: SimilarityScorer;

  constructor(deps: QueryEngineDeps = {}) {
    this.cache = deps.cache ?? new IndexCache();
    this.scorer = deps.scorer ?? new SimilarityScorer();
  }

  async search(
    location: string,
    input: string,
    opts: QueryOptions,
  ): Promise<Match[]> {
    const index = await this.cache.load(location);
    const matches = queryIndex(index, input, opts, this.scorer);

    logger.debug(
      {
        location,
        query: input,
        pathFilter: opts.pathFilter,
        matches: matches.length,
        scoreCache: this.scorer.cache.stats(),
      },
      "Query completed",
    );

    return matches;
  }
}
