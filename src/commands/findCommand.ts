import type { QueryEngine } from "../lib/queryEngine.js";
import type { Match, QueryOptions } from "../types/entities.js";
import type { Writer } from "./output.js";

export interface FindCommandOptions extends QueryOptions {
  words: string[];
  indexPath: string;
}

export function formatMatch(match: Match): string {
  return `${match.score.toFixed(2)}  ${match.filePath}:${match.name}`;
}

/**
 * Prints matches worst first so the best one lands next to the prompt, and
 * returns them best first.
 */
export async function runFindCommand(
  engine: QueryEngine,
  opts: FindCommandOptions,
  write: Writer,
): Promise<Match[]> {
  const input = opts.words.join(" ");
  if (input.trim().length === 0) {
    throw new Error("Search text cannot be empty");
  }

  const matches = await engine.search(opts.indexPath, input, {
    pathFilter: opts.pathFilter,
    minLength: opts.minLength,
    threshold: opts.threshold,
    limit: opts.limit,
  });

  if (matches.length === 0) {
    write("No matches");
    return matches;
  }

  for (const match of [...matches].reverse()) {
    write(formatMatch(match));
  }
  return matches;
}
