import { buildIndex } from "../lib/corpusBuilder.js";
import {
  createEnumerators,
  selectEnumerator,
  type CandidateEnumerator,
} from "../lib/enumerators.js";
import { saveIndex, type IndexCache } from "../db/index.js";
import type { EnumeratorPreference } from "../config.js";
import type { BuildSummary } from "../types/entities.js";
import type { Writer } from "./output.js";

export interface IndexCommandOptions {
  root: string;
  indexPath: string;
  extension: string;
  marker: string;
  enumerator: EnumeratorPreference;
  /** Overrides the default locate, git, walk strategy list. */
  strategies?: CandidateEnumerator[];
  /** Cache to invalidate once the new index is on disk. */
  cache?: IndexCache;
}

export async function runIndexCommand(
  opts: IndexCommandOptions,
  write: Writer,
): Promise<BuildSummary> {
  const strategies = opts.strategies ?? createEnumerators(opts.extension);
  const enumerator = await selectEnumerator(
    opts.root,
    strategies,
    opts.enumerator,
  );

  const { index, summary } = await buildIndex(opts.root, enumerator, {
    marker: opts.marker,
  });

  await saveIndex(index, opts.indexPath, {
    root: summary.root,
    marker: opts.marker,
    extension: opts.extension,
  });
  opts.cache?.invalidate(opts.indexPath);

  write(
    `Indexed ${summary.nameCount} names from ${summary.indexedFiles} files ` +
      `(${summary.skippedFiles} skipped, via ${summary.enumerator}) into ${opts.indexPath}`,
  );
  return summary;
}
