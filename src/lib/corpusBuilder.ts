import path from "path";
import { logger } from "../logger.js";
import { extractNames } from "./extractor.js";
import { ExtractionFailedError } from "./errors.js";
import { uniquePaths, type CandidateEnumerator } from "./enumerators.js";
import type {
  BuildOptions,
  BuildSummary,
  FunctionIndex,
} from "../types/entities.js";

export interface BuildResult {
  index: FunctionIndex;
  summary: BuildSummary;
}

/**
 * Extracts names from every file the enumerator yields, in enumeration order.
 * Files that cannot be read are left out of the index; files without any
 * definition are kept with an empty list.
 */
export async function buildIndex(
  root: string,
  enumerator: CandidateEnumerator,
  opts: BuildOptions,
): Promise<BuildResult> {
  const absoluteRoot = path.resolve(root);
  const files = uniquePaths(await enumerator.enumerate(absoluteRoot));

  logger.info(
    { count: files.length, root: absoluteRoot, enumerator: enumerator.name },
    "Indexing candidate files",
  );

  const index: FunctionIndex = new Map();
  let skippedFiles = 0;
  let nameCount = 0;

  for (const filePath of files) {
    try {
      const names = await extractNames(filePath, opts.marker);
      index.set(filePath, names);
      nameCount += names.length;
    } catch (error) {
      if (!(error instanceof ExtractionFailedError)) throw error;
      skippedFiles += 1;
      logger.debug(
        { filePath, error: error.cause?.message ?? error.message },
        "Skipping unreadable file",
      );
    }
  }

  const summary: BuildSummary = {
    root: absoluteRoot,
    enumerator: enumerator.name,
    scannedFiles: files.length,
    indexedFiles: index.size,
    skippedFiles,
    nameCount,
  };

  logger.info(summary, "Index build completed");

  return { index, summary };
}
