/** Ordered mapping from absolute file path to the names found in that file. */
export type FunctionIndex = Map<string, string[]>;

export interface IndexEntry {
  filePath: string;
  names: string[];
}

export interface Match {
  filePath: string;
  name: string;
  score: number; // 0..1, two decimals
}

export interface QueryOptions {
  /** Substring every matching file path must contain; empty matches all. */
  pathFilter: string;
  minLength: number;
  /** Exclusive lower bound on the score. */
  threshold: number;
  limit?: number;
}

export interface BuildOptions {
  marker: string;
}

export interface BuildSummary {
  root: string;
  enumerator: string;
  scannedFiles: number;
  indexedFiles: number;
  skippedFiles: number;
  nameCount: number;
}

export interface IndexMetadata {
  formatVersion: number;
  root: string;
  marker: string;
  extension: string;
  builtAt: string; // ISO-8601
  fileCount: number;
  nameCount: number;
}

export function toEntries(index: FunctionIndex): IndexEntry[] {
  return Array.from(index, ([filePath, names]) => ({ filePath, names }));
}

export function countNames(index: FunctionIndex): number {
  let total = 0;
  for (const names of index.values()) total += names.length;
  return total;
}
