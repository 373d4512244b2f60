import { promises as fs } from "fs";
import path from "path";
import { ExtractionFailedError, errorMessage, toError } from "./errors.js";

export const DEFAULT_MARKER = "def ";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Pulls candidate definition names out of source text.
 *
 * Any line containing `marker` is a candidate, whatever surrounds it. The
 * trimmed line loses its first marker occurrence and is cut before the first
 * `(`; without a `(` the whole remainder is kept. Whitespace before the
 * parenthesis stays, so `def foo (x):` yields `"foo "`.
 */
export function parseNames(content: string, marker = DEFAULT_MARKER): string[] {
  if (marker.length === 0) {
    throw new Error("Definition marker must be a non-empty string");
  }

  const names: string[] = [];
  for (const line of content.split("\n")) {
    if (!line.includes(marker)) continue;

    const remainder = line.trim().replace(marker, "");
    const paren = remainder.indexOf("(");
    names.push(paren === -1 ? remainder : remainder.slice(0, paren));
  }
  return names;
}

export async function extractNames(
  filePath: string,
  marker = DEFAULT_MARKER,
): Promise<string[]> {
  const normalizedPath = path.resolve(filePath);

  let content: string;
  try {
    const buffer = await fs.readFile(normalizedPath);
    content = utf8.decode(buffer);
  } catch (error) {
    throw new ExtractionFailedError(
      `Failed to read file ${normalizedPath}: ${errorMessage(error)}`,
      normalizedPath,
      toError(error),
    );
  }

  return parseNames(content, marker);
}
