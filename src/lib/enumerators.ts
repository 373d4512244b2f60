import { promises as fs } from "fs";
import path from "path";
import { execFile } from "child_process";
import { promisify } from "util";
import { simpleGit } from "simple-git";
import { logger } from "../logger.js";
import { errorMessage } from "./errors.js";
import type { EnumeratorPreference } from "../config.js";

const execFileAsync = promisify(execFile);

// locate can print the whole filesystem database; give it room
const LOCATE_MAX_BUFFER = 512 * 1024 * 1024;

/**
 * A way to list candidate source files under a root.
 */
export interface CandidateEnumerator {
  readonly name: Exclude<EnumeratorPreference, "auto">;
  isAvailable(root: string): Promise<boolean>;
  enumerate(root: string): Promise<string[]>;
}

// Suffix match so multi-part extensions such as ".tar.gz" work
function hasExtension(filePath: string, extension: string): boolean {
  const base = path.basename(filePath);
  return base.length > extension.length && base.endsWith(extension);
}

function isWithinRoot(filePath: string, root: string): boolean {
  const relative = path.relative(root, filePath);
  return (
    relative === "" ||
    (!relative.startsWith("..") && !path.isAbsolute(relative))
  );
}

function isExitCode(error: unknown, code: number): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === code
  );
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Resolves every path and drops repeats, keeping first-seen order.
 */
export function uniquePaths(paths: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const p of paths) {
    const resolved = path.resolve(p);
    if (seen.has(resolved)) continue;
    seen.add(resolved);
    result.push(resolved);
  }
  return result;
}

/**
 * Queries the system locate database. Fast, but only as fresh as the last
 * `updatedb` run.
 */
export class LocateEnumerator implements CandidateEnumerator {
  readonly name = "locate" as const;

  constructor(
    private readonly extension: string,
    private readonly command = "locate",
  ) {}

  async isAvailable(): Promise<boolean> {
    try {
      await execFileAsync(this.command, ["--version"]);
      return true;
    } catch {
      return false;
    }
  }

  async enumerate(root: string): Promise<string[]> {
    const absoluteRoot = path.resolve(root);
    const prefix = absoluteRoot.endsWith(path.sep)
      ? absoluteRoot
      : absoluteRoot + path.sep;
    const pattern = `^${escapeRegExp(prefix)}.*${escapeRegExp(this.extension)}$`;

    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.command, ["--regex", pattern], {
        maxBuffer: LOCATE_MAX_BUFFER,
      }));
    } catch (error) {
      // locate exits with 1 when nothing matched
      if (isExitCode(error, 1)) return [];
      throw error;
    }

    return uniquePaths(
      stdout
        .split("\n")
        .filter((line) => line.length > 0)
        .filter((line) => hasExtension(line, this.extension))
        .filter((line) => isWithinRoot(line, absoluteRoot)),
    );
  }
}

/**
 * Lists tracked and untracked-but-not-ignored files of the git work tree that
 * contains the root. Ignored files are never returned.
 */
export class GitFilesEnumerator implements CandidateEnumerator {
  readonly name = "git" as const;

  constructor(private readonly extension: string) {}

  async isAvailable(root: string): Promise<boolean> {
    try {
      const stats = await fs.stat(root);
      if (!stats.isDirectory()) return false;
      return await simpleGit(root).checkIsRepo();
    } catch {
      return false;
    }
  }

  async enumerate(root: string): Promise<string[]> {
    const absoluteRoot = path.resolve(root);
    const output = await simpleGit(absoluteRoot).raw([
      "ls-files",
      "-z",
      "--cached",
      "--others",
      "--exclude-standard",
      "--",
      `*${this.extension}`,
    ]);

    return uniquePaths(
      output
        .split("\0")
        .filter((rel) => rel.length > 0)
        .map((rel) => path.join(absoluteRoot, rel))
        .filter((file) => hasExtension(file, this.extension)),
    );
  }
}

/**
 * Walks the tree below the root. Symlinked directories are not followed and
 * directories that cannot be listed are skipped.
 */
export class RecursiveWalkEnumerator implements CandidateEnumerator {
  readonly name = "walk" as const;

  constructor(private readonly extension: string) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async enumerate(root: string): Promise<string[]> {
    const absoluteRoot = path.resolve(root);
    const stats = await fs.stat(absoluteRoot);
    if (!stats.isDirectory()) {
      return hasExtension(absoluteRoot, this.extension) ? [absoluteRoot] : [];
    }
    return this.listFilesRecursively(absoluteRoot);
  }

  private async listFilesRecursively(dir: string): Promise<string[]> {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.debug(
        { dir, error: errorMessage(error) },
        "Skipping unreadable directory",
      );
      return [];
    }

    // Sorted so repeated builds list files in the same order
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const results: string[] = [];
    for (const entry of entries) {
      if (entry.name === ".git") continue;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        results.push(...(await this.listFilesRecursively(fullPath)));
      } else if (entry.isFile() && hasExtension(entry.name, this.extension)) {
        results.push(fullPath);
      }
    }
    return results;
  }
}

export function createEnumerators(extension: string): CandidateEnumerator[] {
  return [
    new LocateEnumerator(extension),
    new GitFilesEnumerator(extension),
    new RecursiveWalkEnumerator(extension),
  ];
}

/**
 * Picks the first available strategy, in the order given. A pinned
 * preference must be available or selection fails.
 */
export async function selectEnumerator(
  root: string,
  strategies: CandidateEnumerator[],
  preference: EnumeratorPreference = "auto",
): Promise<CandidateEnumerator> {
  const candidates =
    preference === "auto"
      ? strategies
      : strategies.filter((s) => s.name === preference);

  for (const strategy of candidates) {
    if (await strategy.isAvailable(root)) {
      logger.debug({ root, enumerator: strategy.name }, "Selected enumerator");
      return strategy;
    }
    logger.debug({ root, enumerator: strategy.name }, "Enumerator unavailable");
  }

  throw new Error(
    preference === "auto"
      ? `No file enumerator available for ${root}`
      : `Enumerator "${preference}" is not available for ${root}`,
  );
}
