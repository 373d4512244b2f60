import meow from "meow";
import {
  ENUMERATOR_PREFERENCES,
  getConfig,
  getJunkCharacters,
  type EnumeratorPreference,
} from "./config.js";
import { logger } from "./logger.js";
import { IndexCache } from "./db/index.js";
import { QueryEngine } from "./lib/queryEngine.js";
import { ScoreCache, SimilarityScorer } from "./lib/similarity.js";
import { resolveIndexPath } from "./lib/paths.js";
import {
  IndexCorruptError,
  IndexNotFoundError,
  IndexWriteError,
  errorMessage,
} from "./lib/errors.js";
import { runIndexCommand } from "./commands/indexCommand.js";
import { runFindCommand } from "./commands/findCommand.js";
import { runInfoCommand } from "./commands/infoCommand.js";
import { processIO, type CommandIO } from "./commands/output.js";
import type { CandidateEnumerator } from "./lib/enumerators.js";

const HELP = `
  Usage
    $ fnrecall index [root]          Rebuild the index from every source file under root
    $ fnrecall find <text...>        Fuzzy-search indexed function names
    $ fnrecall info                  Show what the current index contains

  Options
    --index, -i        Index file (default $FNRECALL_INDEX_PATH or ~/.fnrecall.sqlite)
    --path, -p         Only search files whose path contains this text
    --threshold, -t    Minimum similarity, exclusive, 0..1
    --min-length, -m   Ignore names shorter than this
    --limit, -n        Show at most this many matches
    --extension, -e    Source file extension to index (default .py)
    --enumerator       File listing strategy: auto, locate, git or walk

  Examples
    $ fnrecall index ~/projects
    $ fnrecall find parse config --path /myproject/
`;

export interface RunOptions {
  io?: CommandIO;
  /** Shared across commands in one process, so a build refreshes later finds. */
  cache?: IndexCache;
  strategies?: CandidateEnumerator[];
}

function toEnumeratorPreference(
  value: string | undefined,
  fallback: EnumeratorPreference,
): EnumeratorPreference {
  if (value === undefined) return fallback;
  const preference = ENUMERATOR_PREFERENCES.find((p) => p === value);
  if (!preference) {
    throw new Error(
      `Unknown enumerator "${value}"; expected one of ${ENUMERATOR_PREFERENCES.join(", ")}`,
    );
  }
  return preference;
}

/**
 * Runs one command line and resolves to the process exit status.
 */
export async function run(
  argv: readonly string[],
  runOpts: RunOptions = {},
): Promise<number> {
  const io = runOpts.io ?? processIO;
  const config = getConfig();

  const cli = meow(HELP, {
    importMeta: import.meta,
    argv,
    flags: {
      index: { type: "string", shortFlag: "i" },
      path: { type: "string", shortFlag: "p", default: "" },
      threshold: { type: "number", shortFlag: "t" },
      minLength: { type: "number", shortFlag: "m" },
      limit: { type: "number", shortFlag: "n" },
      extension: { type: "string", shortFlag: "e" },
      enumerator: { type: "string" },
    },
  });

  const [command, ...rest] = cli.input;
  if (command === undefined) {
    io.stdout(cli.help);
    return 0;
  }

  const indexPath = resolveIndexPath(cli.flags.index ?? config.FNRECALL_INDEX_PATH);
  const cache = runOpts.cache ?? new IndexCache();

  try {
    switch (command) {
      case "index": {
        await runIndexCommand(
          {
            root: rest[0] ?? config.FNRECALL_ROOT,
            indexPath,
            extension: cli.flags.extension ?? config.FNRECALL_EXTENSION,
            marker: config.FNRECALL_MARKER,
            enumerator: toEnumeratorPreference(
              cli.flags.enumerator,
              config.FNRECALL_ENUMERATOR,
            ),
            strategies: runOpts.strategies,
            cache,
          },
          io.stdout,
        );
        return 0;
      }
      case "find": {
        const engine = new QueryEngine({
          cache,
          scorer: new SimilarityScorer({
            junk: getJunkCharacters(),
            cache: new ScoreCache(config.FNRECALL_SCORE_CACHE_SIZE),
          }),
        });
        await runFindCommand(
          engine,
          {
            words: rest,
            indexPath,
            pathFilter: cli.flags.path,
            minLength: cli.flags.minLength ?? config.FNRECALL_MIN_LENGTH,
            threshold: cli.flags.threshold ?? config.FNRECALL_THRESHOLD,
            limit: cli.flags.limit,
          },
          io.stdout,
        );
        return 0;
      }
      case "info": {
        await runInfoCommand(indexPath, io.stdout);
        return 0;
      }
      default: {
        io.stderr(`Unknown command: ${command}`);
        io.stderr(cli.help);
        return 2;
      }
    }
  } catch (error) {
    if (error instanceof IndexNotFoundError) {
      io.stderr(
        `No index found at ${error.location}. Run "fnrecall index [root]" to build one first.`,
      );
      return 1;
    }
    if (error instanceof IndexCorruptError || error instanceof IndexWriteError) {
      logger.error(
        { location: error.location, cause: error.cause?.message },
        error.message,
      );
      io.stderr(error.message);
      return 1;
    }
    logger.error({ command, error: errorMessage(error) }, "Command failed");
    io.stderr(`fnrecall ${command} failed: ${errorMessage(error)}`);
    return 1;
  }
}
