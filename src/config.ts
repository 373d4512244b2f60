import { z } from "zod";
import { getDefaultIndexPath } from "./lib/paths.js";

export const ENUMERATOR_PREFERENCES = ["auto", "locate", "git", "walk"] as const;

const configSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("warn"),
  FNRECALL_INDEX_PATH: z.string().min(1).default(getDefaultIndexPath()),
  FNRECALL_ROOT: z.string().min(1).default("/"),
  FNRECALL_EXTENSION: z
    .string()
    .regex(/^\.[^/\\]+$/, "extension must start with a dot, e.g. .py")
    .default(".py"),
  FNRECALL_MARKER: z.string().min(1).default("def "),
  // An empty value turns junk stripping off entirely
  FNRECALL_JUNK_CHARS: z.string().default(" _"),
  FNRECALL_THRESHOLD: z.coerce.number().finite().default(0.6),
  FNRECALL_MIN_LENGTH: z.coerce.number().int().nonnegative().default(3),
  FNRECALL_SCORE_CACHE_SIZE: z.coerce.number().int().positive().optional(),
  FNRECALL_ENUMERATOR: z.enum(ENUMERATOR_PREFERENCES).default("auto"),
});

export type Config = z.infer<typeof configSchema>;
export type EnumeratorPreference = Config["FNRECALL_ENUMERATOR"];

let config: Config | undefined;

export function getConfig(): Config {
  if (!config) {
    try {
      config = configSchema.parse(process.env);
    } catch (error) {
      console.error("Invalid environment configuration:", error);
      process.exit(1);
    }
  }
  return config;
}

/**
 * Splits the configured junk characters into the set removed by `normalize`.
 */
export function getJunkCharacters(): string[] {
  return Array.from(new Set(getConfig().FNRECALL_JUNK_CHARS));
}
