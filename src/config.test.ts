import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { homedir } from "node:os";
import { join } from "node:path";

const originalEnv = { ...process.env };

// Reset config module between tests
async function resetConfigModule() {
  vi.resetModules();
  return await import("./config.js");
}

function clearFnrecallEnv() {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith("FNRECALL_")) delete process.env[key];
  }
}

describe("config", () => {
  beforeEach(() => {
    process.env = { ...originalEnv };
    clearFnrecallEnv();
    vi.restoreAllMocks();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe("getConfig", () => {
    it("applies defaults", async () => {
      delete process.env.LOG_LEVEL;
      delete process.env.NODE_ENV;

      const { getConfig } = await resetConfigModule();

      expect(getConfig()).toEqual({
        NODE_ENV: "production",
        LOG_LEVEL: "warn",
        FNRECALL_INDEX_PATH: join(homedir(), ".fnrecall.sqlite"),
        FNRECALL_ROOT: "/",
        FNRECALL_EXTENSION: ".py",
        FNRECALL_MARKER: "def ",
        FNRECALL_JUNK_CHARS: " _",
        FNRECALL_THRESHOLD: 0.6,
        FNRECALL_MIN_LENGTH: 3,
        FNRECALL_ENUMERATOR: "auto",
      });
    });

    it("coerces numeric values", async () => {
      process.env.FNRECALL_THRESHOLD = "0.75";
      process.env.FNRECALL_MIN_LENGTH = "5";
      process.env.FNRECALL_SCORE_CACHE_SIZE = "1000";

      const { getConfig } = await resetConfigModule();

      expect(getConfig()).toMatchObject({
        FNRECALL_THRESHOLD: 0.75,
        FNRECALL_MIN_LENGTH: 5,
        FNRECALL_SCORE_CACHE_SIZE: 1000,
      });
    });

    it("caches the parsed configuration", async () => {
      process.env.FNRECALL_ROOT = "/srv";
      const { getConfig } = await resetConfigModule();

      const first = getConfig();
      process.env.FNRECALL_ROOT = "/home";

      expect(getConfig()).toBe(first);
      expect(getConfig().FNRECALL_ROOT).toBe("/srv");
    });

    it("exits on invalid values", async () => {
      process.env.FNRECALL_ENUMERATOR = "fast";
      const exit = vi.spyOn(process, "exit").mockImplementation(() => {
        throw new Error("process.exit");
      });
      vi.spyOn(console, "error").mockImplementation(() => undefined);

      const { getConfig } = await resetConfigModule();

      expect(() => getConfig()).toThrow("process.exit");
      expect(exit).toHaveBeenCalledWith(1);
    });

    it("rejects an extension without a leading dot", async () => {
      process.env.FNRECALL_EXTENSION = "py";
      vi.spyOn(process, "exit").mockImplementation(() => {
        throw new Error("process.exit");
      });
      vi.spyOn(console, "error").mockImplementation(() => undefined);

      const { getConfig } = await resetConfigModule();

      expect(() => getConfig()).toThrow("process.exit");
    });
  });

  describe("getJunkCharacters", () => {
    it("splits the configured characters without repeats", async () => {
      process.env.FNRECALL_JUNK_CHARS = "-_-";

      const { getJunkCharacters } = await resetConfigModule();

      expect(getJunkCharacters()).toEqual(["-", "_"]);
    });

    it("allows turning junk stripping off", async () => {
      process.env.FNRECALL_JUNK_CHARS = "";

      const { getJunkCharacters } = await resetConfigModule();

      expect(getJunkCharacters()).toEqual([]);
    });
  });
});
