import { describe, it, expect, vi } from "vitest";
import { QueryEngine, queryIndex } from "./queryEngine.js";
import { SimilarityScorer } from "./similarity.js";
import { IndexCache } from "../db/indexCache.js";
import type { FunctionIndex, QueryOptions } from "../types/entities.js";

vi.mock("../logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const defaults: QueryOptions = { pathFilter: "", minLength: 0, threshold: 0.5 };

function sampleIndex(): FunctionIndex {
  return new Map([
    ["/a/x.py", ["parse_config", "x", "helper"]],
    ["/b/x.py", ["parse_config"]],
    ["/c/empty.py", []],
  ]);
}

describe("queryIndex", () => {
  it("ranks an exact name first with score 1", () => {
    const matches = queryIndex(
      sampleIndex(),
      "parse_config",
      { ...defaults, threshold: 0.99 },
      new SimilarityScorer(),
    );

    expect(matches).toEqual([
      { filePath: "/a/x.py", name: "parse_config", score: 1 },
      { filePath: "/b/x.py", name: "parse_config", score: 1 },
    ]);
  });

  it("normalizes the input and the names", () => {
    const matches = queryIndex(
      sampleIndex(),
      "Parse Config",
      { ...defaults, threshold: 0.99 },
      new SimilarityScorer(),
    );

    expect(matches.map((m) => m.filePath)).toEqual(["/a/x.py", "/b/x.py"]);
  });

  it("excludes scores equal to the threshold", () => {
    const scorer = new SimilarityScorer();

    expect(
      queryIndex(sampleIndex(), "parse_config", { ...defaults, threshold: 1 }, scorer),
    ).toEqual([]);
    expect(
      queryIndex(sampleIndex(), "parse_config", { ...defaults, threshold: 1.01 }, scorer),
    ).toEqual([]);
  });

  it("honors the path filter", () => {
    const matches = queryIndex(
      sampleIndex(),
      "parse_config",
      { ...defaults, pathFilter: "/a/", threshold: 0.99 },
      new SimilarityScorer(),
    );

    expect(matches).toEqual([
      { filePath: "/a/x.py", name: "parse_config", score: 1 },
    ]);
  });

  it("skips names shorter than minLength even when they match exactly", () => {
    const scorer = new SimilarityScorer();

    expect(
      queryIndex(sampleIndex(), "x", { ...defaults, minLength: 2, threshold: 0.99 }, scorer),
    ).toEqual([]);
    expect(
      queryIndex(sampleIndex(), "x", { ...defaults, minLength: 0, threshold: 0.99 }, scorer),
    ).toEqual([{ filePath: "/a/x.py", name: "x", score: 1 }]);
  });

  it("sorts by descending score", () => {
    const index: FunctionIndex = new Map([["/m.py", ["fob", "foo"]]]);

    const matches = queryIndex(index, "foo", defaults, new SimilarityScorer());

    expect(matches).toEqual([
      { filePath: "/m.py", name: "foo", score: 1 },
      { filePath: "/m.py", name: "fob", score: 0.67 },
    ]);
  });

  it("collapses repeated file and name pairs", () => {
    const index: FunctionIndex = new Map([["/m.py", ["foo", "fob", "foo"]]]);

    const matches = queryIndex(index, "foo", defaults, new SimilarityScorer());

    expect(matches).toEqual([
      { filePath: "/m.py", name: "foo", score: 1 },
      { filePath: "/m.py", name: "fob", score: 0.67 },
    ]);
  });

  it("truncates to the limit", () => {
    const index: FunctionIndex = new Map([["/m.py", ["fob", "foo"]]]);

    const matches = queryIndex(
      index,
      "foo",
      { ...defaults, limit: 1 },
      new SimilarityScorer(),
    );

    expect(matches).toEqual([{ filePath: "/m.py", name: "foo", score: 1 }]);
  });

  it("returns nothing for an empty index", () => {
    expect(queryIndex(new Map(), "foo", defaults, new SimilarityScorer())).toEqual(
      [],
    );
  });

  it("validates options", () => {
    const scorer = new SimilarityScorer();

    expect(() =>
      queryIndex(sampleIndex(), "foo", { ...defaults, minLength: -1 }, scorer),
    ).toThrow("minLength must be a non-negative integer");
    expect(() =>
      queryIndex(sampleIndex(), "foo", { ...defaults, threshold: Number.NaN }, scorer),
    ).toThrow("threshold must be a finite number");
    expect(() =>
      queryIndex(sampleIndex(), "foo", { ...defaults, limit: 0 }, scorer),
    ).toThrow("limit must be a positive integer");
  });

  it("reuses cached scores for names repeated across files", () => {
    const scorer = new SimilarityScorer();

    queryIndex(sampleIndex(), "parse_config", defaults, scorer);

    // parseconfig is scored once for /a and served from cache for /b
    expect(scorer.cache.stats()).toEqual({ size: 3, hits: 1, misses: 3 });
  });
});

describe("QueryEngine", () => {
  it("loads the index once per location across searches", async () => {
    const loader = vi.fn(async () => sampleIndex());
    const engine = new QueryEngine({ cache: new IndexCache(loader) });

    const first = await engine.search("/tmp/index.sqlite", "helper", {
      ...defaults,
      threshold: 0.99,
    });
    const second = await engine.search("/tmp/index.sqlite", "parse_config", {
      ...defaults,
      threshold: 0.99,
    });

    expect(loader).toHaveBeenCalledTimes(1);
    expect(first).toEqual([{ filePath: "/a/x.py", name: "helper", score: 1 }]);
    expect(second).toHaveLength(2);
  });
});
