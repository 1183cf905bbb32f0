import { beforeEach, describe, expect, it } from "vitest";
import { fileURLToPath } from "node:url";
import {
  SqlitePolicyCorpus,
  loadPolicySeed,
  termVectorSimilarity,
  tokenize,
} from "../../../src/storage/policies.js";
import { openDatabase } from "../../../src/storage/sqlite.js";

const SEED_FILE = fileURLToPath(new URL("../../../data/seed/policies.json", import.meta.url));

describe("policy seed", () => {
  it("loads and validates the seed file", () => {
    const policies = loadPolicySeed(SEED_FILE);

    expect(policies.map((p) => p.policyId)).toEqual(["AUTO-001", "AUTO-002", "AUTO-003"]);
    expect(policies[0]).toMatchObject({
      coverageType: "Comprehensive + Collision",
      deductible: 500,
      coverageLimit: 50000,
      filingDeadlineDays: 30,
    });
  });
});

describe("tokenize and termVectorSimilarity", () => {
  it("splits on anything that is not a letter or digit", () => {
    expect(tokenize("AUTO-001, Policy!")).toEqual(["auto", "001", "policy"]);
    expect(tokenize("  -- ")).toEqual([]);
  });

  it("scores identical bags 1 and disjoint bags 0", () => {
    expect(termVectorSimilarity(["a", "b"], ["b", "a"])).toBeCloseTo(1, 10);
    expect(termVectorSimilarity(["a"], ["b"])).toBe(0);
    expect(termVectorSimilarity([], ["a"])).toBe(0);
  });
});

describe("SqlitePolicyCorpus", () => {
  let corpus: SqlitePolicyCorpus;

  beforeEach(() => {
    corpus = new SqlitePolicyCorpus(openDatabase(":memory:"));
    corpus.upsert(loadPolicySeed(SEED_FILE));
  });

  it("finds a policy by its number", async () => {
    const [match, ...rest] = await corpus.hybridSearch("AUTO-002", 1);

    expect(match?.policyId).toBe("AUTO-002");
    expect(match?.coverageLimit).toBe(25000);
    expect(rest).toEqual([]);
  });

  it("matches policy numbers case-insensitively", async () => {
    const results = await corpus.hybridSearch("auto-003", 5);

    expect(results.map((p) => p.policyId)).toEqual(["AUTO-003"]);
  });

  it("returns nothing for an unknown policy number", async () => {
    expect(await corpus.hybridSearch("AUTO-999", 1)).toEqual([]);
  });

  it("returns nothing for an empty query or a non-positive limit", async () => {
    expect(await corpus.hybridSearch("  ", 5)).toEqual([]);
    expect(await corpus.hybridSearch("AUTO-001", 0)).toEqual([]);
  });

  it("ranks keyword matches across documents", async () => {
    const results = await corpus.hybridSearch("collision", 3);

    expect(results.map((p) => p.policyId).sort()).toEqual(["AUTO-001", "AUTO-003"]);
  });

  it("upserts by policy id", () => {
    const updated = corpus.upsert([
      {
        policyId: "AUTO-002",
        content: "Liability cover, revised",
        coverageType: "Liability Only",
        deductible: 100,
        coverageLimit: 30000,
        filingDeadlineDays: 60,
      },
    ]);

    expect(updated).toBe(1);
    expect(corpus.count()).toBe(3);
    expect(corpus.get("AUTO-002")?.deductible).toBe(100);
    expect(corpus.get("AUTO-404")).toBeNull();
  });

  it("searches revised content after an upsert", async () => {
    corpus.upsert([
      {
        policyId: "AUTO-002",
        content: "Hail and flood rider",
        coverageType: null,
        deductible: null,
        coverageLimit: null,
        filingDeadlineDays: null,
      },
    ]);

    expect((await corpus.hybridSearch("flood rider", 5)).map((p) => p.policyId)).toEqual(["AUTO-002"]);
    expect((await corpus.hybridSearch("AUTO-002", 5)).map((p) => p.policyId)).toEqual(["AUTO-002"]);
  });

  it("rejects a keyword weight outside [0, 1]", () => {
    expect(() => new SqlitePolicyCorpus(openDatabase(":memory:"), 1.5)).toThrow(RangeError);
  });
});
