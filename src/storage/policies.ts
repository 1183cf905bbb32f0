/**
 * Policy Corpus
 *
 * Local policy documents with hybrid lookup. Candidates come from an FTS5
 * phrase match; ranking fuses the BM25 score with cosine similarity of term
 * vectors, weighted by `alpha` (1 = keyword only, 0 = similarity only).
 */

import * as fs from "node:fs";
import type Database from "better-sqlite3";
import { z } from "zod";
import type { PolicyDocument, PolicySearch } from "../types/capabilities.js";

/** Default keyword weight in the fused score */
export const DEFAULT_HYBRID_ALPHA = 0.75;

/** FTS candidates considered before fusion */
const CANDIDATE_LIMIT = 50;

const policyDocumentSchema = z.object({
  policyId: z.string().min(1),
  content: z.string(),
  coverageType: z.string().nullable().default(null),
  deductible: z.number().nonnegative().nullable().default(null),
  coverageLimit: z.number().nonnegative().nullable().default(null),
  filingDeadlineDays: z.number().int().nonnegative().nullable().default(null),
});

const policySeedSchema = z.array(policyDocumentSchema);

/**
 * Read and validate a policy seed file (JSON array of policy documents).
 */
export function loadPolicySeed(filePath: string): PolicyDocument[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return policySeedSchema.parse(raw);
}

/**
 * Lower-cased alphanumeric tokens, matching FTS5's unicode61 tokenizer
 * closely enough for phrase queries.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Cosine similarity of two token bags.
 */
export function termVectorSimilarity(a: string[], b: string[]): number {
  if (a.length === 0 || b.length === 0) return 0;

  const countTokens = (tokens: string[]) => {
    const counts = new Map<string, number>();
    for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1);
    return counts;
  };

  const va = countTokens(a);
  const vb = countTokens(b);
  let dot = 0;
  for (const [token, count] of va) dot += count * (vb.get(token) ?? 0);

  const norm = (v: Map<string, number>) =>
    Math.sqrt([...v.values()].reduce((sum, c) => sum + c * c, 0));

  return dot / (norm(va) * norm(vb));
}

function searchableText(policy: PolicyDocument): string {
  return [policy.policyId, policy.coverageType ?? "", policy.content].join(" ");
}

/**
 * SQLite-backed policy corpus.
 */
export class SqlitePolicyCorpus implements PolicySearch {
  private database: Database.Database;
  private alpha: number;

  constructor(database: Database.Database, alpha: number = DEFAULT_HYBRID_ALPHA) {
    if (alpha < 0 || alpha > 1) {
      throw new RangeError(`alpha must be between 0 and 1, got ${alpha}`);
    }
    this.database = database;
    this.alpha = alpha;
  }

  /**
   * Insert or replace policies (idempotent by policy id).
   */
  upsert(policies: PolicyDocument[]): number {
    const upsertRow = this.database.prepare<[string, string, string | null]>(
      `INSERT INTO policies (policy_id, data, coverage_type, updated_at)
       VALUES (?, ?, ?, datetime('now'))
       ON CONFLICT(policy_id) DO UPDATE SET
         data = excluded.data,
         coverage_type = excluded.coverage_type,
         updated_at = excluded.updated_at`
    );
    const deleteFts = this.database.prepare<[string]>(
      "DELETE FROM policies_fts WHERE policy_id = ?"
    );
    const insertFts = this.database.prepare<[string, string | null, string]>(
      "INSERT INTO policies_fts (policy_id, coverage_type, content) VALUES (?, ?, ?)"
    );

    const run = this.database.transaction((docs: PolicyDocument[]) => {
      for (const doc of docs) {
        upsertRow.run(doc.policyId, JSON.stringify(doc), doc.coverageType);
        deleteFts.run(doc.policyId);
        insertFts.run(doc.policyId, doc.coverageType, `${doc.policyId}\n${doc.content}`);
      }
      return docs.length;
    });

    return run(policies);
  }

  count(): number {
    const row = this.database
      .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM policies")
      .get();
    return row?.count ?? 0;
  }

  get(policyId: string): PolicyDocument | null {
    const row = this.database
      .prepare<[string], { data: string }>("SELECT data FROM policies WHERE policy_id = ?")
      .get(policyId);
    return row ? policyDocumentSchema.parse(JSON.parse(row.data)) : null;
  }

  async hybridSearch(query: string, limit: number): Promise<PolicyDocument[]> {
    const queryTokens = tokenize(query);
    if (queryTokens.length === 0 || limit <= 0) return [];

    const candidates = this.database
      .prepare<[string, number], { policy_id: string; rank: number }>(
        `SELECT policy_id, bm25(policies_fts) AS rank
         FROM policies_fts
         WHERE policies_fts MATCH ?
         ORDER BY rank
         LIMIT ?`
      )
      .all(`"${queryTokens.join(" ")}"`, CANDIDATE_LIMIT);

    if (candidates.length === 0) return [];

    // bm25() is lower-is-better; flip and scale into [0, 1]
    const best = Math.max(...candidates.map((c) => -c.rank));
    const scored: Array<{ doc: PolicyDocument; score: number }> = [];

    for (const candidate of candidates) {
      const doc = this.get(candidate.policy_id);
      if (!doc) continue;
      const keyword = best > 0 ? -candidate.rank / best : 1;
      const similarity = termVectorSimilarity(queryTokens, tokenize(searchableText(doc)));
      scored.push({ doc, score: this.alpha * keyword + (1 - this.alpha) * similarity });
    }

    return scored
      .sort((a, b) => b.score - a.score || a.doc.policyId.localeCompare(b.doc.policyId))
      .slice(0, limit)
      .map((s) => s.doc);
  }
}
