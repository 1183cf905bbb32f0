/**
 * Seed script: policy seed file → local policy corpus
 *
 * Loads policy documents into the SQLite policy corpus and its full-text
 * index. Safe to run multiple times (idempotent via upsert).
 *
 * Usage: npx tsx src/scripts/seed-policies.ts [path/to/policies.json]
 */

import * as path from "node:path";
import { env } from "../config/env.js";
import { resolveStoragePaths } from "../storage/base.js";
import { SqlitePolicyCorpus, loadPolicySeed } from "../storage/policies.js";
import { closeDatabase, getDatabase } from "../storage/sqlite.js";

async function seed(): Promise<void> {
  const seedFile = path.resolve(process.cwd(), process.argv[2] ?? env.POLICY_SEED_FILE);
  const { database: databasePath } = resolveStoragePaths(env.DATA_DIR);

  console.log("=".repeat(50));
  console.log("Policy corpus seed");
  console.log("=".repeat(50));
  console.log(`  Seed file: ${seedFile}`);
  console.log(`  Database:  ${databasePath}`);

  const policies = loadPolicySeed(seedFile);
  const corpus = new SqlitePolicyCorpus(getDatabase(databasePath));
  const upserted = corpus.upsert(policies);

  console.log("-".repeat(50));
  for (const policy of policies) {
    console.log(`  ${policy.policyId}: ${policy.coverageType ?? "(no coverage type)"}`);
  }
  console.log("-".repeat(50));
  console.log(`  TOTAL: ${upserted} upserted, ${corpus.count()} in corpus`);
  console.log("=".repeat(50));

  closeDatabase();
}

seed().catch((err: unknown) => {
  console.error("Seeding failed:", err);
  closeDatabase();
  process.exit(1);
});
