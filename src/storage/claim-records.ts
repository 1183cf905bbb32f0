/**
 * Claim Records Storage
 *
 * Versioned, append-only claim snapshots. Versions are per-claim sequence
 * numbers issued atomically; wall-clock time is only the record timestamp.
 */

import type Database from "better-sqlite3";
import type { ClaimRecord, NewClaimRecord } from "../types/claim-record.js";
import { claimRecordId } from "../types/claim-record.js";
import { createAppendOnlyStorage, dateReviver, monotonicNow } from "./base.js";
import { createSqliteAppendOnlyTable } from "./sqlite.js";
import { DuplicateEntityError, type ClaimRecordRepository } from "./repository.js";
import { KeyedMutex } from "../services/concurrency.js";

/** Give up after this many lost version races for one append */
const MAX_APPEND_ATTEMPTS = 50;

/**
 * Keep the latest version per claim, newest first, at most `limit`.
 */
export function latestPerClaim(records: ClaimRecord[], limit: number): ClaimRecord[] {
  const latest = new Map<string, ClaimRecord>();
  for (const record of records) {
    const current = latest.get(record.claimId);
    if (!current || record.version > current.version) {
      latest.set(record.claimId, record);
    }
  }

  return [...latest.values()]
    .sort(
      (a, b) =>
        b.timestamp.getTime() - a.timestamp.getTime() || a.claimId.localeCompare(b.claimId)
    )
    .slice(0, Math.max(0, limit));
}

function byVersion(a: ClaimRecord, b: ClaimRecord): number {
  return a.version - b.version;
}

/**
 * Claim records as JSON files, one file per version.
 *
 * Appends for one claim are serialised in-process; across processes the
 * exclusive create of `<claimId>#<version>` acts as a compare-and-swap and
 * the loser retries with the next version.
 */
export function createJsonClaimRecordRepository(dir: string): ClaimRecordRepository {
  const storage = createAppendOnlyStorage<ClaimRecord>(dir, dateReviver);
  const appendLocks = new KeyedMutex();

  const versionsOf = async (claimId: string) =>
    (await storage.find((r) => r.claimId === claimId)).sort(byVersion);

  return {
    async append(input: NewClaimRecord): Promise<ClaimRecord> {
      return appendLocks.withLock(input.claimId, async () => {
        const existing = await versionsOf(input.claimId);
        let version = (existing[existing.length - 1]?.version ?? 0) + 1;

        for (let attempt = 0; attempt < MAX_APPEND_ATTEMPTS; attempt++) {
          const record: ClaimRecord = {
            ...input,
            id: claimRecordId(input.claimId, version),
            version,
            timestamp: monotonicNow(),
          };
          try {
            return await storage.insert(record);
          } catch (err) {
            if (!(err instanceof DuplicateEntityError)) throw err;
            version++;
          }
        }

        throw new Error(
          `Could not commit a version for ${input.claimId} after ${MAX_APPEND_ATTEMPTS} attempts`
        );
      });
    },

    async getLatest(claimId: string): Promise<ClaimRecord | null> {
      const versions = await versionsOf(claimId);
      return versions[versions.length - 1] ?? null;
    },

    async getVersion(claimId: string, version: number): Promise<ClaimRecord | null> {
      return storage.get(claimRecordId(claimId, version));
    },

    async getVersions(claimId: string): Promise<ClaimRecord[]> {
      return versionsOf(claimId);
    },

    async listLatest(limit: number): Promise<ClaimRecord[]> {
      return latestPerClaim(await storage.getAll(), limit);
    },

    async scan(predicate: (record: ClaimRecord) => boolean): Promise<ClaimRecord[]> {
      return (await storage.find(predicate)).sort(
        (a, b) => a.claimId.localeCompare(b.claimId) || byVersion(a, b)
      );
    },
  };
}

/**
 * Claim records in SQLite. The next version is computed and inserted inside
 * one IMMEDIATE transaction, under the UNIQUE (claim_id, version) key.
 */
export function createSqliteClaimRecordRepository(
  database: Database.Database
): ClaimRecordRepository {
  const table = createSqliteAppendOnlyTable<ClaimRecord>(database, "claim_records", [
    { column: "claim_id", property: "claimId" },
    { column: "version", property: "version" },
    { column: "status", property: "status" },
    { column: "timestamp", property: "timestamp" },
  ]);

  const nextVersion = database.prepare<[string], { version: number }>(
    "SELECT COALESCE(MAX(version), 0) + 1 AS version FROM claim_records WHERE claim_id = ?"
  );

  const appendNext = database.transaction((input: NewClaimRecord): ClaimRecord => {
    const version = nextVersion.get(input.claimId)?.version ?? 1;
    return table.insert({
      ...input,
      id: claimRecordId(input.claimId, version),
      version,
      timestamp: monotonicNow(),
    });
  });

  const latestStatement = database.prepare<[string], { data: string }>(
    "SELECT data FROM claim_records WHERE claim_id = ? ORDER BY version DESC LIMIT 1"
  );

  const listLatestStatement = database.prepare<[number], { data: string }>(`
    SELECT r.data FROM claim_records r
    WHERE r.version = (SELECT MAX(version) FROM claim_records WHERE claim_id = r.claim_id)
    ORDER BY r.timestamp DESC, r.claim_id ASC
    LIMIT ?
  `);

  return {
    async append(input: NewClaimRecord): Promise<ClaimRecord> {
      return appendNext.immediate(input);
    },

    async getLatest(claimId: string): Promise<ClaimRecord | null> {
      const row = latestStatement.get(claimId);
      return row ? table.parse(row.data) : null;
    },

    async getVersion(claimId: string, version: number): Promise<ClaimRecord | null> {
      return table.get(claimRecordId(claimId, version));
    },

    async getVersions(claimId: string): Promise<ClaimRecord[]> {
      return table.findAllByIndex("claim_id", claimId, ["version"]);
    },

    async listLatest(limit: number): Promise<ClaimRecord[]> {
      return listLatestStatement.all(Math.max(0, limit)).map((row) => table.parse(row.data));
    },

    async scan(predicate: (record: ClaimRecord) => boolean): Promise<ClaimRecord[]> {
      return table
        .getAll()
        .filter(predicate)
        .sort((a, b) => a.claimId.localeCompare(b.claimId) || byVersion(a, b));
    },
  };
}
