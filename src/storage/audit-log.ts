/**
 * Audit Log Storage
 *
 * Write-once audit entries, one per stage attempt.
 */

import type Database from "better-sqlite3";
import type { AuditEntry, NewAuditEntry } from "../types/audit-entry.js";
import { auditLogId } from "../types/audit-entry.js";
import { createAppendOnlyStorage, dateReviver, generateId, monotonicNow } from "./base.js";
import { AUDIT_CLAIM_INDEX, createSqliteAppendOnlyTable, hasIndex } from "./sqlite.js";
import { IndexUnavailableError, type AuditLogRepository } from "./repository.js";

/**
 * Build a complete entry from append input.
 */
function toEntry(input: NewAuditEntry): AuditEntry {
  return {
    ...input,
    id: generateId(),
    logId: auditLogId(input.claimId, input.agent),
    timestamp: monotonicNow(),
  };
}

/**
 * Chronological order. Array.prototype.sort is stable, so entries with equal
 * timestamps keep their storage order.
 */
function chronological(entries: AuditEntry[]): AuditEntry[] {
  return entries.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Audit log as JSON files. There is no separate index: lookups by claim
 * scan the directory.
 */
export function createJsonAuditLogRepository(dir: string): AuditLogRepository {
  const storage = createAppendOnlyStorage<AuditEntry>(dir, dateReviver);

  return {
    async append(input: NewAuditEntry): Promise<AuditEntry> {
      return storage.insert(toEntry(input));
    },

    async findByClaim(claimId: string): Promise<AuditEntry[]> {
      return chronological(await storage.find((e) => e.claimId === claimId));
    },

    async scan(predicate: (entry: AuditEntry) => boolean): Promise<AuditEntry[]> {
      return chronological(await storage.find(predicate));
    },
  };
}

/**
 * Audit log in SQLite, indexed by (claim_id, timestamp).
 */
export function createSqliteAuditLogRepository(database: Database.Database): AuditLogRepository {
  const table = createSqliteAppendOnlyTable<AuditEntry>(database, "audit_log", [
    { column: "log_id", property: "logId" },
    { column: "claim_id", property: "claimId" },
    { column: "agent", property: "agent" },
    { column: "status", property: "status" },
    { column: "timestamp", property: "timestamp" },
  ]);

  return {
    async append(input: NewAuditEntry): Promise<AuditEntry> {
      return table.insert(toEntry(input));
    },

    async findByClaim(claimId: string): Promise<AuditEntry[]> {
      if (!hasIndex(database, AUDIT_CLAIM_INDEX)) {
        throw new IndexUnavailableError(AUDIT_CLAIM_INDEX);
      }
      return table.findAllByIndex("claim_id", claimId, ["timestamp"]);
    },

    async scan(predicate: (entry: AuditEntry) => boolean): Promise<AuditEntry[]> {
      return chronological(table.getAll().filter(predicate));
    },
  };
}
