/**
 * Repository interfaces for storage backends.
 *
 * Claim records and audit entries are append-only: there is no update or
 * delete anywhere in these interfaces. Both are implemented by JSON file
 * storage and by SQLite.
 */

import type { AuditEntry, NewAuditEntry } from "../types/audit-entry.js";
import type { ClaimRecord, NewClaimRecord } from "../types/claim-record.js";
import type { ClaimArtifact, ContentIndex } from "../types/capabilities.js";

/**
 * Versioned claim store.
 */
export interface ClaimRecordRepository {
  /** Commit a new version; the version is issued atomically per claim */
  append(input: NewClaimRecord): Promise<ClaimRecord>;

  /** Highest version for a claim */
  getLatest(claimId: string): Promise<ClaimRecord | null>;

  /** One specific version */
  getVersion(claimId: string, version: number): Promise<ClaimRecord | null>;

  /** All versions for a claim, ascending */
  getVersions(claimId: string): Promise<ClaimRecord[]>;

  /** Latest version of each claim, newest first, at most `limit` claims */
  listLatest(limit: number): Promise<ClaimRecord[]>;

  /** Full scan with a filter */
  scan(predicate: (record: ClaimRecord) => boolean): Promise<ClaimRecord[]>;
}

/**
 * Audit log.
 */
export interface AuditLogRepository {
  append(input: NewAuditEntry): Promise<AuditEntry>;

  /**
   * Entries for a claim in chronological order. Uses the claim index;
   * rejects with IndexUnavailableError when the index is missing.
   */
  findByClaim(claimId: string): Promise<AuditEntry[]>;

  /** Full scan with a filter, chronological */
  scan(predicate: (entry: AuditEntry) => boolean): Promise<AuditEntry[]>;
}

/**
 * Content index for intake artifacts.
 */
export interface ArtifactRepository extends ContentIndex {
  findByClaim(claimId: string): Promise<ClaimArtifact[]>;
}

/**
 * Storage backend type.
 */
export type StorageBackend = "json" | "sqlite";

/**
 * Raised when an append would overwrite an existing entity.
 */
export class DuplicateEntityError extends Error {
  readonly entityId: string;

  constructor(entityId: string) {
    super(`Entity already exists: ${entityId}`);
    this.name = "DuplicateEntityError";
    this.entityId = entityId;
  }
}

/**
 * Raised when an indexed lookup cannot use its index.
 */
export class IndexUnavailableError extends Error {
  readonly indexName: string;

  constructor(indexName: string) {
    super(`Index unavailable: ${indexName}`);
    this.name = "IndexUnavailableError";
    this.indexName = indexName;
  }
}
