/**
 * Storage Layer
 *
 * Append-only stores for claim records, the audit log and intake artifacts,
 * plus the local policy corpus. Records, audit entries and artifacts are
 * stored as JSON files or in SQLite (STORAGE_BACKEND); the policy corpus
 * always lives in SQLite.
 */

// Re-export base utilities
export {
  resolveStoragePaths,
  ensureStorageDirs,
  createAppendOnlyStorage,
  generateId,
  monotonicNow,
  dateReviver,
  type StoragePaths,
  type AppendOnlyStorage,
} from "./base.js";

// Re-export repository types
export {
  DuplicateEntityError,
  IndexUnavailableError,
  type ClaimRecordRepository,
  type AuditLogRepository,
  type ArtifactRepository,
  type StorageBackend,
} from "./repository.js";

// Re-export SQLite utilities
export {
  openDatabase,
  getDatabase,
  closeDatabase,
  hasIndex,
  AUDIT_CLAIM_INDEX,
} from "./sqlite.js";

// Re-export specific storage modules
export * from "./claim-records.js";
export * from "./audit-log.js";
export * from "./artifacts.js";
export * from "./policies.js";
