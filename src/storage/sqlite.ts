/**
 * SQLite Storage Backend
 *
 * Indexed append-only storage using better-sqlite3.
 * Claim records, the audit log, the artifact index and the policy corpus
 * share one database file.
 */

import Database from "better-sqlite3";
import * as path from "node:path";
import * as fs from "node:fs";
import { dateReviver } from "./base.js";

let db: Database.Database | null = null;
let dbPath: string | null = null;

/**
 * Open a database, apply pragmas and create the schema.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filePath: string): Database.Database {
  if (filePath !== ":memory:") {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  const database = new Database(filePath);
  database.pragma("journal_mode = WAL");
  database.pragma("synchronous = NORMAL");
  database.pragma("busy_timeout = 5000");

  initializeSchema(database);
  return database;
}

/**
 * Get or create the process-wide database connection.
 */
export function getDatabase(filePath: string): Database.Database {
  if (db && dbPath === filePath) return db;
  if (db) db.close();

  db = openDatabase(filePath);
  dbPath = filePath;
  return db;
}

/**
 * Close the process-wide database connection.
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    dbPath = null;
  }
}

/** Name of the index that serves audit lookups by claim */
export const AUDIT_CLAIM_INDEX = "idx_audit_log_claim_id";

/**
 * Initialize database schema.
 */
function initializeSchema(database: Database.Database): void {
  database.exec(`
    -- Versioned claim records
    CREATE TABLE IF NOT EXISTS claim_records (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      claim_id TEXT NOT NULL,
      version INTEGER NOT NULL,
      status TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      created_at TEXT DEFAULT (datetime('now')),
      UNIQUE (claim_id, version)
    );

    CREATE INDEX IF NOT EXISTS idx_claim_records_timestamp ON claim_records(timestamp);

    CREATE TRIGGER IF NOT EXISTS claim_records_no_update
    BEFORE UPDATE ON claim_records
    BEGIN
      SELECT RAISE(ABORT, 'claim_records is append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS claim_records_no_delete
    BEFORE DELETE ON claim_records
    BEGIN
      SELECT RAISE(ABORT, 'claim_records is append-only');
    END;

    -- Audit log
    CREATE TABLE IF NOT EXISTS audit_log (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      log_id TEXT NOT NULL,
      claim_id TEXT NOT NULL,
      agent TEXT NOT NULL,
      status TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS ${AUDIT_CLAIM_INDEX} ON audit_log(claim_id, timestamp);
    CREATE INDEX IF NOT EXISTS idx_audit_log_log_id ON audit_log(log_id);

    CREATE TRIGGER IF NOT EXISTS audit_log_no_update
    BEFORE UPDATE ON audit_log
    BEGIN
      SELECT RAISE(ABORT, 'audit_log is append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS audit_log_no_delete
    BEFORE DELETE ON audit_log
    BEGIN
      SELECT RAISE(ABORT, 'audit_log is append-only');
    END;

    -- Intake artifacts (content index)
    CREATE TABLE IF NOT EXISTS claim_artifacts (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      claim_id TEXT NOT NULL,
      file_type TEXT,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_claim_artifacts_claim_id ON claim_artifacts(claim_id);

    -- Policy corpus
    CREATE TABLE IF NOT EXISTS policies (
      policy_id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      coverage_type TEXT,
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE VIRTUAL TABLE IF NOT EXISTS policies_fts USING fts5(
      policy_id UNINDEXED,
      coverage_type,
      content
    );
  `);
}

/**
 * Whether a named index exists.
 */
export function hasIndex(database: Database.Database, indexName: string): boolean {
  const row = database
    .prepare<[string], { found: number }>(
      "SELECT 1 AS found FROM sqlite_master WHERE type = 'index' AND name = ? LIMIT 1"
    )
    .get(indexName);
  return row !== undefined;
}

/**
 * Field mapping from entity property to database column.
 */
export interface FieldMapping {
  column: string;
  property: string;
}

/**
 * Append-only operations over one table.
 */
export interface SqliteAppendOnlyTable<T extends { id: string }> {
  insert(entity: T): T;
  get(id: string): T | null;
  getAll(): T[];
  /** Rows where an indexed column equals `value`, ordered by `orderBy` columns */
  findAllByIndex(column: string, value: string, orderBy?: string[]): T[];
  /** Parse a stored row */
  parse(data: string): T;
}

/**
 * Create append-only access to a table with `id`, `data` and indexed columns.
 *
 * @param database - Open database
 * @param tableName - The database table name
 * @param fieldMappings - Array of field mappings from entity properties to database columns
 */
export function createSqliteAppendOnlyTable<T extends { id: string }>(
  database: Database.Database,
  tableName: string,
  fieldMappings: FieldMapping[] = []
): SqliteAppendOnlyTable<T> {
  // Extract indexed field value from entity using property name
  const getFieldValue = (entity: T, property: string): string | number | null => {
    const value: unknown = Reflect.get(entity, property);
    if (value === undefined || value === null) return null;
    if (value instanceof Date) return value.toISOString();
    if (typeof value === "number") return value;
    return String(value);
  };

  const indexedColumns = fieldMappings.map((f) => f.column);
  const columns = ["id", "data", ...indexedColumns];
  const insertStatement = database.prepare<unknown[]>(
    `INSERT INTO ${tableName} (${columns.join(", ")}) VALUES (${columns.map(() => "?").join(", ")})`
  );

  const assertIndexedColumn = (column: string) => {
    if (column !== "id" && !indexedColumns.includes(column)) {
      throw new Error(`${tableName}.${column} is not an indexed column`);
    }
  };

  const parse = (data: string): T => {
    const entity: T = JSON.parse(data, dateReviver);
    return entity;
  };

  return {
    insert(entity: T): T {
      insertStatement.run(
        entity.id,
        JSON.stringify(entity),
        ...fieldMappings.map((f) => getFieldValue(entity, f.property))
      );
      return entity;
    },

    get(id: string): T | null {
      const row = database
        .prepare<[string], { data: string }>(`SELECT data FROM ${tableName} WHERE id = ?`)
        .get(id);
      return row ? parse(row.data) : null;
    },

    getAll(): T[] {
      return database
        .prepare<[], { data: string }>(`SELECT data FROM ${tableName} ORDER BY rowid`)
        .all()
        .map((row) => parse(row.data));
    },

    findAllByIndex(column: string, value: string, orderBy: string[] = []): T[] {
      assertIndexedColumn(column);
      orderBy.forEach(assertIndexedColumn);
      const order = [...orderBy, "rowid"].join(", ");

      return database
        .prepare<[string], { data: string }>(
          `SELECT data FROM ${tableName} WHERE ${column} = ? ORDER BY ${order}`
        )
        .all(value)
        .map((row) => parse(row.data));
    },

    parse,
  };
}
