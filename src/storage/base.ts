/**
 * Storage Base
 *
 * Core storage utilities - separated to avoid circular imports.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { DuplicateEntityError } from "./repository.js";

/**
 * Storage locations under one data directory.
 */
export interface StoragePaths {
  root: string;
  claimRecords: string;
  auditLog: string;
  artifacts: string;
  objects: string;
  database: string;
}

/**
 * Resolve storage locations for a data directory (relative to cwd).
 */
export function resolveStoragePaths(dataDir: string): StoragePaths {
  const root = path.resolve(process.cwd(), dataDir);
  return {
    root,
    claimRecords: path.join(root, "claim-records"),
    auditLog: path.join(root, "audit-log"),
    artifacts: path.join(root, "artifacts"),
    objects: path.join(root, "objects"),
    database: path.join(root, "claims.db"),
  };
}

/**
 * Ensure all storage directories exist.
 */
export function ensureStorageDirs(paths: StoragePaths): void {
  for (const dir of [paths.claimRecords, paths.auditLog, paths.artifacts, paths.objects]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Append-only storage operations for any entity type.
 */
export interface AppendOnlyStorage<T extends { id: string }> {
  /** Write a new entity; rejects with DuplicateEntityError if the id exists */
  insert(entity: T): Promise<T>;

  /** Get an entity by ID */
  get(id: string): Promise<T | null>;

  /** Get all entities (unordered) */
  getAll(): Promise<T[]>;

  /** Find entities matching a predicate */
  find(predicate: (entity: T) => boolean): Promise<T[]>;
}

const ENTITY_SUFFIX = ".json";
const PARTIAL_SUFFIX = ".partial";

/**
 * Create append-only JSON file storage for a directory.
 *
 * Each entity is written to a temp file and hard-linked into place, so the
 * final name appears atomically with its full contents and an existing name
 * is never replaced.
 */
export function createAppendOnlyStorage<T extends { id: string }>(
  dir: string,
  reviver?: (key: string, value: unknown) => unknown
): AppendOnlyStorage<T> {
  fs.mkdirSync(dir, { recursive: true });

  const getFilePath = (id: string) => path.join(dir, `${encodeURIComponent(id)}${ENTITY_SUFFIX}`);

  const parse = (json: string): T => {
    const entity: T = JSON.parse(json, reviver);
    return entity;
  };

  return {
    async insert(entity: T): Promise<T> {
      const filePath = getFilePath(entity.id);
      const tempPath = path.join(dir, `.${randomUUID()}${PARTIAL_SUFFIX}`);
      await fs.promises.writeFile(tempPath, JSON.stringify(entity, null, 2), "utf-8");
      try {
        await fs.promises.link(tempPath, filePath);
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code === "EEXIST") {
          throw new DuplicateEntityError(entity.id);
        }
        throw err;
      } finally {
        await fs.promises.rm(tempPath, { force: true });
      }
      return entity;
    },

    async get(id: string): Promise<T | null> {
      try {
        const json = await fs.promises.readFile(getFilePath(id), "utf-8");
        return parse(json);
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code === "ENOENT") {
          return null;
        }
        throw err;
      }
    },

    async getAll(): Promise<T[]> {
      try {
        const files = await fs.promises.readdir(dir);
        const entities: T[] = [];

        for (const file of files) {
          if (file.endsWith(ENTITY_SUFFIX)) {
            const json = await fs.promises.readFile(path.join(dir, file), "utf-8");
            entities.push(parse(json));
          }
        }

        return entities;
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code === "ENOENT") {
          return [];
        }
        throw err;
      }
    },

    async find(predicate: (entity: T) => boolean): Promise<T[]> {
      const all = await this.getAll();
      return all.filter(predicate);
    },
  };
}

/**
 * Generate a new UUID.
 */
export function generateId(): string {
  return randomUUID();
}

let lastIssuedMs = 0;

/**
 * Current time, strictly increasing across calls within this process.
 * Two audit entries written back to back never share a timestamp.
 */
export function monotonicNow(): Date {
  const now = Date.now();
  lastIssuedMs = now > lastIssuedMs ? now : lastIssuedMs + 1;
  return new Date(lastIssuedMs);
}

/** Entity properties written as ISO strings and read back as Dates */
const DATE_KEYS: ReadonlySet<string> = new Set(["timestamp", "indexedAt"]);

const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;

/**
 * JSON reviver that restores the Date-typed entity fields.
 * Other strings, including free text that happens to start with a
 * datetime, are left as written.
 */
export function dateReviver(key: string, value: unknown): unknown {
  if (typeof value === "string" && DATE_KEYS.has(key) && ISO_DATETIME.test(value)) {
    return new Date(value);
  }
  return value;
}
