import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  createJsonAuditLogRepository,
  createSqliteAuditLogRepository,
} from "../../../src/storage/audit-log.js";
import { IndexUnavailableError, type AuditLogRepository } from "../../../src/storage/repository.js";
import { AUDIT_CLAIM_INDEX, hasIndex, openDatabase } from "../../../src/storage/sqlite.js";
import type { NewAuditEntry } from "../../../src/types/index.js";

function entry(claimId: string, agent: NewAuditEntry["agent"], status: NewAuditEntry["status"] = "success"): NewAuditEntry {
  return { claimId, agent, action: `${agent}_action`, status, details: { note: `${agent} ran` } };
}

let tempDir: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "audit-log-"));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

const backends: Array<[string, () => AuditLogRepository]> = [
  ["json", () => createJsonAuditLogRepository(path.join(tempDir, "audit-log"))],
  ["sqlite", () => createSqliteAuditLogRepository(openDatabase(":memory:"))],
];

describe.each(backends)("audit log (%s)", (_name, createRepository) => {
  it("assigns ids, log ids and strictly increasing timestamps", async () => {
    const repo = createRepository();

    const first = await repo.append(entry("CLAIM-A", "intake"));
    const second = await repo.append(entry("CLAIM-A", "intake", "error"));

    expect(first.id).not.toBe(second.id);
    expect(first.logId).toBe("CLAIM-A-intake");
    expect(second.logId).toBe("CLAIM-A-intake");
    expect(second.timestamp.getTime()).toBeGreaterThan(first.timestamp.getTime());
  });

  it("returns a claim's entries in chronological order", async () => {
    const repo = createRepository();
    await repo.append(entry("CLAIM-A", "intake"));
    await repo.append(entry("CLAIM-B", "intake"));
    await repo.append(entry("CLAIM-A", "policy", "not_found"));
    await repo.append(entry("CLAIM-A", "damage"));

    const trail = await repo.findByClaim("CLAIM-A");

    expect(trail.map((e) => [e.agent, e.status])).toEqual([
      ["intake", "success"],
      ["policy", "not_found"],
      ["damage", "success"],
    ]);
    expect(trail[0]?.details).toEqual({ note: "intake ran" });
    expect(trail[0]?.timestamp).toBeInstanceOf(Date);
    expect(await repo.findByClaim("CLAIM-Z")).toEqual([]);
  });

  it("keeps datetime-like detail strings as text", async () => {
    const repo = createRepository();
    await repo.append({
      ...entry("CLAIM-A", "intake"),
      details: { textPreview: "2025-10-22T14:03:09 telematics log" },
    });

    const [stored] = await repo.findByClaim("CLAIM-A");
    expect(stored?.details).toEqual({ textPreview: "2025-10-22T14:03:09 telematics log" });
    expect(stored?.timestamp).toBeInstanceOf(Date);
  });

  it("scans the whole log chronologically", async () => {
    const repo = createRepository();
    await repo.append(entry("CLAIM-B", "intake", "error"));
    await repo.append(entry("CLAIM-A", "intake"));
    await repo.append(entry("CLAIM-A", "policy", "error"));

    const errors = await repo.scan((e) => e.status === "error");

    expect(errors.map((e) => e.logId)).toEqual(["CLAIM-B-intake", "CLAIM-A-policy"]);
  });
});

describe("audit log (sqlite) claim index", () => {
  it("refuses indexed lookups when the index is gone", async () => {
    const database = openDatabase(":memory:");
    const repo = createSqliteAuditLogRepository(database);
    await repo.append(entry("CLAIM-A", "intake"));

    expect(hasIndex(database, AUDIT_CLAIM_INDEX)).toBe(true);
    database.exec(`DROP INDEX ${AUDIT_CLAIM_INDEX}`);
    expect(hasIndex(database, AUDIT_CLAIM_INDEX)).toBe(false);

    await expect(repo.findByClaim("CLAIM-A")).rejects.toThrow(IndexUnavailableError);
    expect(await repo.scan((e) => e.claimId === "CLAIM-A")).toHaveLength(1);
  });

  it("rejects updates and deletes at the database level", async () => {
    const database = openDatabase(":memory:");
    const repo = createSqliteAuditLogRepository(database);
    await repo.append(entry("CLAIM-A", "intake"));

    expect(() => database.prepare("UPDATE audit_log SET status = 'error'").run()).toThrow(
      "audit_log is append-only"
    );
    expect(() => database.prepare("DELETE FROM audit_log").run()).toThrow("audit_log is append-only");
  });
});
