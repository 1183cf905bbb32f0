/**
 * Claim Queries
 *
 * Read side for operators and the API: claim status, recent claims and the
 * audit trail of a claim.
 */

import type { AuditEntry } from "../types/audit-entry.js";
import type { DecisionData, StageName } from "../types/claim-context.js";
import { isTerminalRecord, type ClaimRecord } from "../types/claim-record.js";
import {
  IndexUnavailableError,
  type AuditLogRepository,
  type ClaimRecordRepository,
} from "../storage/repository.js";

/**
 * - decided: the latest record carries a decision and no failure came after it
 * - failed: an error entry is newer than the latest record (or there is none)
 * - processing: activity without a failure or a decision yet
 * - unknown: nothing recorded for the claim
 */
export type ClaimStatus = "decided" | "failed" | "processing" | "unknown";

export interface ClaimFailure {
  stage: StageName;
  action: string;
  error: string | null;
  timestamp: Date;
}

export interface ClaimStatusView {
  claimId: string;
  status: ClaimStatus;
  /** Latest record: the terminal decision or the latest checkpoint */
  latestRecord: ClaimRecord | null;
  decision: DecisionData | null;
  failure: ClaimFailure | null;
  /** Stage of the most recent audit entry */
  lastStage: StageName | null;
  auditEntries: number;
}

function lastFailure(trail: AuditEntry[]): AuditEntry | null {
  for (let i = trail.length - 1; i >= 0; i--) {
    const entry = trail[i];
    if (entry?.status === "error") return entry;
  }
  return null;
}

function toFailure(entry: AuditEntry): ClaimFailure {
  const error = entry.details["error"];
  return {
    stage: entry.agent,
    action: entry.action,
    error: typeof error === "string" ? error : null,
    timestamp: entry.timestamp,
  };
}

/**
 * Status from the latest record and the audit trail of one claim.
 */
export function deriveClaimStatus(
  latestRecord: ClaimRecord | null,
  trail: AuditEntry[]
): ClaimStatus {
  if (!latestRecord && trail.length === 0) return "unknown";

  const failure = lastFailure(trail);
  if (failure && (!latestRecord || failure.timestamp.getTime() > latestRecord.timestamp.getTime())) {
    return "failed";
  }
  if (latestRecord && isTerminalRecord(latestRecord)) return "decided";
  return "processing";
}

export class ClaimQueries {
  private claimRecords: ClaimRecordRepository;
  private auditLog: AuditLogRepository;

  constructor(claimRecords: ClaimRecordRepository, auditLog: AuditLogRepository) {
    this.claimRecords = claimRecords;
    this.auditLog = auditLog;
  }

  /**
   * Audit entries for a claim, oldest first. Falls back to a full scan when
   * the claim index is unavailable.
   */
  async getAuditTrail(claimId: string): Promise<AuditEntry[]> {
    try {
      return await this.auditLog.findByClaim(claimId);
    } catch (err) {
      if (!(err instanceof IndexUnavailableError)) throw err;
      console.log(`[ClaimQueries] ${err.message}, scanning audit log for ${claimId}`);
      return this.auditLog.scan((entry) => entry.claimId === claimId);
    }
  }

  async getClaimStatus(claimId: string): Promise<ClaimStatusView> {
    const [latestRecord, trail] = await Promise.all([
      this.claimRecords.getLatest(claimId),
      this.getAuditTrail(claimId),
    ]);

    const status = deriveClaimStatus(latestRecord, trail);
    const failure = status === "failed" ? lastFailure(trail) : null;

    return {
      claimId,
      status,
      latestRecord,
      decision: status === "decided" ? (latestRecord?.decisionData ?? null) : null,
      failure: failure ? toFailure(failure) : null,
      lastStage: trail[trail.length - 1]?.agent ?? null,
      auditEntries: trail.length,
    };
  }

  /**
   * Latest record per claim, newest first.
   */
  async listClaims(limit = 10): Promise<ClaimRecord[]> {
    return this.claimRecords.listLatest(limit);
  }
}
