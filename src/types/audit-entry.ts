/**
 * Audit entry types.
 * One immutable entry per stage attempt, including failed attempts.
 */

import type { StageName } from "./claim-context.js";

export type AuditStatus = "success" | "error" | "not_found";

export const AUDIT_STATUSES: readonly AuditStatus[] = ["success", "error", "not_found"] as const;

export interface AuditEntry {
  /** Unique per entry */
  id: string;

  /** `<claimId>-<stage>`; repeats across retries of the same stage */
  logId: string;

  claimId: string;

  /** Stage that acted */
  agent: StageName;

  /** What the stage did (e.g. "extract_data", "cancelled") */
  action: string;

  status: AuditStatus;

  /** Stage-specific payload */
  details: Record<string, unknown>;

  timestamp: Date;
}

export type NewAuditEntry = Omit<AuditEntry, "id" | "logId" | "timestamp">;

/**
 * Build the log id for a stage attempt.
 */
export function auditLogId(claimId: string, agent: StageName): string {
  return `${claimId}-${agent}`;
}
