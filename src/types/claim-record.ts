/**
 * Claim record types.
 * Persisted, versioned snapshots of claim state.
 */

import type {
  ClaimEntities,
  DamageAssessment,
  DecisionData,
  DecisionValue,
  ExtractedData,
  PolicyData,
  StageName,
  Valuation,
} from "./claim-context.js";

/**
 * Status of a record: the stage that checkpointed it, or the terminal
 * decision value.
 */
export type ClaimRecordStatus = StageName | DecisionValue;

/**
 * One immutable snapshot of a claim. Records are keyed by
 * `(claimId, version)`; the current state is the highest version.
 */
export interface ClaimRecord {
  /** Storage key, `<claimId>#<version>` */
  id: string;

  claimId: string;

  /** Per-claim sequence number starting at 1 */
  version: number;

  status: ClaimRecordStatus;

  decisionData: DecisionData | null;
  policyData: PolicyData | null;
  extractedData: ExtractedData | null;
  entities: ClaimEntities | null;
  damageAssessment: DamageAssessment | null;
  valuation: Valuation | null;

  /** Commit time */
  timestamp: Date;
}

/**
 * Input for committing a new version. Id, version and timestamp are
 * assigned by the store.
 */
export type NewClaimRecord = Omit<ClaimRecord, "id" | "version" | "timestamp">;

/**
 * Build the storage key for a record.
 */
export function claimRecordId(claimId: string, version: number): string {
  return `${claimId}#${version}`;
}

/**
 * Whether a record carries a terminal decision.
 */
export function isTerminalRecord(record: ClaimRecord): boolean {
  return record.decisionData !== null && record.status === record.decisionData.decision;
}
