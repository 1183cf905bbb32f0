/**
 * fast-check Arbitraries for domain types.
 *
 * These generators produce valid instances of the claim model: decision
 * replies as the reasoning engine would send them, versioned claim records
 * and audit entries.
 */

import fc from "fast-check";
import type {
  AuditEntry,
  AuditStatus,
  ClaimEntities,
  ClaimRecord,
  DecisionData,
  DecisionValue,
  ReasonedDecision,
  StageName,
} from "../../../src/types/index.js";
import { AUDIT_STATUSES, DECISION_VALUES, STAGE_ORDER } from "../../../src/types/index.js";

// =============================================================================
// Primitive Generators
// =============================================================================

/** Claim id in the CLAIM-YYYYMMDDHHmmss shape */
export const arbClaimId = fc
  .integer({ min: 0, max: 99_999_999_999_999 })
  .map((n) => `CLAIM-${String(n).padStart(14, "0")}`);

/** Date within a reasonable range for claim activity */
export const arbDate = fc.date({
  min: new Date("2020-01-01"),
  max: new Date("2030-01-01"),
  noInvalidDate: true,
});

/** Fraction in [0, 1] */
export const arbConfidence = fc.double({ min: 0, max: 1, noNaN: true });

/** Non-negative amount */
export const arbAmount = fc.double({ min: 0, max: 1_000_000, noNaN: true });

// =============================================================================
// Domain Enum Generators
// =============================================================================

export const arbStageName: fc.Arbitrary<StageName> = fc.constantFrom(...STAGE_ORDER);

export const arbAuditStatus: fc.Arbitrary<AuditStatus> = fc.constantFrom(...AUDIT_STATUSES);

export const arbDecisionValue: fc.Arbitrary<DecisionValue> = fc.constantFrom(...DECISION_VALUES);

export const arbReasonedDecision: fc.Arbitrary<ReasonedDecision> = fc.constantFrom(
  "APPROVED",
  "DENIED",
  "PENDING"
);

// =============================================================================
// Entity Generators
// =============================================================================

export const arbEntities: fc.Arbitrary<ClaimEntities> = fc.record({
  policyNumber: fc.option(fc.nat({ max: 999 }).map((n) => `AUTO-${String(n).padStart(3, "0")}`), { nil: null }),
  claimantName: fc.constant(null),
  incidentDate: fc.option(arbDate.map((d) => d.toISOString().slice(0, 10)), { nil: null }),
  incidentLocation: fc.constant(null),
  vehicleInfo: fc.constant(null),
});

/**
 * Reasoning engine reply in the snake_case wire shape.
 */
export const arbDecisionReply = fc.record({
  decision: arbReasonedDecision,
  reasoning: fc.string({ maxLength: 200 }),
  confidence: arbConfidence,
  estimated_payout: arbAmount,
  deductible_applies: fc.boolean(),
  required_actions: fc.array(fc.string({ maxLength: 40 }), { maxLength: 5 }),
  risk_factors: fc.array(fc.string({ maxLength: 40 }), { maxLength: 5 }),
});

export const arbDecisionData: fc.Arbitrary<DecisionData> = arbDecisionReply.map((reply) => ({
  decision: reply.decision,
  reasoning: reply.reasoning,
  confidence: reply.confidence,
  estimatedPayout: reply.estimated_payout,
  deductibleApplies: reply.deductible_applies,
  requiredActions: reply.required_actions,
  riskFactors: reply.risk_factors,
}));

/**
 * Claim record as a store would return it. Terminal records carry a
 * decision whose value is also their status.
 */
export const arbClaimRecord: fc.Arbitrary<ClaimRecord> = fc
  .record({
    claimId: arbClaimId,
    version: fc.integer({ min: 1, max: 20 }),
    checkpoint: fc.option(arbStageName, { nil: null }),
    decisionData: arbDecisionData,
    entities: arbEntities,
    timestamp: arbDate,
  })
  .map(({ claimId, version, checkpoint, decisionData, entities, timestamp }) => ({
    id: `${claimId}#${version}`,
    claimId,
    version,
    status: checkpoint ?? decisionData.decision,
    decisionData: checkpoint ? null : decisionData,
    policyData: null,
    extractedData: null,
    entities,
    damageAssessment: null,
    valuation: null,
    timestamp,
  }));

export const arbAuditEntry = (claimId: string): fc.Arbitrary<AuditEntry> =>
  fc
    .record({
      id: fc.uuid(),
      agent: arbStageName,
      status: arbAuditStatus,
      timestamp: arbDate,
    })
    .map(({ id, agent, status, timestamp }) => ({
      id,
      logId: `${claimId}-${agent}`,
      claimId,
      agent,
      action: "test_action",
      status,
      details: {},
      timestamp,
    }));

/** Audit trail for one claim, in chronological order */
export const arbAuditTrail = (claimId: string): fc.Arbitrary<AuditEntry[]> =>
  fc
    .array(arbAuditEntry(claimId), { maxLength: 12 })
    .map((entries) => [...entries].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime()));

// =============================================================================
// Pipeline Walk Generators
// =============================================================================

/** Sequence of stage statuses, longer than a full run */
export const arbStatusWalk: fc.Arbitrary<AuditStatus[]> = fc.array(arbAuditStatus, {
  minLength: 0,
  maxLength: 10,
});
