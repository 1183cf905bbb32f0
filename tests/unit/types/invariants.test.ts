/**
 * Property-based tests for type invariants.
 *
 * Ordered from least obvious to most obvious invariants.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { isTerminalRecord } from "../../../src/types/index.js";
import type { AuditStatus, ClaimRecord } from "../../../src/types/index.js";
import { nextState, isTerminalState, type PipelineState } from "../../../src/services/pipeline.js";
import { latestPerClaim } from "../../../src/storage/claim-records.js";
import { deriveClaimStatus } from "../../../src/services/claim-queries.js";
import { parseDecision } from "../../../src/services/decision-prompt.js";
import {
  arbAuditTrail,
  arbClaimId,
  arbClaimRecord,
  arbDecisionReply,
  arbStatusWalk,
} from "./generators.js";

// =============================================================================
// Pipeline state machine
// =============================================================================

describe("Pipeline state machine invariants", () => {
  function walk(statuses: readonly AuditStatus[]): PipelineState[] {
    const states: PipelineState[] = ["INTAKE"];
    let state: PipelineState = "INTAKE";
    for (const status of statuses) {
      state = nextState(state, status);
      states.push(state);
    }
    return states;
  }

  it("decides only when five stages pass without an error", () => {
    fc.assert(
      fc.property(arbStatusWalk, (statuses) => {
        const final = walk(statuses)[statuses.length];
        const firstFive = statuses.slice(0, 5);
        const decided = firstFive.length === 5 && !firstFive.includes("error");
        expect(final === "TERMINAL_DECIDED").toBe(decided);
      })
    );
  });

  it("never leaves a terminal state", () => {
    fc.assert(
      fc.property(arbStatusWalk, (statuses) => {
        const states = walk(statuses);
        const firstTerminal = states.findIndex(isTerminalState);
        if (firstTerminal === -1) return;
        for (const state of states.slice(firstTerminal)) {
          expect(state).toBe(states[firstTerminal]);
        }
      })
    );
  });

  it("reaches a terminal state within five steps", () => {
    fc.assert(
      fc.property(arbStatusWalk, (statuses) => {
        const states = walk(statuses);
        if (statuses.length >= 5) {
          expect(isTerminalState(states[5] ?? "INTAKE")).toBe(true);
        }
      })
    );
  });
});

// =============================================================================
// Claim records
// =============================================================================

describe("Claim record invariants", () => {
  it("listing keeps exactly the highest version of each claim", () => {
    fc.assert(
      fc.property(fc.array(arbClaimRecord, { maxLength: 30 }), fc.nat({ max: 40 }), (records, limit) => {
        const latest = latestPerClaim(records, limit);
        const claimIds = new Set(records.map((r) => r.claimId));

        expect(latest.length).toBe(Math.min(limit, claimIds.size));
        expect(new Set(latest.map((r) => r.claimId)).size).toBe(latest.length);
        for (const record of latest) {
          const maxVersion = Math.max(
            ...records.filter((r) => r.claimId === record.claimId).map((r) => r.version)
          );
          expect(record.version).toBe(maxVersion);
        }
      })
    );
  });

  it("listing is ordered newest first", () => {
    fc.assert(
      fc.property(fc.array(arbClaimRecord, { maxLength: 30 }), (records) => {
        const latest = latestPerClaim(records, records.length);
        for (let i = 1; i < latest.length; i++) {
          const previous: ClaimRecord | undefined = latest[i - 1];
          const current: ClaimRecord | undefined = latest[i];
          if (!previous || !current) continue;
          expect(previous.timestamp.getTime()).toBeGreaterThanOrEqual(current.timestamp.getTime());
        }
      })
    );
  });

  it("a record is terminal exactly when it carries its decision as status", () => {
    fc.assert(
      fc.property(arbClaimRecord, (record) => {
        expect(isTerminalRecord(record)).toBe(record.decisionData !== null);
      })
    );
  });
});

// =============================================================================
// Claim status
// =============================================================================

describe("Claim status invariants", () => {
  it("a record without failures is decided or processing", () => {
    fc.assert(
      fc.property(arbClaimRecord, (record) => {
        expect(deriveClaimStatus(record, [])).toBe(isTerminalRecord(record) ? "decided" : "processing");
      })
    );
  });

  it("a trail with an error and no record is failed", () => {
    fc.assert(
      fc.property(arbClaimId.chain((id) => arbAuditTrail(id)), (trail) => {
        const status = deriveClaimStatus(null, trail);
        if (trail.length === 0) expect(status).toBe("unknown");
        else if (trail.some((e) => e.status === "error")) expect(status).toBe("failed");
        else expect(status).toBe("processing");
      })
    );
  });
});

// =============================================================================
// Decision replies
// =============================================================================

describe("Decision reply invariants", () => {
  it("every well-formed reply parses, fenced or not", () => {
    fc.assert(
      fc.property(arbDecisionReply, fc.boolean(), (reply, fenced) => {
        const body = JSON.stringify(reply);
        const parsed = parseDecision(fenced ? "```json\n" + body + "\n```" : body);

        expect(parsed.ok).toBe(true);
        if (!parsed.ok) return;
        expect(parsed.decision.decision).toBe(reply.decision);
        expect(parsed.decision.estimatedPayout).toBe(reply.estimated_payout);
        expect(parsed.decision.requiredActions).toEqual(reply.required_actions);
      })
    );
  });

  it("a reply missing any field is rejected", () => {
    const fields = [
      "decision",
      "reasoning",
      "confidence",
      "estimated_payout",
      "deductible_applies",
      "required_actions",
      "risk_factors",
    ] as const;

    fc.assert(
      fc.property(arbDecisionReply, fc.constantFrom(...fields), (reply, missing) => {
        const partial: Record<string, unknown> = { ...reply };
        delete partial[missing];
        const parsed = parseDecision(JSON.stringify(partial));

        expect(parsed.ok).toBe(false);
        if (!parsed.ok) expect(parsed.error).toContain(`${missing}: Required`);
      })
    );
  });
});
