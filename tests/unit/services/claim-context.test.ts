import { describe, expect, it } from "vitest";
import { extendContext, toClaimRecordInput } from "../../../src/services/claim-context.js";
import { emptyEntities } from "../../../src/services/entity-extractor.js";
import { ContextConflictError } from "../../../src/services/errors.js";

describe("extendContext", () => {
  it("returns a new frozen context and leaves the input untouched", () => {
    const base = { claimId: "CLAIM-1" };
    const extended = extendContext(base, { entities: emptyEntities() });

    expect(extended).toEqual({ claimId: "CLAIM-1", entities: emptyEntities() });
    expect(Object.isFrozen(extended)).toBe(true);
    expect(base).toEqual({ claimId: "CLAIM-1" });
  });

  it("rejects a field an earlier stage already set", () => {
    // Typed loosely so the conflict reaches the run-time check
    const owned: object = { claimId: "CLAIM-1", entities: emptyEntities() };

    expect(() => extendContext(owned, { entities: emptyEntities() })).toThrow(ContextConflictError);
    expect(() => extendContext(owned, { entities: emptyEntities(), valuation: null })).toThrow(
      "Context fields already set: entities"
    );
  });
});

describe("toClaimRecordInput", () => {
  it("fills parts a run has not reached with null", () => {
    expect(toClaimRecordInput({ claimId: "CLAIM-1", entities: emptyEntities() }, "intake")).toEqual({
      claimId: "CLAIM-1",
      status: "intake",
      decisionData: null,
      policyData: null,
      extractedData: null,
      entities: emptyEntities(),
      damageAssessment: null,
      valuation: null,
    });
  });
});
