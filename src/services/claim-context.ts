/**
 * Claim context helpers.
 */

import type { PartialClaimContext } from "../types/claim-context.js";
import type { ClaimRecordStatus, NewClaimRecord } from "../types/claim-record.js";
import { ContextConflictError } from "./errors.js";

/**
 * Extend a context with fields owned by the calling stage.
 *
 * The result is a new frozen object; the input is untouched. Re-setting a
 * field that is already present is a compile error where the types show it
 * and a ContextConflictError at run time.
 */
export function extendContext<C extends object, P extends object>(
  context: C,
  patch: P & { [K in keyof C & keyof P]?: never }
): Readonly<C & P> {
  const conflicts = Object.keys(patch).filter((key) => Object.hasOwn(context, key));
  if (conflicts.length > 0) {
    throw new ContextConflictError(conflicts);
  }
  return Object.freeze({ ...context, ...patch });
}

/**
 * Snapshot of a context as claim record input.
 */
export function toClaimRecordInput(
  context: PartialClaimContext,
  status: ClaimRecordStatus
): NewClaimRecord {
  return {
    claimId: context.claimId,
    status,
    decisionData: context.decisionData ?? null,
    policyData: context.policyData ?? null,
    extractedData: context.extractedData ?? null,
    entities: context.entities ?? null,
    damageAssessment: context.damageAssessment ?? null,
    valuation: context.valuation ?? null,
  };
}
