/**
 * Policy Resolution Stage
 *
 * Looks up the claim's policy in the policy corpus. A miss is a
 * `not_found` result that flows on to the decision; only a lookup fault
 * halts the pipeline.
 */

import type { IntakeContext, PolicyContext, PolicyData } from "../../types/claim-context.js";
import type { PolicyDocument, PolicySearch } from "../../types/capabilities.js";
import { extendContext } from "../claim-context.js";
import {
  PipelineStage,
  type StageDependencies,
  type StageOptions,
  type StageOutcome,
} from "./stage.js";

/** Policy queried when intake found no policy number */
export const DEFAULT_POLICY_NUMBER = "AUTO-001";

export interface PolicyDependencies extends StageDependencies {
  policySearch: PolicySearch;
}

export interface PolicyOptions extends StageOptions {
  defaultPolicyNumber?: string;
}

function toPolicyData(document: PolicyDocument | undefined): PolicyData {
  if (!document) {
    return { found: false, reason: "Policy not found" };
  }
  return {
    found: true,
    policyId: document.policyId,
    coverageType: document.coverageType,
    deductible: document.deductible,
    coverageLimit: document.coverageLimit,
    filingDeadlineDays: document.filingDeadlineDays,
    content: document.content,
  };
}

export class PolicyStage extends PipelineStage<IntakeContext, PolicyContext> {
  readonly name = "policy" as const;
  readonly action = "query_policy";

  private policySearch: PolicySearch;
  private defaultPolicyNumber: string;

  constructor(deps: PolicyDependencies, options: PolicyOptions = {}) {
    super(deps, options);
    this.policySearch = deps.policySearch;
    this.defaultPolicyNumber = options.defaultPolicyNumber ?? DEFAULT_POLICY_NUMBER;
  }

  protected async run(context: IntakeContext): Promise<StageOutcome<PolicyContext>> {
    const usedDefault = context.entities.policyNumber === null;
    const policyNumber = context.entities.policyNumber ?? this.defaultPolicyNumber;
    console.log(`[Policy] Querying policy ${policyNumber} for claim ${context.claimId}`);

    const [match] = await this.call("policy-search", () =>
      this.policySearch.hybridSearch(policyNumber, 1)
    );
    const policyData = toPolicyData(match);

    return {
      status: policyData.found ? "success" : "not_found",
      context: extendContext(context, { policyData }),
      details: { policyNumber, found: policyData.found, usedDefault },
    };
  }

  protected failureDetails(context: IntakeContext): Record<string, unknown> {
    return { policyNumber: context.entities.policyNumber ?? this.defaultPolicyNumber };
  }
}
