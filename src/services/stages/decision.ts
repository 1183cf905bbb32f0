/**
 * Decision Stage
 *
 * Asks the reasoning engine to adjudicate the claim, commits the terminal
 * claim record and stores a decision report. Reasoning faults never fail
 * the stage: they become an ERROR decision that is committed like any other.
 */

import type {
  DecisionContext,
  DecisionData,
  ValuationContext,
} from "../../types/claim-context.js";
import type { ClaimRecord } from "../../types/claim-record.js";
import type { ObjectStorage, ReasoningEngine } from "../../types/capabilities.js";
import { extendContext, toClaimRecordInput } from "../claim-context.js";
import {
  DECISION_MAX_TOKENS,
  DECISION_TEMPERATURE,
  buildDecisionPrompt,
  fallbackDecision,
  parseDecision,
} from "../decision-prompt.js";
import { CapabilityError, errorMessage } from "../errors.js";
import {
  PipelineStage,
  type StageDependencies,
  type StageOptions,
  type StageOutcome,
} from "./stage.js";

export const DEFAULT_BUCKET_PREFIX = "claims";

export interface DecisionDependencies extends StageDependencies {
  reasoningEngine: ReasoningEngine;
  objectStorage: ObjectStorage;
}

export interface DecisionOptions extends StageOptions {
  bucketPrefix?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Where the decision report for a claim is stored.
 */
export function decisionReportLocation(bucketPrefix: string, claimId: string) {
  return { bucket: `${bucketPrefix}-reports`, key: `${claimId}/final_decision.json` };
}

/**
 * Report document written next to the terminal record.
 */
export function buildDecisionReport(context: DecisionContext, record: ClaimRecord) {
  const { decisionData } = context;
  return {
    claimId: context.claimId,
    version: record.version,
    timestamp: record.timestamp.toISOString(),
    decision: decisionData.decision,
    reasoning: decisionData.reasoning,
    confidence: decisionData.confidence,
    estimatedPayout: decisionData.estimatedPayout,
    deductibleApplies: decisionData.deductibleApplies,
    requiredActions: decisionData.requiredActions,
    riskFactors: decisionData.riskFactors,
    policyData: context.policyData,
    entities: context.entities,
    damageAssessment: context.damageAssessment,
    valuation: context.valuation,
  };
}

export class DecisionStage extends PipelineStage<ValuationContext, DecisionContext> {
  readonly name = "decision" as const;
  readonly action = "make_decision";

  private reasoningEngine: ReasoningEngine;
  private objectStorage: ObjectStorage;
  private bucketPrefix: string;
  private maxTokens: number;
  private temperature: number;

  constructor(deps: DecisionDependencies, options: DecisionOptions = {}) {
    super(deps, options);
    this.reasoningEngine = deps.reasoningEngine;
    this.objectStorage = deps.objectStorage;
    this.bucketPrefix = options.bucketPrefix ?? DEFAULT_BUCKET_PREFIX;
    this.maxTokens = options.maxTokens ?? DECISION_MAX_TOKENS;
    this.temperature = options.temperature ?? DECISION_TEMPERATURE;
  }

  protected async run(context: ValuationContext): Promise<StageOutcome<DecisionContext>> {
    const { claimId } = context;
    console.log(`[Decision] Making decision for claim ${claimId}`);

    const decisionData = await this.decide(buildDecisionPrompt(context), claimId);
    console.log(`[Decision] ${claimId}: ${decisionData.decision}`);

    const decided = extendContext(context, { decisionData });

    let record: ClaimRecord;
    try {
      record = await this.claimRecords.append(toClaimRecordInput(decided, decisionData.decision));
    } catch (err) {
      throw new CapabilityError("claim-store", errorMessage(err), { cause: err });
    }

    const report = decisionReportLocation(this.bucketPrefix, claimId);
    let reportStored = false;
    let reportError: string | undefined;
    try {
      const body = JSON.stringify(buildDecisionReport(decided, record), null, 2);
      await this.call("object-storage", () =>
        this.objectStorage.put(report.bucket, report.key, body, "application/json")
      );
      reportStored = true;
      console.log(`[Decision] Saved decision report to ${report.bucket}/${report.key}`);
    } catch (err) {
      reportError = errorMessage(err);
      console.error(`[Decision] Could not store report for ${claimId}: ${reportError}`);
    }

    return {
      status: "success",
      context: decided,
      record,
      details: {
        decision: decisionData.decision,
        confidence: decisionData.confidence,
        version: record.version,
        reportBucket: report.bucket,
        reportKey: report.key,
        reportStored,
        ...(reportError !== undefined ? { reportError } : {}),
      },
    };
  }

  private async decide(prompt: string, claimId: string): Promise<DecisionData> {
    let raw: string;
    try {
      raw = await this.call("reasoning-engine", (signal) =>
        this.reasoningEngine.invoke(prompt, {
          maxTokens: this.maxTokens,
          temperature: this.temperature,
          signal,
        })
      );
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[Decision] Reasoning engine failed for ${claimId}: ${message}`);
      return fallbackDecision(`Failed to process claim: ${message}`);
    }

    const parsed = parseDecision(raw);
    if (!parsed.ok) {
      console.error(`[Decision] Unusable response for ${claimId}: ${parsed.error}`);
      return fallbackDecision(`Failed to parse reasoning engine response: ${parsed.error}`);
    }
    return parsed.decision;
  }
}
