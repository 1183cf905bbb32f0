/**
 * Damage Assessment Stage
 *
 * Label heuristic standing in for a damage model. The assessor is a plain
 * function so a real model can be dropped in without touching the stage.
 */

import type {
  DamageAssessment,
  DamageContext,
  ExtractedData,
  PolicyContext,
} from "../../types/claim-context.js";
import { extendContext } from "../claim-context.js";
import {
  PipelineStage,
  type StageDependencies,
  type StageOptions,
  type StageOutcome,
} from "./stage.js";

export type DamageAssessor = (extractedData: ExtractedData) => DamageAssessment;

/** Image labels that count as evidence of vehicle damage */
export const DAMAGE_LABELS: ReadonlySet<string> = new Set([
  "car",
  "vehicle",
  "damage",
  "accident",
  "crash",
]);

export const assessDamage: DamageAssessor = (extractedData) => {
  const labels = extractedData.fileType === "image" ? extractedData.labels : [];
  const damageDetected = labels.some((label) => DAMAGE_LABELS.has(label.name.toLowerCase()));

  return {
    damageDetected,
    severity: damageDetected ? "MODERATE" : "NONE",
    estimatedRepairCost: damageDetected ? 2500.0 : 0.0,
    damageLocations: damageDetected ? ["Front bumper", "Hood"] : [],
    confidence: 0.75,
  };
};

export class DamageStage extends PipelineStage<PolicyContext, DamageContext> {
  readonly name = "damage" as const;
  readonly action = "assess_damage";

  private assessor: DamageAssessor;

  constructor(deps: StageDependencies, options: StageOptions = {}, assessor: DamageAssessor = assessDamage) {
    super(deps, options);
    this.assessor = assessor;
  }

  protected async run(context: PolicyContext): Promise<StageOutcome<DamageContext>> {
    const damageAssessment = this.assessor(context.extractedData);

    return {
      status: "success",
      context: extendContext(context, { damageAssessment }),
      details: { ...damageAssessment },
    };
  }
}
