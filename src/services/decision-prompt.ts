/**
 * Decision prompt and response parsing.
 *
 * The reasoning engine is asked for a bare JSON object. Its reply is parsed
 * strictly; the only leniency is one Markdown code fence around the whole
 * reply.
 */

import { z } from "zod";
import type { DecisionData, ValuationContext } from "../types/claim-context.js";
import { errorMessage } from "./errors.js";

/** Sampling parameters for decisions */
export const DECISION_MAX_TOKENS = 2048;
export const DECISION_TEMPERATURE = 0.3;

/**
 * Reply schema, in the snake_case the prompt asks for.
 */
export const decisionResponseSchema = z.object({
  decision: z.enum(["APPROVED", "DENIED", "PENDING"]),
  reasoning: z.string(),
  confidence: z.number().min(0).max(1),
  estimated_payout: z.number().nonnegative(),
  deductible_applies: z.boolean(),
  required_actions: z.array(z.string()),
  risk_factors: z.array(z.string()),
});

export type DecisionResponse = z.infer<typeof decisionResponseSchema>;

export type DecisionParseResult =
  | { ok: true; decision: DecisionData }
  | { ok: false; error: string };

const json = (value: unknown) => JSON.stringify(value, null, 2);

/**
 * Build the adjudication prompt. Same context in, same prompt out.
 */
export function buildDecisionPrompt(context: ValuationContext): string {
  return `You are an expert auto insurance claims adjuster. Analyze the following claim and provide a decision.

CLAIM ID: ${context.claimId}

POLICY INFORMATION:
${json(context.policyData)}

EXTRACTED CLAIM DATA:
${json(context.extractedData)}

EXTRACTED ENTITIES:
${json(context.entities)}

DAMAGE ASSESSMENT:
${json(context.damageAssessment)}

VEHICLE VALUATION:
${json(context.valuation)}

INSTRUCTIONS:
1. Review the policy coverage and limits
2. Assess the claim validity based on extracted information
3. Check if the claim falls within coverage
4. Determine if deductible applies
5. Calculate estimated payout (if applicable)
6. Provide a clear decision: APPROVED, DENIED, or PENDING

RESPOND WITH VALID JSON ONLY (no markdown, no code blocks):
{
  "decision": "APPROVED|DENIED|PENDING",
  "reasoning": "Brief explanation of your decision (2-3 sentences)",
  "confidence": 0.0-1.0,
  "estimated_payout": 0.0,
  "deductible_applies": true|false,
  "required_actions": ["list", "of", "actions"],
  "risk_factors": ["identified", "risks"]
}

Respond now with JSON:`;
}

const CODE_FENCE = /^```[a-zA-Z]*[ \t]*\n([\s\S]*?)\n?```$/;

/**
 * Remove one code fence wrapping the whole text.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match ? (match[1] ?? "") : trimmed;
}

/**
 * Parse a raw reasoning engine reply into decision data.
 */
export function parseDecision(raw: string): DecisionParseResult {
  let payload: unknown;
  try {
    payload = JSON.parse(stripCodeFence(raw));
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${errorMessage(err)}` };
  }

  const parsed = decisionResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return { ok: false, error: `schema mismatch: ${issues}` };
  }

  const response = parsed.data;
  return {
    ok: true,
    decision: {
      decision: response.decision,
      reasoning: response.reasoning,
      confidence: response.confidence,
      estimatedPayout: response.estimated_payout,
      deductibleApplies: response.deductible_applies,
      requiredActions: response.required_actions,
      riskFactors: response.risk_factors,
    },
  };
}

/**
 * Terminal decision used when no valid decision could be obtained.
 */
export function fallbackDecision(diagnostic: string): DecisionData {
  return {
    decision: "ERROR",
    reasoning: diagnostic,
    confidence: 0.0,
    estimatedPayout: 0.0,
    deductibleApplies: false,
    requiredActions: ["Manual review required"],
    riskFactors: [],
  };
}
