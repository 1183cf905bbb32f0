/**
 * Claim context types.
 *
 * The context is the value threaded through the pipeline for one execution.
 * Each stage contributes exactly one part, and every stage's input type
 * names the parts its predecessors guarantee.
 */

/**
 * Pipeline stages, in execution order.
 */
export type StageName = "intake" | "policy" | "damage" | "valuation" | "decision";

/** All stages in the order they run */
export const STAGE_ORDER: readonly StageName[] = [
  "intake",
  "policy",
  "damage",
  "valuation",
  "decision",
] as const;

/**
 * Location of an object in object storage.
 */
export interface StorageLocation {
  bucket: string;
  key: string;
}

// =============================================================================
// Intake
// =============================================================================

/** File category detected from the object key's extension */
export type FileType = "pdf" | "image" | "unknown";

/** Image label as reported by image analysis (confidence in percent) */
export interface ImageLabel {
  name: string;
  confidence: number;
}

export interface PdfExtraction {
  fileType: "pdf";
  text: string;
  jobId: string;
}

export interface ImageExtraction {
  fileType: "image";
  labels: ImageLabel[];
  detectedText: string;
}

/**
 * Unsupported upload. Not a pipeline failure: it flows forward so later
 * stages (and the decision) can see the data-quality problem.
 */
export interface UnknownExtraction {
  fileType: "unknown";
  error: string;
}

export type ExtractedData = PdfExtraction | ImageExtraction | UnknownExtraction;

/**
 * Structured fields parsed from extracted text.
 * Absent fields are null, never an error.
 */
export interface ClaimEntities {
  policyNumber: string | null;
  claimantName: string | null;
  incidentDate: string | null;
  incidentLocation: string | null;
  vehicleInfo: string | null;
}

// =============================================================================
// Policy resolution
// =============================================================================

export interface PolicyFound {
  found: true;
  policyId: string;
  coverageType: string | null;
  deductible: number | null;
  coverageLimit: number | null;
  filingDeadlineDays: number | null;
  content: string;
}

export interface PolicyNotFound {
  found: false;
  reason: string;
}

export type PolicyData = PolicyFound | PolicyNotFound;

// =============================================================================
// Damage assessment & valuation
// =============================================================================

export type DamageSeverity = "NONE" | "MINOR" | "MODERATE" | "SEVERE";

export const DAMAGE_SEVERITIES: readonly DamageSeverity[] = [
  "NONE",
  "MINOR",
  "MODERATE",
  "SEVERE",
] as const;

export interface DamageAssessment {
  damageDetected: boolean;
  severity: DamageSeverity;
  estimatedRepairCost: number;
  damageLocations: string[];
  confidence: number;
}

export interface Valuation {
  vehicleValue: number;
  vehicleInfo: string;
  marketSource: string;
  confidence: number;
}

// =============================================================================
// Decision
// =============================================================================

/** Decisions the reasoning engine may return */
export type ReasonedDecision = "APPROVED" | "DENIED" | "PENDING";

/** Every decision value a terminal record can carry */
export type DecisionValue = ReasonedDecision | "ERROR";

export const DECISION_VALUES: readonly DecisionValue[] = [
  "APPROVED",
  "DENIED",
  "PENDING",
  "ERROR",
] as const;

export interface DecisionData {
  decision: DecisionValue;
  reasoning: string;
  /** 0.0 - 1.0 */
  confidence: number;
  estimatedPayout: number;
  deductibleApplies: boolean;
  requiredActions: string[];
  riskFactors: string[];
}

// =============================================================================
// Accumulated contexts
// =============================================================================

/**
 * What the caller hands to the pipeline. Intake assigns a claim id when
 * none is given; a missing source is an input error.
 */
export interface ClaimSubmission {
  claimId?: string | undefined;
  source?: StorageLocation | undefined;
}

export interface IntakeContext {
  readonly claimId: string;
  readonly source: StorageLocation;
  readonly extractedData: ExtractedData;
  readonly entities: ClaimEntities;
}

export interface PolicyContext extends IntakeContext {
  readonly policyData: PolicyData;
}

export interface DamageContext extends PolicyContext {
  readonly damageAssessment: DamageAssessment;
}

export interface ValuationContext extends DamageContext {
  readonly valuation: Valuation;
}

export interface DecisionContext extends ValuationContext {
  readonly decisionData: DecisionData;
}

/**
 * Whatever a run accumulated before it stopped.
 */
export type PartialClaimContext = { readonly claimId: string } & Partial<
  Omit<DecisionContext, "claimId">
>;
