/**
 * Claim Pipeline Type Definitions
 *
 * Claim context accumulated by the pipeline stages, the versioned claim
 * record model, audit entries, and the capability interfaces the stages
 * consume.
 */

// Claim context
export type {
  StageName,
  StorageLocation,
  FileType,
  ImageLabel,
  PdfExtraction,
  ImageExtraction,
  UnknownExtraction,
  ExtractedData,
  ClaimEntities,
  PolicyFound,
  PolicyNotFound,
  PolicyData,
  DamageSeverity,
  DamageAssessment,
  Valuation,
  ReasonedDecision,
  DecisionValue,
  DecisionData,
  ClaimSubmission,
  IntakeContext,
  PolicyContext,
  DamageContext,
  ValuationContext,
  DecisionContext,
  PartialClaimContext,
} from "./claim-context.js";
export { STAGE_ORDER, DAMAGE_SEVERITIES, DECISION_VALUES } from "./claim-context.js";

// Claim records
export type { ClaimRecord, ClaimRecordStatus, NewClaimRecord } from "./claim-record.js";
export { claimRecordId, isTerminalRecord } from "./claim-record.js";

// Audit entries
export type { AuditEntry, AuditStatus, NewAuditEntry } from "./audit-entry.js";
export { AUDIT_STATUSES, auditLogId } from "./audit-entry.js";

// Capabilities
export type {
  StoredObject,
  ObjectStorage,
  TextExtractionResult,
  TextExtractor,
  ImageAnalyzer,
  PolicyDocument,
  PolicySearch,
  ClaimArtifact,
  NewClaimArtifact,
  ContentIndex,
  ReasoningOptions,
  ReasoningEngine,
  SecretStore,
} from "./capabilities.js";
