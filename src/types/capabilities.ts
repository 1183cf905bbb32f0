/**
 * External capability interfaces.
 *
 * Each is a single call from the stage's point of view and can fail on its
 * own. Adapters live in `src/services/clients`; tests substitute fakes.
 */

import type { ExtractedData, ClaimEntities, FileType, ImageLabel, StorageLocation } from "./claim-context.js";

// =============================================================================
// Object storage
// =============================================================================

export interface StoredObject {
  body: Buffer;
  contentType: string;
}

export interface ObjectStorage {
  put(bucket: string, key: string, body: Buffer | string, contentType: string): Promise<void>;

  /** Resolves null when the object does not exist */
  get(bucket: string, key: string): Promise<StoredObject | null>;
}

// =============================================================================
// Text extraction & image analysis
// =============================================================================

export interface TextExtractionResult {
  text: string;
  jobId: string;
}

export interface TextExtractor {
  /**
   * Extract text from a document. Blocks until the extraction job reaches a
   * terminal state or `signal` aborts; a failed job rejects.
   */
  extractText(location: StorageLocation, signal?: AbortSignal): Promise<TextExtractionResult>;
}

export interface ImageAnalyzer {
  detectLabels(
    location: StorageLocation,
    maxLabels: number,
    minConfidence: number,
    signal?: AbortSignal
  ): Promise<ImageLabel[]>;

  /** Line-level text detections */
  detectText(location: StorageLocation, signal?: AbortSignal): Promise<string[]>;
}

// =============================================================================
// Policy search
// =============================================================================

/**
 * Policy document as stored in the policy corpus.
 */
export interface PolicyDocument {
  policyId: string;
  content: string;
  coverageType: string | null;
  deductible: number | null;
  coverageLimit: number | null;
  filingDeadlineDays: number | null;
}

export interface PolicySearch {
  /** Combined keyword and similarity lookup; best match first */
  hybridSearch(query: string, limit: number): Promise<PolicyDocument[]>;
}

// =============================================================================
// Content index
// =============================================================================

/**
 * Extracted content for one uploaded artifact.
 */
export interface ClaimArtifact {
  id: string;
  claimId: string;
  bucket: string;
  key: string;
  fileType: FileType;
  extractedText: string;
  entities: ClaimEntities;
  metadata: ExtractedData;
  indexedAt: Date;
}

export type NewClaimArtifact = Omit<ClaimArtifact, "id" | "indexedAt">;

export interface ContentIndex {
  indexArtifact(artifact: NewClaimArtifact): Promise<ClaimArtifact>;
}

// =============================================================================
// Reasoning engine
// =============================================================================

export interface ReasoningOptions {
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal | undefined;
}

export interface ReasoningEngine {
  /** Returns raw model text; expected, not guaranteed, to be JSON */
  invoke(prompt: string, options: ReasoningOptions): Promise<string>;
}

// =============================================================================
// Secret store
// =============================================================================

export interface SecretStore {
  getSecret(name: string): Promise<Record<string, string>>;
}
