/**
 * In-process stand-ins for the external capabilities.
 */

import type {
  ClaimArtifact,
  ContentIndex,
  ImageAnalyzer,
  NewClaimArtifact,
  ObjectStorage,
  PolicyDocument,
  PolicySearch,
  ReasoningEngine,
  ReasoningOptions,
  StoredObject,
  TextExtractionResult,
  TextExtractor,
} from "../../src/types/index.js";
import type { ImageLabel, StorageLocation } from "../../src/types/index.js";
import { openDatabase } from "../../src/storage/sqlite.js";
import { createSqliteAuditLogRepository } from "../../src/storage/audit-log.js";
import { createSqliteClaimRecordRepository } from "../../src/storage/claim-records.js";
import {
  createClaimPipeline,
  type PipelineDependencies,
  type PipelineOptions,
} from "../../src/services/pipeline.js";

export class FakeObjectStorage implements ObjectStorage {
  objects = new Map<string, StoredObject>();
  failPuts = false;

  async put(bucket: string, key: string, body: Buffer | string, contentType: string): Promise<void> {
    if (this.failPuts) throw new Error("storage unavailable");
    this.objects.set(`${bucket}/${key}`, {
      body: typeof body === "string" ? Buffer.from(body, "utf-8") : body,
      contentType,
    });
  }

  async get(bucket: string, key: string): Promise<StoredObject | null> {
    return this.objects.get(`${bucket}/${key}`) ?? null;
  }

  text(bucket: string, key: string): string | null {
    return this.objects.get(`${bucket}/${key}`)?.body.toString("utf-8") ?? null;
  }
}

export class FakeTextExtractor implements TextExtractor {
  calls: StorageLocation[] = [];
  error: Error | null = null;
  /** Extraction waits on this when set */
  gate: Promise<void> | null = null;

  constructor(public text = "Policy Number: AUTO-001\nIncident on 2025-10-22") {}

  async extractText(location: StorageLocation): Promise<TextExtractionResult> {
    this.calls.push(location);
    if (this.gate) await this.gate;
    if (this.error) throw this.error;
    return { text: this.text, jobId: "job-1" };
  }
}

export class FakeImageAnalyzer implements ImageAnalyzer {
  labelCalls: Array<{ location: StorageLocation; maxLabels: number; minConfidence: number }> = [];
  error: Error | null = null;

  constructor(
    public labels: ImageLabel[] = [{ name: "Car", confidence: 98.5 }],
    public lines: string[] = []
  ) {}

  async detectLabels(
    location: StorageLocation,
    maxLabels: number,
    minConfidence: number
  ): Promise<ImageLabel[]> {
    this.labelCalls.push({ location, maxLabels, minConfidence });
    if (this.error) throw this.error;
    return this.labels;
  }

  async detectText(): Promise<string[]> {
    if (this.error) throw this.error;
    return this.lines;
  }
}

export class FakeContentIndex implements ContentIndex {
  artifacts: ClaimArtifact[] = [];
  error: Error | null = null;

  async indexArtifact(artifact: NewClaimArtifact): Promise<ClaimArtifact> {
    if (this.error) throw this.error;
    const indexed = { ...artifact, id: `artifact-${this.artifacts.length + 1}`, indexedAt: new Date() };
    this.artifacts.push(indexed);
    return indexed;
  }
}

/**
 * Exact (case-insensitive) match on policy id.
 */
export class FakePolicySearch implements PolicySearch {
  queries: string[] = [];
  error: Error | null = null;

  constructor(public policies: PolicyDocument[] = [testPolicy()]) {}

  async hybridSearch(query: string, limit: number): Promise<PolicyDocument[]> {
    this.queries.push(query);
    if (this.error) throw this.error;
    return this.policies
      .filter((p) => p.policyId.toLowerCase() === query.toLowerCase())
      .slice(0, limit);
  }
}

export class FakeReasoningEngine implements ReasoningEngine {
  prompts: string[] = [];
  options: ReasoningOptions[] = [];
  error: Error | null = null;

  constructor(public response: string = approvedResponse()) {}

  async invoke(prompt: string, options: ReasoningOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    if (this.error) throw this.error;
    return this.response;
  }
}

export function testPolicy(overrides: Partial<PolicyDocument> = {}): PolicyDocument {
  return {
    policyId: "AUTO-001",
    content: "Comprehensive cover with a $500 deductible",
    coverageType: "Comprehensive + Collision",
    deductible: 500,
    coverageLimit: 50000,
    filingDeadlineDays: 30,
    ...overrides,
  };
}

export function approvedResponse(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    decision: "APPROVED",
    reasoning: "Covered collision within the filing window.",
    confidence: 0.9,
    estimated_payout: 2000,
    deductible_applies: true,
    required_actions: ["Schedule repair"],
    risk_factors: [],
    ...overrides,
  });
}

export interface Harness {
  deps: PipelineDependencies & {
    objectStorage: FakeObjectStorage;
    textExtractor: FakeTextExtractor;
    imageAnalyzer: FakeImageAnalyzer;
    contentIndex: FakeContentIndex;
    policySearch: FakePolicySearch;
    reasoningEngine: FakeReasoningEngine;
  };
  database: ReturnType<typeof openDatabase>;
  pipeline: ReturnType<typeof createClaimPipeline>;
}

/**
 * Pipeline over an in-memory SQLite database and fake capabilities.
 */
export function createHarness(options: PipelineOptions = {}): Harness {
  const database = openDatabase(":memory:");
  const deps = {
    auditLog: createSqliteAuditLogRepository(database),
    claimRecords: createSqliteClaimRecordRepository(database),
    objectStorage: new FakeObjectStorage(),
    textExtractor: new FakeTextExtractor(),
    imageAnalyzer: new FakeImageAnalyzer(),
    contentIndex: new FakeContentIndex(),
    policySearch: new FakePolicySearch(),
    reasoningEngine: new FakeReasoningEngine(),
  };
  return { deps, database, pipeline: createClaimPipeline(deps, options) };
}
