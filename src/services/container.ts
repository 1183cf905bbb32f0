/**
 * Service container.
 *
 * Builds every store and capability adapter once from configuration and
 * injects them into the pipeline. Nothing else reads the environment.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type Database from "better-sqlite3";
import { checkpointStages, env as defaultEnv, type Env } from "../config/env.js";
import type { ReasoningEngine, SecretStore } from "../types/capabilities.js";
import { createJsonArtifactRepository, createSqliteArtifactRepository } from "../storage/artifacts.js";
import { createJsonAuditLogRepository, createSqliteAuditLogRepository } from "../storage/audit-log.js";
import { ensureStorageDirs, resolveStoragePaths, type StoragePaths } from "../storage/base.js";
import {
  createJsonClaimRecordRepository,
  createSqliteClaimRecordRepository,
} from "../storage/claim-records.js";
import { SqlitePolicyCorpus, loadPolicySeed } from "../storage/policies.js";
import type {
  ArtifactRepository,
  AuditLogRepository,
  ClaimRecordRepository,
  StorageBackend,
} from "../storage/repository.js";
import { openDatabase } from "../storage/sqlite.js";
import { ClaimQueries } from "./claim-queries.js";
import { FileObjectStorage } from "./clients/file-object-storage.js";
import { OpenAIReasoningEngine, UnconfiguredReasoningEngine } from "./clients/reasoning-engine.js";
import { EnvSecretStore, FileSecretStore, getOptionalSecret } from "./clients/secret-store.js";
import { VisionServiceClient } from "./clients/vision-client.js";
import { createClaimPipeline, type ClaimPipeline } from "./pipeline.js";

export interface Container {
  config: Env;
  backend: StorageBackend;
  paths: StoragePaths;
  database: Database.Database;
  claimRecords: ClaimRecordRepository;
  auditLog: AuditLogRepository;
  artifacts: ArtifactRepository;
  policyCorpus: SqlitePolicyCorpus;
  objectStorage: FileObjectStorage;
  vision: VisionServiceClient;
  reasoningEngine: ReasoningEngine;
  pipeline: ClaimPipeline;
  queries: ClaimQueries;
  close(): void;
}

function createSecretStore(config: Env): SecretStore {
  return config.SECRETS_FILE
    ? new FileSecretStore(path.resolve(process.cwd(), config.SECRETS_FILE))
    : new EnvSecretStore();
}

/**
 * Load the policy seed into an empty corpus.
 */
function seedPolicies(corpus: SqlitePolicyCorpus, seedFile: string): void {
  if (corpus.count() > 0) return;

  const filePath = path.resolve(process.cwd(), seedFile);
  if (!fs.existsSync(filePath)) {
    console.log(`[Container] Policy corpus is empty and ${filePath} does not exist`);
    return;
  }
  const count = corpus.upsert(loadPolicySeed(filePath));
  console.log(`[Container] Seeded ${count} policies from ${filePath}`);
}

async function createReasoningEngine(config: Env, secrets: SecretStore): Promise<ReasoningEngine> {
  const secret = await getOptionalSecret(secrets, "reasoning-engine");
  const apiKey = secret?.["api_key"] ?? config.OPENAI_API_KEY;
  if (!apiKey) {
    console.log("[Container] No reasoning engine credentials; decisions will fall back to ERROR");
    return new UnconfiguredReasoningEngine();
  }
  return new OpenAIReasoningEngine({
    apiKey,
    model: secret?.["model"] ?? config.OPENAI_MODEL,
    timeoutMs: config.CAPABILITY_TIMEOUT_MS,
  });
}

/**
 * Build the container for a configuration.
 */
export async function createContainer(config: Env = defaultEnv): Promise<Container> {
  const backend: StorageBackend = config.STORAGE_BACKEND;
  const paths = resolveStoragePaths(config.DATA_DIR);
  ensureStorageDirs(paths);

  // The policy corpus always lives in SQLite; records, audit and artifacts follow the backend
  const database = openDatabase(paths.database);
  const claimRecords =
    backend === "sqlite"
      ? createSqliteClaimRecordRepository(database)
      : createJsonClaimRecordRepository(paths.claimRecords);
  const auditLog =
    backend === "sqlite"
      ? createSqliteAuditLogRepository(database)
      : createJsonAuditLogRepository(paths.auditLog);
  const artifacts =
    backend === "sqlite"
      ? createSqliteArtifactRepository(database)
      : createJsonArtifactRepository(paths.artifacts);

  const policyCorpus = new SqlitePolicyCorpus(database);
  seedPolicies(policyCorpus, config.POLICY_SEED_FILE);

  const objectStorage = new FileObjectStorage(paths.objects);
  const secrets = createSecretStore(config);

  const visionSecret = await getOptionalSecret(secrets, "vision-service");
  const vision = new VisionServiceClient({
    baseUrl: visionSecret?.["url"] ?? config.VISION_SERVICE_URL,
    apiKey: visionSecret?.["api_key"],
    requestTimeoutMs: config.CAPABILITY_TIMEOUT_MS,
    pollIntervalMs: config.EXTRACTION_POLL_INTERVAL_MS,
    extractionTimeoutMs: config.EXTRACTION_TIMEOUT_MS,
  });
  const reasoningEngine = await createReasoningEngine(config, secrets);

  const pipeline = createClaimPipeline(
    {
      auditLog,
      claimRecords,
      objectStorage,
      textExtractor: vision,
      imageAnalyzer: vision,
      contentIndex: artifacts,
      policySearch: policyCorpus,
      reasoningEngine,
    },
    {
      checkpoints: checkpointStages(config),
      capabilityTimeoutMs: config.CAPABILITY_TIMEOUT_MS,
      extractionDeadlineMs: config.EXTRACTION_TIMEOUT_MS + config.CAPABILITY_TIMEOUT_MS,
      defaultPolicyNumber: config.DEFAULT_POLICY_NUMBER,
      bucketPrefix: config.BUCKET_PREFIX,
      maxTokens: config.REASONING_MAX_TOKENS,
      temperature: config.REASONING_TEMPERATURE,
    }
  );

  console.log(
    `[Container] Storage backend: ${backend} (${paths.root}), ` +
      `checkpoints: ${checkpointStages(config).join(", ") || "none"}`
  );

  return {
    config,
    backend,
    paths,
    database,
    claimRecords,
    auditLog,
    artifacts,
    policyCorpus,
    objectStorage,
    vision,
    reasoningEngine,
    pipeline,
    queries: new ClaimQueries(claimRecords, auditLog),
    close: () => database.close(),
  };
}
