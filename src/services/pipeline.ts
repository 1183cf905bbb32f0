/**
 * Claim Pipeline
 *
 * Runs the five stages in fixed order for one claim. Each stage result
 * drives the pipeline state machine; the first failure halts the run and
 * nothing already committed is rolled back. There are no retries.
 */

import type {
  ClaimSubmission,
  DamageContext,
  DecisionContext,
  IntakeContext,
  PartialClaimContext,
  PolicyContext,
  StageName,
  ValuationContext,
} from "../types/claim-context.js";
import type { AuditStatus } from "../types/audit-entry.js";
import type { ClaimRecord } from "../types/claim-record.js";
import type {
  ContentIndex,
  ImageAnalyzer,
  ObjectStorage,
  PolicySearch,
  ReasoningEngine,
  TextExtractor,
} from "../types/capabilities.js";
import type { AuditLogRepository, ClaimRecordRepository } from "../storage/repository.js";
import { nextClaimId } from "./claim-id.js";
import { errorMessage } from "./errors.js";
import { TimingCollector } from "./timing.js";
import { DamageStage, type DamageAssessor } from "./stages/damage.js";
import { DecisionStage } from "./stages/decision.js";
import { IntakeStage } from "./stages/intake.js";
import { PolicyStage } from "./stages/policy.js";
import type { PipelineStage, StageFailure, StageResult } from "./stages/stage.js";
import { ValuationStage, type VehicleValuator } from "./stages/valuation.js";

// =============================================================================
// State machine
// =============================================================================

export type PipelineState =
  | "INTAKE"
  | "POLICY"
  | "DAMAGE"
  | "VALUATION"
  | "DECISION"
  | "TERMINAL_DECIDED"
  | "TERMINAL_FAILED";

type ActiveState = Exclude<PipelineState, "TERMINAL_DECIDED" | "TERMINAL_FAILED">;

const FORWARD: Record<ActiveState, PipelineState> = {
  INTAKE: "POLICY",
  POLICY: "DAMAGE",
  DAMAGE: "VALUATION",
  VALUATION: "DECISION",
  DECISION: "TERMINAL_DECIDED",
};

/** State in which each stage runs */
export const STAGE_STATES: Record<StageName, ActiveState> = {
  intake: "INTAKE",
  policy: "POLICY",
  damage: "DAMAGE",
  valuation: "VALUATION",
  decision: "DECISION",
};

export function isTerminalState(state: PipelineState): boolean {
  return state === "TERMINAL_DECIDED" || state === "TERMINAL_FAILED";
}

/**
 * Next state after a stage in `state` reported `status`.
 * `success` and `not_found` move forward; `error` fails the run.
 * Terminal states are absorbing.
 */
export function nextState(state: PipelineState, status: AuditStatus): PipelineState {
  if (state === "TERMINAL_DECIDED" || state === "TERMINAL_FAILED") return state;
  if (status === "error") return "TERMINAL_FAILED";
  return FORWARD[state];
}

export interface Transition {
  from: PipelineState;
  to: PipelineState;
  status: AuditStatus;
}

// =============================================================================
// Results
// =============================================================================

export interface StageTiming {
  stage: StageName;
  durationMs: number;
}

export interface PipelineRunMetrics {
  totalDurationMs: number;
  stages: StageTiming[];
}

export type PipelineRunResult =
  | {
      state: "TERMINAL_DECIDED";
      claimId: string;
      context: DecisionContext;
      record: ClaimRecord;
      transitions: Transition[];
      metrics: PipelineRunMetrics;
    }
  | {
      state: "TERMINAL_FAILED";
      claimId: string;
      failedStage: StageName;
      failure: StageFailure;
      /** Whatever was accumulated before the failing stage */
      context: PartialClaimContext;
      transitions: Transition[];
      metrics: PipelineRunMetrics;
    };

export interface RunOptions {
  /** Checked before each stage */
  signal?: AbortSignal | undefined;
  /** Shared collector, e.g. one per batch */
  timing?: TimingCollector | undefined;
}

// =============================================================================
// Wiring
// =============================================================================

export interface PipelineStages {
  intake: PipelineStage<ClaimSubmission, IntakeContext>;
  policy: PipelineStage<IntakeContext, PolicyContext>;
  damage: PipelineStage<PolicyContext, DamageContext>;
  valuation: PipelineStage<DamageContext, ValuationContext>;
  decision: PipelineStage<ValuationContext, DecisionContext>;
}

export interface PipelineDependencies {
  auditLog: AuditLogRepository;
  claimRecords: ClaimRecordRepository;
  objectStorage: ObjectStorage;
  textExtractor: TextExtractor;
  imageAnalyzer: ImageAnalyzer;
  contentIndex: ContentIndex;
  policySearch: PolicySearch;
  reasoningEngine: ReasoningEngine;
  damageAssessor?: DamageAssessor;
  vehicleValuator?: VehicleValuator;
}

export interface PipelineOptions {
  /** Stages (other than decision) that commit a checkpoint record */
  checkpoints?: readonly StageName[];
  capabilityTimeoutMs?: number;
  extractionDeadlineMs?: number;
  defaultPolicyNumber?: string;
  bucketPrefix?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Build the five stages and the pipeline around them.
 */
export function createClaimPipeline(
  deps: PipelineDependencies,
  options: PipelineOptions = {}
): ClaimPipeline {
  const checkpoints = new Set(options.checkpoints ?? []);
  const base = { auditLog: deps.auditLog, claimRecords: deps.claimRecords };
  const stageOptions = (name: StageName) => ({
    checkpoint: checkpoints.has(name),
    ...(options.capabilityTimeoutMs !== undefined ? { timeoutMs: options.capabilityTimeoutMs } : {}),
  });

  const stages: PipelineStages = {
    intake: new IntakeStage(
      {
        ...base,
        textExtractor: deps.textExtractor,
        imageAnalyzer: deps.imageAnalyzer,
        contentIndex: deps.contentIndex,
      },
      { ...stageOptions("intake"), extractionDeadlineMs: options.extractionDeadlineMs }
    ),
    policy: new PolicyStage(
      { ...base, policySearch: deps.policySearch },
      { ...stageOptions("policy"), defaultPolicyNumber: options.defaultPolicyNumber }
    ),
    damage: new DamageStage(base, stageOptions("damage"), deps.damageAssessor),
    valuation: new ValuationStage(base, stageOptions("valuation"), deps.vehicleValuator),
    decision: new DecisionStage(
      { ...base, reasoningEngine: deps.reasoningEngine, objectStorage: deps.objectStorage },
      {
        ...stageOptions("decision"),
        bucketPrefix: options.bucketPrefix,
        maxTokens: options.maxTokens,
        temperature: options.temperature,
      }
    ),
  };

  return new ClaimPipeline(stages, deps.auditLog);
}

// =============================================================================
// Orchestrator
// =============================================================================

type StageSuccess<Out> = Extract<StageResult<Out>, { ok: true }>;

/**
 * Bookkeeping for one run.
 */
class PipelineRun {
  state: PipelineState = "INTAKE";
  context: PartialClaimContext;
  readonly transitions: Transition[] = [];
  readonly stages: StageTiming[] = [];
  failure: StageFailure | null = null;

  private startedAt = performance.now();

  constructor(
    readonly claimId: string,
    readonly timing: TimingCollector
  ) {
    this.context = { claimId };
  }

  advance(status: AuditStatus): void {
    const to = nextState(this.state, status);
    this.transitions.push({ from: this.state, to, status });
    this.state = to;
  }

  fail(failure: StageFailure): void {
    this.failure = failure;
    this.advance("error");
  }

  metrics(): PipelineRunMetrics {
    return {
      totalDurationMs: performance.now() - this.startedAt,
      stages: [...this.stages],
    };
  }
}

export class ClaimPipeline {
  private stages: PipelineStages;
  private auditLog: AuditLogRepository;

  constructor(stages: PipelineStages, auditLog: AuditLogRepository) {
    this.stages = stages;
    this.auditLog = auditLog;
  }

  /**
   * Process one claim from intake to a terminal state.
   */
  async run(submission: ClaimSubmission, options: RunOptions = {}): Promise<PipelineRunResult> {
    const claimId = submission.claimId ?? nextClaimId();
    const run = new PipelineRun(claimId, options.timing ?? new TimingCollector(`claim:${claimId}`));
    const { signal } = options;

    const intake = await this.step(run, this.stages.intake, { ...submission, claimId }, signal);
    if (!intake) return this.failed(run);
    const policy = await this.step(run, this.stages.policy, intake.context, signal);
    if (!policy) return this.failed(run);
    const damage = await this.step(run, this.stages.damage, policy.context, signal);
    if (!damage) return this.failed(run);
    const valuation = await this.step(run, this.stages.valuation, damage.context, signal);
    if (!valuation) return this.failed(run);
    const decision = await this.step(run, this.stages.decision, valuation.context, signal);
    if (!decision) return this.failed(run);

    const { record } = decision;
    if (!record) return this.failed(run);

    const result: PipelineRunResult = {
      state: "TERMINAL_DECIDED",
      claimId,
      context: decision.context,
      record,
      transitions: run.transitions,
      metrics: run.metrics(),
    };
    console.log(
      `[ClaimPipeline] ${claimId}: ${result.state} (${result.context.decisionData.decision}, ` +
        `v${result.record.version}) in ${result.metrics.totalDurationMs.toFixed(0)}ms`
    );
    return result;
  }

  private async step<In extends { claimId?: string | undefined }, Out extends PartialClaimContext>(
    run: PipelineRun,
    stage: PipelineStage<In, Out>,
    input: In,
    signal: AbortSignal | undefined
  ): Promise<StageSuccess<Out> | null> {
    if (signal?.aborted) {
      const reason = errorMessage(signal.reason);
      run.fail({ stage: stage.name, kind: "cancelled", message: `Run cancelled: ${reason}` });
      await this.writeOrchestratorAudit(run.claimId, stage.name, "cancelled", { reason });
      return null;
    }

    const start = performance.now();
    let result: StageResult<Out>;
    try {
      result = await stage.execute(input);
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[ClaimPipeline] ${run.claimId}: ${stage.name} crashed: ${message}`);
      run.fail({ stage: stage.name, kind: "internal", message });
      await this.writeOrchestratorAudit(run.claimId, stage.name, "stage_crashed", { error: message });
      return null;
    } finally {
      const durationMs = performance.now() - start;
      run.stages.push({ stage: stage.name, durationMs });
      run.timing.record(stage.name, durationMs, { claimId: run.claimId });
    }

    if (!result.ok) {
      run.fail(result.failure);
      return null;
    }
    if (stage.name === "decision" && !result.record) {
      run.fail({ stage: stage.name, kind: "internal", message: "Decision stage committed no record" });
      return null;
    }

    run.advance(result.status);
    run.context = result.context;
    return result;
  }

  private failed(run: PipelineRun): PipelineRunResult {
    const failure = run.failure ?? {
      stage: "intake",
      kind: "internal",
      message: "Run halted without a recorded failure",
    };
    const result: PipelineRunResult = {
      state: "TERMINAL_FAILED",
      claimId: run.claimId,
      failedStage: failure.stage,
      failure,
      context: run.context,
      transitions: run.transitions,
      metrics: run.metrics(),
    };
    console.error(
      `[ClaimPipeline] ${run.claimId}: ${result.state} at ${failure.stage} ` +
        `(${failure.kind}): ${failure.message}`
    );
    return result;
  }

  /**
   * Audit entry for a stage the stage itself could not write.
   */
  private async writeOrchestratorAudit(
    claimId: string,
    stage: StageName,
    action: "cancelled" | "stage_crashed",
    details: Record<string, unknown>
  ): Promise<void> {
    try {
      await this.auditLog.append({ claimId, agent: stage, action, status: "error", details });
    } catch (err) {
      console.error(
        `[ClaimPipeline] ${claimId}: could not write ${action} audit entry for ${stage}: ${errorMessage(err)}`
      );
    }
  }
}
