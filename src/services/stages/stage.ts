/**
 * Stage contract shared by the five pipeline stages.
 *
 * `execute` never throws for a fault inside the stage body: the fault is
 * converted to a StageFailure, exactly one audit entry is written for the
 * attempt, and the result is returned to the orchestrator.
 */

import type { AuditEntry, AuditStatus } from "../../types/audit-entry.js";
import type { PartialClaimContext, StageName } from "../../types/claim-context.js";
import type { ClaimRecord } from "../../types/claim-record.js";
import type { AuditLogRepository, ClaimRecordRepository } from "../../storage/repository.js";
import { toClaimRecordInput } from "../claim-context.js";
import { nextClaimId } from "../claim-id.js";
import { CapabilityError, InputError, errorMessage } from "../errors.js";
import { withTimeout } from "../timeouts.js";

/** Default deadline for one external call */
export const DEFAULT_CAPABILITY_TIMEOUT_MS = 30_000;

/** Statuses that let the pipeline move on */
export type StageStatus = Exclude<AuditStatus, "error">;

/**
 * Why a stage failed.
 * - input: the caller gave the stage something it cannot work with
 * - capability: an external call (or a store write) failed or timed out
 * - internal: anything else raised inside the stage
 * - cancelled: the run was aborted before the stage started (set by the
 *   orchestrator, never by a stage)
 */
export type FailureKind = "input" | "capability" | "internal" | "cancelled";

export interface StageFailure {
  stage: StageName;
  kind: FailureKind;
  message: string;
}

export type StageResult<Out> =
  | {
      ok: true;
      claimId: string;
      status: StageStatus;
      context: Out;
      audit: AuditEntry;
      /** Record committed by this stage, if any */
      record: ClaimRecord | null;
    }
  | {
      ok: false;
      claimId: string;
      failure: StageFailure;
      audit: AuditEntry;
    };

/**
 * What a stage body produces on success.
 */
export interface StageOutcome<Out> {
  status: StageStatus;
  context: Out;
  details: Record<string, unknown>;
  /** Set by stages that commit their own record */
  record?: ClaimRecord;
}

export interface StageDependencies {
  auditLog: AuditLogRepository;
  claimRecords: ClaimRecordRepository;
}

export interface StageOptions {
  /** Commit a claim record with status = stage name after success */
  checkpoint?: boolean;
  /** Deadline for each external call */
  timeoutMs?: number;
}

/**
 * Classify a thrown value.
 */
export function toStageFailure(stage: StageName, err: unknown): StageFailure {
  let kind: FailureKind = "internal";
  if (err instanceof InputError) kind = "input";
  else if (err instanceof CapabilityError) kind = "capability";
  return { stage, kind, message: errorMessage(err) };
}

/**
 * Base class for pipeline stages.
 */
export abstract class PipelineStage<
  In extends { claimId?: string | undefined },
  Out extends PartialClaimContext,
> {
  abstract readonly name: StageName;
  abstract readonly action: string;

  protected readonly auditLog: AuditLogRepository;
  protected readonly claimRecords: ClaimRecordRepository;
  protected readonly checkpoint: boolean;
  protected readonly timeoutMs: number;

  constructor(deps: StageDependencies, options: StageOptions = {}) {
    this.auditLog = deps.auditLog;
    this.claimRecords = deps.claimRecords;
    this.checkpoint = options.checkpoint ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CAPABILITY_TIMEOUT_MS;
  }

  async execute(input: In): Promise<StageResult<Out>> {
    const claimId = input.claimId ?? this.assignClaimId();

    let outcome: StageOutcome<Out>;
    let record: ClaimRecord | null;
    try {
      outcome = await this.run(input, claimId);
      record = outcome.record ?? (this.checkpoint ? await this.commitCheckpoint(outcome.context) : null);
    } catch (err) {
      const failure = toStageFailure(this.name, err);
      console.error(`[${this.label}] ${claimId} failed (${failure.kind}): ${failure.message}`);

      const audit = await this.writeAudit(claimId, "error", {
        ...this.failureDetails(input),
        error: failure.message,
        errorKind: failure.kind,
      });
      return { ok: false, claimId, failure, audit };
    }

    const details = record && !outcome.record
      ? { ...outcome.details, checkpointVersion: record.version }
      : outcome.details;
    const audit = await this.writeAudit(claimId, outcome.status, details);

    return { ok: true, claimId, status: outcome.status, context: outcome.context, audit, record };
  }

  /** The stage's work; throw to fail */
  protected abstract run(input: In, claimId: string): Promise<StageOutcome<Out>>;

  /** Extra audit details for a failed attempt */
  protected failureDetails(_input: In): Record<string, unknown> {
    return {};
  }

  /** Only Intake ever sees an input without a claim id */
  protected assignClaimId(): string {
    return nextClaimId();
  }

  /**
   * Make one external call under a deadline (the stage's by default).
   * Whatever the call throws surfaces as a CapabilityError.
   */
  protected async call<T>(
    capability: string,
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number = this.timeoutMs
  ): Promise<T> {
    try {
      return await withTimeout(capability, timeoutMs, fn);
    } catch (err) {
      if (err instanceof CapabilityError) throw err;
      throw new CapabilityError(capability, errorMessage(err), { cause: err });
    }
  }

  protected get label(): string {
    return this.name.charAt(0).toUpperCase() + this.name.slice(1);
  }

  private async commitCheckpoint(context: Out): Promise<ClaimRecord> {
    try {
      return await this.claimRecords.append(toClaimRecordInput(context, this.name));
    } catch (err) {
      throw new CapabilityError("claim-store", errorMessage(err), { cause: err });
    }
  }

  private writeAudit(
    claimId: string,
    status: AuditStatus,
    details: Record<string, unknown>
  ): Promise<AuditEntry> {
    return this.auditLog.append({
      claimId,
      agent: this.name,
      action: this.action,
      status,
      details,
    });
  }
}
