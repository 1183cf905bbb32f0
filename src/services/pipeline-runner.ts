/**
 * Batch claim processing.
 *
 * Runs many claims through one pipeline with bounded concurrency. Runs for
 * different claims are independent; each claim's stages stay sequential.
 */

import type { ClaimSubmission } from "../types/claim-context.js";
import { mapWithConcurrency } from "./concurrency.js";
import type { ClaimPipeline, PipelineRunResult } from "./pipeline.js";
import { TimingCollector, formatRunMetrics, type RunMetrics } from "./timing.js";

const DEFAULT_BATCH_CONCURRENCY = 4;

export interface BatchOptions {
  concurrency?: number;
  signal?: AbortSignal;
  /** What started the batch, for the metrics */
  trigger?: string;
}

export interface BatchResult {
  results: PipelineRunResult[];
  decided: number;
  failed: number;
  metrics: RunMetrics;
}

/**
 * Process a batch of claims.
 */
export async function processClaimBatch(
  pipeline: ClaimPipeline,
  submissions: ClaimSubmission[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const concurrency = options.concurrency ?? DEFAULT_BATCH_CONCURRENCY;
  const timing = new TimingCollector(options.trigger ?? "batch");

  console.log(
    `[ClaimBatch] Processing ${submissions.length} claims (concurrency ${concurrency})...`
  );

  const results = await mapWithConcurrency(submissions, concurrency, (submission) =>
    pipeline.run(submission, { signal: options.signal, timing })
  );

  const decided = results.filter((r) => r.state === "TERMINAL_DECIDED").length;
  const failed = results.length - decided;
  const metrics = timing.finalize(results.length);

  console.log(`[ClaimBatch] Completed: ${decided} decided, ${failed} failed`);
  console.log(formatRunMetrics(metrics));

  return { results, decided, failed, metrics };
}
