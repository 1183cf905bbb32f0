/**
 * Timing utilities for pipeline runs.
 *
 * Stage durations are recorded per operation (stage name) and summarised
 * with percentiles when a batch finishes.
 */

export interface TimingRecord {
  operation: string;
  durationMs: number;
  timestamp: Date;
  metadata: Record<string, unknown> | undefined;
}

export interface TimingSummary {
  operation: string;
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  avgMs: number;
  p50Ms: number;
  p95Ms: number;
  p99Ms: number;
}

export interface RunMetrics {
  runId: string;
  trigger: string;
  startedAt: Date;
  completedAt: Date;
  totalDurationMs: number;
  claimsProcessed: number;
  summaries: TimingSummary[];
}

/**
 * Collector for timing records during a run or a batch of runs.
 */
export class TimingCollector {
  private records: TimingRecord[] = [];
  private runId: string;
  private trigger: string;
  private startedAt: Date;

  constructor(trigger: string) {
    this.runId = `run-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    this.trigger = trigger;
    this.startedAt = new Date();
  }

  record(operation: string, durationMs: number, metadata?: Record<string, unknown>): void {
    this.records.push({
      operation,
      durationMs,
      timestamp: new Date(),
      metadata,
    });
  }

  /**
   * Time an async operation and record it, whether it resolves or rejects.
   */
  async time<T>(
    operation: string,
    fn: () => Promise<T>,
    metadata?: Record<string, unknown>
  ): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.record(operation, performance.now() - start, metadata);
    }
  }

  getRecords(operation?: string): TimingRecord[] {
    if (!operation) return [...this.records];
    return this.records.filter((r) => r.operation === operation);
  }

  /**
   * Compute summary statistics for an operation.
   */
  summarize(operation: string): TimingSummary | null {
    const durations = this.getRecords(operation)
      .map((r) => r.durationMs)
      .sort((a, b) => a - b);
    const first = durations[0];
    const last = durations[durations.length - 1];
    if (first === undefined || last === undefined) return null;

    const totalMs = durations.reduce((sum, d) => sum + d, 0);

    return {
      operation,
      count: durations.length,
      totalMs,
      minMs: first,
      maxMs: last,
      avgMs: totalMs / durations.length,
      p50Ms: percentile(durations, 50),
      p95Ms: percentile(durations, 95),
      p99Ms: percentile(durations, 99),
    };
  }

  getOperations(): string[] {
    return [...new Set(this.records.map((r) => r.operation))];
  }

  /**
   * Finalize and return run metrics.
   */
  finalize(claimsProcessed: number): RunMetrics {
    const completedAt = new Date();
    const summaries = this.getOperations()
      .map((op) => this.summarize(op))
      .filter((s): s is TimingSummary => s !== null);

    return {
      runId: this.runId,
      trigger: this.trigger,
      startedAt: this.startedAt,
      completedAt,
      totalDurationMs: completedAt.getTime() - this.startedAt.getTime(),
      claimsProcessed,
      summaries,
    };
  }
}

/**
 * Linear-interpolated percentile of a sorted array.
 */
export function percentile(sortedValues: number[], p: number): number {
  const index = (p / 100) * (sortedValues.length - 1);
  const lower = sortedValues[Math.floor(index)];
  const upper = sortedValues[Math.ceil(index)];
  if (lower === undefined || upper === undefined) return 0;

  const fraction = index - Math.floor(index);
  return lower * (1 - fraction) + upper * fraction;
}

export function formatSummary(summary: TimingSummary): string {
  return (
    `${summary.operation}: ` +
    `count=${summary.count}, ` +
    `total=${summary.totalMs.toFixed(0)}ms, ` +
    `avg=${summary.avgMs.toFixed(1)}ms, ` +
    `p50=${summary.p50Ms.toFixed(1)}ms, ` +
    `p95=${summary.p95Ms.toFixed(1)}ms, ` +
    `p99=${summary.p99Ms.toFixed(1)}ms`
  );
}

/**
 * Format run metrics for logging.
 */
export function formatRunMetrics(metrics: RunMetrics): string {
  const lines = [
    `\n=== Run Metrics (${metrics.runId}) ===`,
    `Trigger: ${metrics.trigger}`,
    `Duration: ${metrics.totalDurationMs}ms`,
    `Claims: ${metrics.claimsProcessed}`,
    `Started: ${metrics.startedAt.toISOString()}`,
    `Completed: ${metrics.completedAt.toISOString()}`,
    "",
    "Per-stage breakdown:",
  ];

  for (const summary of metrics.summaries) {
    lines.push(`  ${formatSummary(summary)}`);
  }

  lines.push("=".repeat(40));
  return lines.join("\n");
}
