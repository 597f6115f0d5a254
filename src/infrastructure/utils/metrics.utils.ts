import { quantile } from "simple-statistics";
import {
  wasRetried,
  type Outcome,
} from "../../core/domain/entities/outcome.entity.js";

export interface BatchStats {
  index: number;
  size: number;
  written: number;
  skipped: number;
  failed: number;
  retried: number;
  durationMs: number;
  /** Over files that reached the server; `null` when none did. */
  latencyP50Ms: number | null;
  latencyP95Ms: number | null;
}

export interface RunSummary {
  batches: number;
  total: number;
  written: number;
  skipped: number;
  failed: number;
  retried: number;
  startedAt: Date;
  finishedAt: Date;
  elapsedSeconds: number;
}

/**
 * Tally of one batch's outcomes, latency percentiles included.
 * The outcomes array is dropped by the caller afterwards.
 */
export function computeBatchStats(
  index: number,
  outcomes: readonly Outcome[],
  durationMs: number,
): BatchStats {
  const latencies = outcomes
    .map((o) => (o.kind === "skipped" ? undefined : o.latencyMs))
    .filter((n): n is number => typeof n === "number" && n >= 0);

  return {
    index,
    size: outcomes.length,
    written: outcomes.filter((o) => o.kind === "written").length,
    skipped: outcomes.filter((o) => o.kind === "skipped").length,
    failed: outcomes.filter((o) => o.kind === "failed").length,
    retried: outcomes.filter(wasRetried).length,
    durationMs,
    latencyP50Ms: latencies.length > 0 ? quantile(latencies, 0.5) : null,
    latencyP95Ms: latencies.length > 0 ? quantile(latencies, 0.95) : null,
  };
}

/** Running totals across batches; holds counters only. */
export class RunTally {
  private batches = 0;
  private written = 0;
  private skipped = 0;
  private failed = 0;
  private retried = 0;

  constructor(private readonly startedAt: Date = new Date()) {}

  add(stats: BatchStats): void {
    this.batches += 1;
    this.written += stats.written;
    this.skipped += stats.skipped;
    this.failed += stats.failed;
    this.retried += stats.retried;
  }

  summarize(finishedAt: Date = new Date()): RunSummary {
    const elapsedMs = finishedAt.getTime() - this.startedAt.getTime();
    return {
      batches: this.batches,
      total: this.written + this.skipped + this.failed,
      written: this.written,
      skipped: this.skipped,
      failed: this.failed,
      retried: this.retried,
      startedAt: this.startedAt,
      finishedAt,
      elapsedSeconds: Math.round(elapsedMs) / 1000,
    };
  }
}
