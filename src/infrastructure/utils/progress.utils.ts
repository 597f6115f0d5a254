import type { Outcome } from "../../core/domain/entities/outcome.entity.js";
import type { RunBatchesRequest } from "../../core/use-cases/run-batches.use-case.js";
import type { ProcessFileHooks } from "../../core/use-cases/process-file.use-case.js";
import type { BatchStats, RunSummary } from "./metrics.utils.js";

export interface ProgressSink {
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
  /** Tab-separated lines for a parent process reading our stdout. */
  machine?(line: string): void;
}

export const consoleSink = (stdoutPiped: boolean): ProgressSink => ({
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
  machine: stdoutPiped ? (line) => process.stdout.write(line + "\n") : undefined,
});

function formatMs(ms: number | null): string {
  return ms === null ? "n/a" : `${Math.round(ms)}ms`;
}

export function describeOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case "written":
      return outcome.attempts > 1
        ? `Written ${outcome.outputPath} (after ${outcome.attempts} attempts)`
        : `Written ${outcome.outputPath}`;
    case "skipped":
      return `${outcome.reason}, skipping...`;
    case "failed":
      return `Processing failed for ${outcome.filePath}: ${outcome.reason}`;
  }
}

export function describeBatch(stats: BatchStats): string {
  return (
    `Batch ${stats.index + 1} done in ${(stats.durationMs / 1000).toFixed(1)}s: ` +
    `${stats.written} written, ${stats.skipped} skipped, ${stats.failed} failed` +
    (stats.retried > 0 ? `, ${stats.retried} retried` : "") +
    ` (latency p50 ${formatMs(stats.latencyP50Ms)}, p95 ${formatMs(stats.latencyP95Ms)})`
  );
}

type ProgressHooks = Pick<
  RunBatchesRequest,
  "onBatchStart" | "onFileStart" | "onOutcome" | "onBatchComplete"
> &
  ProcessFileHooks;

/** Hooks printing per-file progress as it happens. */
export function createProgressHooks(sink: ProgressSink): ProgressHooks {
  return {
    onBatchStart: (index, size) => {
      sink.machine?.(`BATCH_PROGRESS\t${index + 1}\t0\t${size}`);
      sink.info(`PDF files to process: ${size}`);
    },
    onFileStart: (filePath) => sink.info(`Processing -> ${filePath}`),
    onRetry: (filePath, attempt, delayMs) =>
      sink.warn(
        `Server busy (503) for ${filePath}, attempt ${attempt}; retrying in ${delayMs / 1000}s`,
      ),
    onOutcome: (outcome) => {
      sink.machine?.(`FILE_OUTCOME\t${outcome.kind}\t${outcome.filePath}`);
      if (outcome.kind === "failed") sink.error(describeOutcome(outcome));
      else sink.info(describeOutcome(outcome));
    },
    onBatchComplete: (stats) => {
      sink.machine?.(`BATCH_PROGRESS\t${stats.index + 1}\t${stats.size}\t${stats.size}`);
      sink.info(describeBatch(stats));
    },
  };
}

export function printSummary(sink: ProgressSink, summary: RunSummary): void {
  sink.machine?.(
    `RUN_SUMMARY\t${summary.written}\t${summary.skipped}\t${summary.failed}\t${summary.elapsedSeconds}`,
  );
  sink.info("\nRun Summary");
  sink.info("-----------");
  sink.info(`Batches: ${summary.batches}`);
  sink.info(`Files: ${summary.total}`);
  sink.info(`Written: ${summary.written}`);
  sink.info(`Skipped (output exists): ${summary.skipped}`);
  sink.info(`Failed: ${summary.failed}`);
  if (summary.retried > 0) sink.info(`Retried after 503: ${summary.retried}`);
  sink.info(`Runtime: ${summary.elapsedSeconds} seconds`);
}
