import PQueue from "p-queue";
import type { Outcome } from "../domain/entities/outcome.entity.js";
import { ConfigurationError, errorMessage } from "../domain/errors.js";
import {
  computeBatchStats,
  RunTally,
  type BatchStats,
  type RunSummary,
} from "../../infrastructure/utils/metrics.utils.js";

/** Anything that turns one path into a terminal outcome. */
export interface FileProcessor {
  execute(filePath: string): Promise<Outcome>;
}

export interface RunBatchesRequest {
  files: Iterable<string> | AsyncIterable<string>;
  batchSize: number;
  concurrency: number;
  /**
   * Output path of a file. When given, a second file of the same batch
   * that maps to an output already claimed fails instead of racing it.
   */
  destinationOf?: (filePath: string) => string;
  onBatchStart?: (index: number, size: number) => void;
  onFileStart?: (filePath: string) => void;
  onOutcome?: (outcome: Outcome) => void;
  onBatchComplete?: (stats: BatchStats) => void;
}

/**
 * Buffers discovered paths into batches of `batchSize` and drains each one
 * through its own queue of `concurrency` workers. A batch starts only once
 * every file of the previous batch has an outcome, so at most `batchSize`
 * paths are held and at most `concurrency` requests are in flight.
 */
export class RunBatchesUseCase {
  constructor(private fileProcessor: FileProcessor) {}

  async execute(request: RunBatchesRequest): Promise<RunSummary> {
    assertPositiveInteger("batchSize", request.batchSize);
    assertPositiveInteger("concurrency", request.concurrency);

    const tally = new RunTally();
    let buffer: string[] = [];
    let index = 0;

    for await (const filePath of request.files) {
      buffer.push(filePath);
      if (buffer.length === request.batchSize) {
        tally.add(await this.drainBatch(index++, buffer, request));
        buffer = [];
      }
    }
    if (buffer.length > 0) {
      tally.add(await this.drainBatch(index++, buffer, request));
    }

    return tally.summarize();
  }

  private async drainBatch(
    index: number,
    batch: readonly string[],
    request: RunBatchesRequest,
  ): Promise<BatchStats> {
    request.onBatchStart?.(index, batch.length);
    const startedAt = Date.now();
    const outcomes: Outcome[] = [];
    const hookErrors: unknown[] = [];
    const queue = new PQueue({ concurrency: request.concurrency });
    const claimed = new Map<string, string>();

    try {
      for (const filePath of batch) {
        const destination = request.destinationOf?.(filePath);
        const owner = destination === undefined ? undefined : claimed.get(destination);
        if (destination !== undefined && owner !== undefined) {
          const outcome: Outcome = {
            kind: "failed",
            filePath,
            reason: `Output ${destination} is already produced from ${owner} in this batch`,
            attempts: 0,
          };
          outcomes.push(outcome);
          try {
            request.onOutcome?.(outcome);
          } catch (e) {
            hookErrors.push(e);
          }
          continue;
        }
        if (destination !== undefined) claimed.set(destination, filePath);

        void queue
          .add(async () => {
            const outcome = await this.runOne(filePath, request);
            outcomes.push(outcome);
            request.onOutcome?.(outcome);
          })
          .catch((e: unknown) => {
            hookErrors.push(e);
          });
      }
      await queue.onIdle();
    } finally {
      queue.clear();
    }
    // A throwing hook is a caller bug; siblings still ran to completion.
    if (hookErrors.length > 0) throw hookErrors[0];

    const stats = computeBatchStats(index, outcomes, Date.now() - startedAt);
    request.onBatchComplete?.(stats);
    return stats;
  }

  private async runOne(
    filePath: string,
    request: RunBatchesRequest,
  ): Promise<Outcome> {
    try {
      request.onFileStart?.(filePath);
      return await this.fileProcessor.execute(filePath);
    } catch (e) {
      return {
        kind: "failed",
        filePath,
        reason: `Unexpected error: ${errorMessage(e)}`,
        attempts: 0,
      };
    }
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got ${value}`,
    );
  }
}
