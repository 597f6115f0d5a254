import {
  createProcessingRequest,
  type OptionSet,
  type ServiceOperation,
  type ServiceResponse,
} from "../domain/entities/processing-request.entity.js";
import type { Outcome } from "../domain/entities/outcome.entity.js";
import type { IExtractionService } from "../domain/services/extraction.service.js";
import type { IResultWriter } from "../domain/services/result-writer.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import { RetryPolicy } from "../domain/services/retry-policy.service.js";
import { TransportError, errorMessage } from "../domain/errors.js";

export interface ProcessFileSettings {
  operation: ServiceOperation;
  options: OptionSet;
  /** Re-process files whose output already exists. */
  force: boolean;
}

export interface ProcessFileHooks {
  onRetry?: (filePath: string, attempt: number, delayMs: number) => void;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class ProcessFileUseCase {
  constructor(
    private extractionService: IExtractionService,
    private resultWriter: IResultWriter,
    private retryPolicy: RetryPolicy,
    private logger: ILogger,
    private settings: ProcessFileSettings,
    private hooks: ProcessFileHooks = {},
    private sleep: Sleep = defaultSleep,
  ) {}

  /** Resolves with the file's terminal outcome; never rejects. */
  async execute(filePath: string): Promise<Outcome> {
    const outputPath = this.resultWriter.resolveOutputPath(filePath);

    try {
      if (!this.settings.force && (await this.resultWriter.exists(outputPath))) {
        return {
          kind: "skipped",
          filePath,
          outputPath,
          reason: `${outputPath} already exists (use --force to reprocess)`,
        };
      }
    } catch (e) {
      return {
        kind: "failed",
        filePath,
        reason: `Check output: ${errorMessage(e)}`,
        attempts: 0,
      };
    }

    const request = createProcessingRequest(
      filePath,
      this.settings.operation,
      this.settings.options,
    );
    const url = this.extractionService.endpointFor(request);

    let attempt = 0;
    while (true) {
      attempt += 1;

      let response: ServiceResponse;
      try {
        response = await this.extractionService.submit(request);
      } catch (e) {
        const message = errorMessage(e);
        this.logger.log({
          filePath,
          operation: request.operation,
          attempt,
          request: { method: "POST", url },
          decision: "transport-error",
          errorMessage: message,
        });
        return {
          kind: "failed",
          filePath,
          reason:
            e instanceof TransportError
              ? `Transport error: ${message}`
              : `Submit failed: ${message}`,
          attempts: attempt,
        };
      }

      const decision = this.retryPolicy.classify(response);
      this.logger.log({
        filePath,
        operation: request.operation,
        attempt,
        request: { method: "POST", url },
        response: {
          statusCode: response.statusCode,
          latencyMs: response.latencyMs,
          bodyLength: response.body.length,
        },
        decision: decision.action,
      });

      if (decision.action === "fail") {
        return {
          kind: "failed",
          filePath,
          reason: `Processing failed, response status code: ${decision.statusCode}`,
          statusCode: decision.statusCode,
          attempts: attempt,
          latencyMs: response.latencyMs,
        };
      }

      if (decision.action === "retry") {
        const retriesSoFar = attempt - 1;
        if (!this.retryPolicy.canRetry(retriesSoFar)) {
          return {
            kind: "failed",
            filePath,
            reason: `Server still busy after ${retriesSoFar} retr${retriesSoFar === 1 ? "y" : "ies"}`,
            statusCode: response.statusCode,
            attempts: attempt,
            latencyMs: response.latencyMs,
          };
        }
        this.hooks.onRetry?.(filePath, attempt, decision.delayMs);
        await this.sleep(decision.delayMs);
        continue;
      }

      const written = await this.resultWriter.write(outputPath, decision.body);
      if (!written.ok) {
        return {
          kind: "failed",
          filePath,
          reason: `Write ${outputPath}: ${written.errorMessage}`,
          attempts: attempt,
          latencyMs: response.latencyMs,
        };
      }
      return {
        kind: "written",
        filePath,
        outputPath,
        attempts: attempt,
        latencyMs: response.latencyMs,
      };
    }
  }
}
