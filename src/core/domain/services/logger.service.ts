import type { ServiceOperation } from "../entities/processing-request.entity.js";

export type AttemptDecision = "accept" | "retry" | "fail" | "transport-error";

/** One submission attempt of one file. */
export interface LogEntry {
  filePath: string;
  operation: ServiceOperation;
  attempt: number;
  request: {
    method: string;
    url: string;
  };
  response?: {
    statusCode: number;
    latencyMs: number;
    bodyLength: number;
  };
  decision: AttemptDecision;
  errorMessage?: string;
}

export interface ILogger {
  init(runId: string): void;
  log(entry: LogEntry): void;
  close(): Promise<void>;
}
