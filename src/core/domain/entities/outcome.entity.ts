export interface WrittenOutcome {
  kind: "written";
  filePath: string;
  outputPath: string;
  attempts: number;
  latencyMs: number;
}

export interface SkippedOutcome {
  kind: "skipped";
  filePath: string;
  outputPath: string;
  reason: string;
}

export interface FailedOutcome {
  kind: "failed";
  filePath: string;
  reason: string;
  /** Absent when no HTTP status was received (transport or disk error). */
  statusCode?: number;
  attempts: number;
  latencyMs?: number;
}

export type Outcome = WrittenOutcome | SkippedOutcome | FailedOutcome;

export type OutcomeKind = Outcome["kind"];

/** Attempts above one mean the server answered 503 at least once. */
export function wasRetried(outcome: Outcome): boolean {
  return outcome.kind !== "skipped" && outcome.attempts > 1;
}
