import type { ServiceResponse } from "../entities/processing-request.entity.js";

export const HTTP_OK = 200;
export const HTTP_SERVICE_UNAVAILABLE = 503;

export type RetryDecision =
  | { action: "accept"; body: string }
  | { action: "retry"; delayMs: number }
  | { action: "fail"; statusCode: number };

/**
 * 200 is accepted, 503 is the server asking to come back later,
 * anything else is final for that file.
 */
export class RetryPolicy {
  constructor(
    private readonly sleepTimeMs: number,
    /** `null` means no cap on 503 retries. */
    private readonly maxRetries: number | null = null,
  ) {}

  classify(response: ServiceResponse): RetryDecision {
    if (response.statusCode === HTTP_OK) {
      return { action: "accept", body: response.body };
    }
    if (response.statusCode === HTTP_SERVICE_UNAVAILABLE) {
      return { action: "retry", delayMs: this.sleepTimeMs };
    }
    return { action: "fail", statusCode: response.statusCode };
  }

  /** `retriesSoFar` counts re-submissions already made for the file. */
  canRetry(retriesSoFar: number): boolean {
    return this.maxRetries === null || retriesSoFar < this.maxRetries;
  }
}
