import {
  createOptionSet,
  isServiceOperation,
  SERVICE_OPERATIONS,
  type OptionSet,
  type ServiceOperation,
} from "../core/domain/entities/processing-request.entity.js";
import { ConfigurationError } from "../core/domain/errors.js";
import { CliOptionsSchema, formatIssues, type CliOptions } from "./validation.js";

export const DEFAULT_CONCURRENCY = 10;

export function parseService(service: string): ServiceOperation {
  if (!isServiceOperation(service)) {
    throw new ConfigurationError(
      `Unknown service "${service}", expected one of [${SERVICE_OPERATIONS.join(", ")}]`,
    );
  }
  return service;
}

export function parseCliOptions(raw: unknown): CliOptions {
  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid options. ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * `--concurrency` wins over the config file. A value that is not a positive
 * integer falls back to DEFAULT_CONCURRENCY with a warning.
 */
export function resolveConcurrency(
  raw: string | undefined,
  configured: number,
  warn: (message: string) => void,
): number {
  if (raw === undefined) return configured;
  const n = Number(raw.trim());
  if (!Number.isInteger(n) || n < 1) {
    warn(
      `Invalid concurrency: ${raw}, ${DEFAULT_CONCURRENCY} will be used by default`,
    );
    return DEFAULT_CONCURRENCY;
  }
  return n;
}

export function buildOptionSet(
  opts: Pick<
    CliOptions,
    "generateIds" | "consolidateHeader" | "consolidateCitations" | "teiCoordinates"
  >,
  coordinates: string,
): OptionSet {
  return createOptionSet({
    generateIds: opts.generateIds,
    consolidateHeader: opts.consolidateHeader,
    consolidateCitations: opts.consolidateCitations,
    includeCoordinates: opts.teiCoordinates,
    coordinateScheme: coordinates,
  });
}
