export const SERVICE_OPERATIONS = [
  "processFulltextDocument",
  "processHeaderDocument",
  "processReferences",
] as const;

export type ServiceOperation = (typeof SERVICE_OPERATIONS)[number];

export function isServiceOperation(value: string): value is ServiceOperation {
  return (SERVICE_OPERATIONS as readonly string[]).includes(value);
}

/** Flags forwarded to the service with every file of a run. */
export interface OptionSet {
  readonly generateIds: boolean;
  readonly consolidateHeader: boolean;
  readonly consolidateCitations: boolean;
  readonly includeCoordinates: boolean;
  /** Comma-separated TEI element names that receive coordinates. */
  readonly coordinateScheme: string;
}

export interface ProcessingRequest {
  readonly filePath: string;
  readonly operation: ServiceOperation;
  readonly options: OptionSet;
}

export interface ServiceResponse {
  statusCode: number;
  body: string;
  latencyMs: number;
}

export function createOptionSet(options: OptionSet): OptionSet {
  return Object.freeze({ ...options });
}

export function createProcessingRequest(
  filePath: string,
  operation: ServiceOperation,
  options: OptionSet,
): ProcessingRequest {
  return Object.freeze({ filePath, operation, options });
}
