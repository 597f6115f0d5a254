import type {
  ProcessingRequest,
  ServiceResponse,
} from "../entities/processing-request.entity.js";

export interface IExtractionService {
  /** Absolute URL a request is posted to, for logging. */
  endpointFor(request: ProcessingRequest): string;
  /**
   * Send one file. Resolves with whatever status the server answered;
   * rejects with a TransportError when no answer arrived.
   */
  submit(request: ProcessingRequest): Promise<ServiceResponse>;
  isAlive(): Promise<boolean>;
}
