/**
 * GROBID REST client.
 * POST /api/{operation} with the PDF under `input` (multipart/form-data),
 * GET /api/isalive for the startup probe.
 * Uses undici with a custom connect/body timeout (server.timeoutMs); Node's
 * default fetch has a 10s connect limit and no body limit.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { fetch, Agent, FormData } from "undici";
import type { ServerConfig } from "../../core/domain/entities/config.entity.js";
import type {
  OptionSet,
  ProcessingRequest,
  ServiceResponse,
} from "../../core/domain/entities/processing-request.entity.js";
import type { IExtractionService } from "../../core/domain/services/extraction.service.js";
import { TransportError, errorMessage } from "../../core/domain/errors.js";

/** `http://host[:port]`; a host that already names a scheme is kept as is. */
export function buildApiBase(server: Pick<ServerConfig, "host" | "port">): string {
  const host = server.host.replace(/\/+$/, "");
  const base = /^https?:\/\//i.test(host) ? host : `http://${host}`;
  return server.port ? `${base}:${server.port}` : base;
}

/** Form fields for the enabled options. */
export function buildFormFields(options: OptionSet): Array<[string, string]> {
  const fields: Array<[string, string]> = [];
  if (options.generateIds) fields.push(["generate_ids", "1"]);
  if (options.consolidateHeader) fields.push(["consolidate_header", "1"]);
  if (options.consolidateCitations) fields.push(["consolidate_citations", "1"]);
  if (options.includeCoordinates) {
    fields.push(["tei_coordinates", options.coordinateScheme]);
  }
  return fields;
}

function buildHeaders(apiToken?: string): Record<string, string> {
  const headers: Record<string, string> = { Accept: "text/plain" };
  if (apiToken) headers.Authorization = `Bearer ${apiToken}`;
  return headers;
}

function describeFetchError(err: unknown): string {
  const message = errorMessage(err);
  const cause =
    err instanceof Error && err.cause instanceof Error
      ? err.cause.message
      : err instanceof Error && err.cause
        ? String(err.cause)
        : "";
  return cause ? `${message} (${cause})` : message;
}

export class GrobidExtractionService implements IExtractionService {
  private readonly apiBase: string;
  private readonly dispatcher: Agent;
  private readonly headers: Record<string, string>;

  constructor(server: ServerConfig) {
    this.apiBase = buildApiBase(server);
    this.headers = buildHeaders(server.apiToken);
    this.dispatcher = new Agent({
      connectTimeout: server.timeoutMs,
      bodyTimeout: server.timeoutMs,
      headersTimeout: server.timeoutMs,
    });
  }

  getApiBase(): string {
    return this.apiBase;
  }

  endpointFor(request: ProcessingRequest): string {
    return `${this.apiBase}/api/${request.operation}`;
  }

  async submit(request: ProcessingRequest): Promise<ServiceResponse> {
    const url = this.endpointFor(request);
    const fileBuffer = await readFile(request.filePath);

    const form = new FormData();
    form.append(
      "input",
      new Blob([fileBuffer], { type: "application/pdf" }),
      basename(request.filePath),
    );
    for (const [name, value] of buildFormFields(request.options)) {
      form.append(name, value);
    }

    const start = Date.now();
    try {
      const res = await fetch(url, {
        method: "POST",
        headers: this.headers,
        body: form,
        dispatcher: this.dispatcher,
      });
      const body = await res.text();
      return {
        statusCode: res.status,
        body,
        latencyMs: Date.now() - start,
      };
    } catch (err) {
      throw new TransportError(describeFetchError(err), url, { cause: err });
    }
  }

  async isAlive(): Promise<boolean> {
    try {
      return (await this.probe()) === 200;
    } catch (e) {
      if (e instanceof TransportError) return false;
      throw e;
    }
  }

  /** Status of GET /api/isalive; throws TransportError when unreachable. */
  private async probe(): Promise<number> {
    const url = `${this.apiBase}/api/isalive`;
    try {
      const res = await fetch(url, {
        method: "GET",
        headers: this.headers,
        dispatcher: this.dispatcher,
      });
      await res.text();
      return res.status;
    } catch (err) {
      throw new TransportError(describeFetchError(err), url, { cause: err });
    }
  }

  close(): Promise<void> {
    return this.dispatcher.close();
  }
}
