export interface ServerConfig {
  /** Host name, or a full origin such as `https://grobid.example.org`. */
  host: string;
  port: number | null;
  timeoutMs: number;
  /** Sent as a bearer token, for servers behind an authenticating proxy. */
  apiToken?: string;
}

export interface RunConfig {
  batchSize: number;
  concurrency: number;
  /** Delay before a file answered with 503 is sent again. */
  sleepTimeMs: number;
  /** `null` keeps retrying 503 answers until the server accepts the file. */
  maxRetries: number | null;
  coordinates: string;
}

export interface LoggingConfig {
  dir: string;
  requestLog: string;
}

export interface Config {
  server: ServerConfig;
  run: RunConfig;
  logging: LoggingConfig;
}
