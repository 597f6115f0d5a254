export type WriteResult =
  | { ok: true; outputPath: string }
  | { ok: false; outputPath: string; errorMessage: string };

export interface IResultWriter {
  resolveOutputPath(filePath: string): string;
  exists(outputPath: string): Promise<boolean>;
  /** Never rejects: disk errors come back as `ok: false`. */
  write(outputPath: string, body: string): Promise<WriteResult>;
}
