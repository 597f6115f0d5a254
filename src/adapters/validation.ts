import { z } from "zod";

/**
 * Validation schemas for the config file and CLI options.
 * Values substituted from the environment arrive as strings, so numeric
 * fields accept digit strings too.
 */

const fromNumericString = (v: unknown): unknown =>
  typeof v === "string" && /^\s*\d+(\.\d+)?\s*$/.test(v) ? Number(v) : v;

const positiveInt = z.preprocess(fromNumericString, z.number().int().min(1));

const nullableCount = z.preprocess(
  (v) => (v === "" || v === undefined ? null : fromNumericString(v)),
  z.number().int().min(0).nullable(),
);

export const FileConfigSchema = z.object({
  grobid_server: z.string().trim().min(1, "grobid_server is required"),
  grobid_port: z.preprocess(
    (v) => (v === "" || v === undefined ? null : fromNumericString(v)),
    z.number().int().min(1).max(65535).nullable(),
  ),
  batch_size: positiveInt.default(1000),
  number_of_processes: positiveInt.default(10),
  sleep_time: z
    .preprocess(fromNumericString, z.number().min(0))
    .default(5),
  timeout_ms: positiveInt.default(180000),
  max_retries: nullableCount.default(null),
  coordinates: z
    .union([z.string(), z.array(z.string()).transform((a) => a.join(","))])
    .default("persName,figure,ref,biblStruct,formula,s"),
  logging: z
    .object({
      dir: z.string().min(1).default("logs"),
      request_log: z.string().min(1).default("requests.jsonl"),
    })
    .default({}),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

export const CliOptionsSchema = z.object({
  input: z.string().min(1, "--input is required"),
  output: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  concurrency: z.string().optional(),
  generateIds: z.boolean().default(false),
  consolidateHeader: z.boolean().default(false),
  consolidateCitations: z.boolean().default(false),
  force: z.boolean().default(false),
  teiCoordinates: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join(", ");
}
