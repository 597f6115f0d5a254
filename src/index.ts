#!/usr/bin/env node
/**
 * GROBID batch runner – CLI
 * Command: process <service>
 */

import { program } from "commander";
import { existsSync, mkdirSync } from "node:fs";
import { ConfigService } from "./infrastructure/services/config.service.js";
import { GrobidExtractionService } from "./infrastructure/services/grobid-extraction.service.js";
import { FileResultWriter } from "./infrastructure/services/file-result-writer.service.js";
import { JsonLogger } from "./infrastructure/services/json-logger.service.js";
import { RetryPolicy } from "./core/domain/services/retry-policy.service.js";
import { CheckServiceUseCase } from "./core/use-cases/check-service.use-case.js";
import { DiscoverFilesUseCase } from "./core/use-cases/discover-files.use-case.js";
import { ProcessFileUseCase } from "./core/use-cases/process-file.use-case.js";
import { RunBatchesUseCase } from "./core/use-cases/run-batches.use-case.js";
import { SERVICE_OPERATIONS } from "./core/domain/entities/processing-request.entity.js";
import { errorMessage } from "./core/domain/errors.js";
import {
  buildOptionSet,
  parseCliOptions,
  parseService,
  resolveConcurrency,
} from "./adapters/cli-options.js";
import { runId as newRunId } from "./infrastructure/utils/id.utils.js";
import {
  consoleSink,
  createProgressHooks,
  printSummary,
} from "./infrastructure/utils/progress.utils.js";

const stdoutPiped = !process.stdout.isTTY;

process.on("SIGTERM", () => process.exit(143));

program
  .name("grobid-batch-runner")
  .description("Send directories of PDF files to a GROBID server and store the TEI results")
  .option("-c, --config <path>", "Config file path (default: CONFIG_PATH or config/config.yaml)");

program
  .command("process")
  .description("Process every PDF under --input with one GROBID service")
  .argument("<service>", `one of [${SERVICE_OPERATIONS.join(", ")}]`)
  .requiredOption("--input <dir>", "Directory containing the PDF files to process")
  .option("--output <dir>", "Directory for the results (default: beside each PDF)")
  .option("-n, --concurrency <n>", "Concurrent requests (default: number_of_processes)")
  .option("--generate-ids", "Generate random xml:id on textual XML elements of the results")
  .option("--consolidate-header", "Consolidate the metadata extracted from the header")
  .option("--consolidate-citations", "Consolidate the extracted bibliographical references")
  .option("--force", "Re-process PDF files whose TEI output already exists")
  .option("--tei-coordinates", "Add PDF coordinates (bounding boxes) to the extracted elements")
  .action(async (service: string, cmdOpts: unknown) => {
    const sink = consoleSink(stdoutPiped);
    let extractionService: GrobidExtractionService | undefined;
    let logger: JsonLogger | undefined;
    try {
      const operation = parseService(service);
      const opts = parseCliOptions({
        ...(cmdOpts !== null && typeof cmdOpts === "object" ? cmdOpts : {}),
        config: program.opts<{ config?: string }>().config,
      });
      const configService = new ConfigService(opts.config);
      const config = configService.getConfig();
      sink.info(`Configuration loaded: ${configService.getSourcePath()}`);

      const concurrency = resolveConcurrency(
        opts.concurrency,
        config.run.concurrency,
        sink.warn,
      );

      if (opts.output !== undefined && !existsSync(opts.output)) {
        sink.info(`Output directory does not exist but will be created: ${opts.output}`);
        mkdirSync(opts.output, { recursive: true });
      }

      extractionService = new GrobidExtractionService(config.server);
      await new CheckServiceUseCase(extractionService).execute();
      sink.info(`GROBID server is up and running at ${extractionService.getApiBase()}`);

      const files = new DiscoverFilesUseCase(undefined, sink.warn).execute(opts.input);

      const runId = newRunId();
      sink.machine?.(`RUN_ID\t${runId}`);
      logger = new JsonLogger(config.logging.dir, config.logging.requestLog);
      logger.init(runId);

      const hooks = createProgressHooks(sink);
      const resultWriter = new FileResultWriter(opts.output);
      const processFile = new ProcessFileUseCase(
        extractionService,
        resultWriter,
        new RetryPolicy(config.run.sleepTimeMs, config.run.maxRetries),
        logger,
        {
          operation,
          options: buildOptionSet(opts, config.run.coordinates),
          force: opts.force,
        },
        { onRetry: hooks.onRetry },
      );

      const summary = await new RunBatchesUseCase(processFile).execute({
        files,
        batchSize: config.run.batchSize,
        concurrency,
        destinationOf: (filePath) => resultWriter.resolveOutputPath(filePath),
        ...hooks,
      });

      printSummary(sink, summary);
      const logPath = logger.getPath();
      if (logPath) sink.info(`Request log: ${logPath}`);
    } catch (e) {
      sink.error(`Run failed: ${errorMessage(e)}`);
      process.exitCode = 1;
    } finally {
      await logger?.close();
      await extractionService?.close();
    }
  });

program.parseAsync().catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exit(1);
});
