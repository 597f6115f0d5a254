import { access, open, rename, rm } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import type {
  IResultWriter,
  WriteResult,
} from "../../core/domain/services/result-writer.service.js";
import { errorMessage } from "../../core/domain/errors.js";
import { resolveTeiPath } from "../utils/output-path.utils.js";

/**
 * Writes each body to a private temp file next to the destination and
 * renames it into place, so an interrupted write never leaves a file that
 * the skip check would take for finished output.
 */
export class FileResultWriter implements IResultWriter {
  constructor(private outputDir?: string) {}

  resolveOutputPath(filePath: string): string {
    return resolveTeiPath(filePath, this.outputDir);
  }

  async exists(outputPath: string): Promise<boolean> {
    try {
      await access(outputPath);
      return true;
    } catch {
      return false;
    }
  }

  async write(outputPath: string, body: string): Promise<WriteResult> {
    const tmpPath = `${outputPath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
    try {
      const handle = await open(tmpPath, "wx");
      try {
        await handle.writeFile(body, "utf-8");
      } finally {
        await handle.close();
      }
      await rename(tmpPath, outputPath);
      return { ok: true, outputPath };
    } catch (e) {
      try {
        await rm(tmpPath, { force: true });
      } catch (cleanupError) {
        return {
          ok: false,
          outputPath,
          errorMessage: `${errorMessage(e)} (could not remove ${tmpPath}: ${errorMessage(cleanupError)})`,
        };
      }
      return { ok: false, outputPath, errorMessage: errorMessage(e) };
    }
  }
}
