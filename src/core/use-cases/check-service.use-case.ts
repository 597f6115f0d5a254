import type { IExtractionService } from "../domain/services/extraction.service.js";
import { ServiceUnavailableError } from "../domain/errors.js";

/** Startup probe; a dead server stops the run before any file is read. */
export class CheckServiceUseCase {
  constructor(private extractionService: IExtractionService) {}

  async execute(): Promise<void> {
    if (!(await this.extractionService.isAlive())) {
      throw new ServiceUnavailableError("GROBID server is down.");
    }
  }
}
