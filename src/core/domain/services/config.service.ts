import type { Config } from "../entities/config.entity.js";

export interface IConfigService {
  /** File the configuration was read from. */
  getSourcePath(): string;
  getConfig(): Config;
  getServerConfig(): Config["server"];
  getRunConfig(): Config["run"];
  getLoggingConfig(): Config["logging"];
}
