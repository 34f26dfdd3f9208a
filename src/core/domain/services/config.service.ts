import { Config } from "../entities/config.entity.js";

export interface IConfigService {
  getConfig(): Config;
  getSourceConfig(): Config["source"];
  getServerConfig(): Config["server"];
  getLoggingConfig(): Config["logging"];
}
