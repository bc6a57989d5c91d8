/**
 * sitesmith public API.
 */

export * from "./engine/index.js";
export {
  loadAppConfig,
  loadSiteConfig,
  readSiteConfigFile,
  ConfigError,
  SiteConfigError,
  type AppConfig,
  type SiteConfig,
  type SiteSettings,
} from "./config/index.js";
export {
  generateSite,
  OutputWriteError,
  DEFAULT_CONFIG_NAME,
  type GenerateOptions,
  type GenerateResult,
} from "./site/generate.js";
export { createLogger, createNullLogger, type Logger, type LogLevel } from "./logging/index.js";
