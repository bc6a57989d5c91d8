/**
 * Site configuration module.
 */

export {
  ContextValueSchema,
  ContextMappingSchema,
  SiteSettingsSchema,
  type SiteSettings,
  type SiteConfig,
} from "./schema.js";

export {
  loadSiteConfig,
  readSiteConfigFile,
  SiteConfigError,
  type SiteConfigIssue,
} from "./loader.js";
