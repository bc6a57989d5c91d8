#!/usr/bin/env node
/**
 * CLI entry point: render a site configuration to disk.
 *
 * USAGE
 *
 *   sitesmith                     renders content/content.json
 *   sitesmith blog.json           renders content/blog.json
 *   sitesmith blog.json --content-dir sites/
 *
 * Options:
 *   --content-dir <dir>   Directory holding configuration files
 *                         (default: $SITESMITH_CONTENT_DIR or content/)
 *   -h, --help            Show help
 *
 * Environment:
 *   LOG_LEVEL, DEBUG, NODE_ENV, APP_NAME, SITESMITH_LOG_FILE
 *
 * Exit codes:
 *   0 - Page written
 *   1 - Error (bad configuration, missing template, unwritable output)
 */

import { parseArgs } from "node:util";

import {
  loadAppConfig,
  ConfigError,
  SiteConfigError,
  type AppConfig,
} from "../config/index.js";
import { TemplateLoadError } from "../engine/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import { DEFAULT_CONFIG_NAME, generateSite, OutputWriteError } from "../site/generate.js";

const HELP = `
Usage: sitesmith [config-name] [options]

Renders <content-dir>/<config-name> (default: ${DEFAULT_CONFIG_NAME}) to the
file named by its "outpath" and "render" settings.

Options:
  --content-dir <dir>   Directory holding configuration files (default: content/)
  -h, --help            Show this help message

Exit codes:
  0 - Page written
  1 - Error
`;

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      "content-dir": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  return {
    configName: positionals[0] ?? DEFAULT_CONFIG_NAME,
    contentDir: values["content-dir"],
    help: values.help === true,
  };
}

/**
 * Log a failure the way each error type reads best.
 */
function reportError(logger: Logger, err: unknown): void {
  if (err instanceof SiteConfigError) {
    logger.error(err.format());
  } else if (err instanceof TemplateLoadError) {
    logger.error("Template could not be loaded", {
      template: err.templateName,
      location: err.location,
      reason: err.reason,
    });
  } else if (err instanceof OutputWriteError) {
    logger.error("Site generation failed", { output: err.outputPath, reason: err.reason });
  } else if (err instanceof ConfigError) {
    logger.error("Configuration error", { message: err.message });
  } else {
    logger.error(err instanceof Error ? err.message : String(err));
  }
}

function main(): number {
  let config: AppConfig;
  try {
    config = loadAppConfig();
  } catch (err) {
    reportError(createLogger({ component: "cli" }), err);
    return 1;
  }

  const logger = createLogger({
    level: config.logLevel,
    component: config.appName,
    file: config.logToFile,
  });

  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs();
  } catch (err) {
    reportError(logger, err);
    console.error(HELP);
    return 1;
  }

  if (args.help) {
    console.log(HELP);
    return 0;
  }

  try {
    const result = generateSite({
      configName: args.configName,
      contentDir: args.contentDir ?? config.contentDir,
      logger,
    });
    console.log(`Site generated successfully.\nFile saved at: ${result.outputPath}`);
    return 0;
  } catch (err) {
    reportError(logger, err);
    return 1;
  }
}

process.exitCode = main();
