/**
 * Site generation: configuration file in, rendered page on disk out.
 *
 *   content/<configName>  ──load──▶  SiteConfig
 *                                      │ settings.template_path / template
 *                                      ▼
 *                               TemplateEngine.render(template, context)
 *                                      │
 *                                      ▼
 *                          <settings.outpath>/<settings.render>
 *
 * Relative paths in the configuration are resolved against `cwd`.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import { readSiteConfigFile } from "../config/site/index.js";
import { TemplateEngine } from "../engine/index.js";
import { createNullLogger, initRunId, type Logger } from "../logging/index.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class OutputWriteError extends Error {
  constructor(
    public readonly outputPath: string,
    public readonly reason: string,
    message?: string
  ) {
    super(message ?? `Could not write ${outputPath}: ${reason}`);
    this.name = "OutputWriteError";
  }
}

// ---------------------------------------------------------------------------
// Options / result
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG_NAME = "content.json";

export interface GenerateOptions {
  /** Configuration file name inside contentDir (default "content.json") */
  configName?: string;
  /** Directory holding configuration files (default "content") */
  contentDir?: string;
  /** Base directory for relative paths (default process.cwd()) */
  cwd?: string;
  logger?: Logger;
}

export interface GenerateResult {
  runId: string;
  configPath: string;
  templateName: string;
  outputPath: string;
  /** UTF-8 byte length of the written page */
  bytes: number;
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Render one site configuration to its output file.
 *
 * @throws SiteConfigError    if the configuration is missing or invalid
 * @throws TemplateLoadError  if the template cannot be read
 * @throws OutputWriteError   if the output directory or file cannot be written
 */
export function generateSite(options: GenerateOptions = {}): GenerateResult {
  const runId = initRunId();
  const logger = options.logger ?? createNullLogger();
  const cwd = options.cwd ?? process.cwd();
  const configName = options.configName ?? DEFAULT_CONFIG_NAME;

  const configPath = resolve(cwd, options.contentDir ?? "content", configName);
  const { settings, context } = readSiteConfigFile(configPath);
  logger.debug("Site configuration loaded", { config: configPath, keys: Object.keys(context).length });

  const outputDir = resolve(cwd, settings.outpath);
  try {
    mkdirSync(outputDir, { recursive: true });
  } catch (err) {
    throw new OutputWriteError(outputDir, errorMessage(err));
  }

  const engine = new TemplateEngine({
    templateDir: resolve(cwd, settings.template_path),
    logger: logger.child("engine"),
  });
  const rendered = engine.render(settings.template, context);

  const outputPath = join(outputDir, settings.render);
  try {
    writeFileSync(outputPath, rendered, "utf-8");
  } catch (err) {
    throw new OutputWriteError(outputPath, errorMessage(err));
  }

  const bytes = Buffer.byteLength(rendered, "utf-8");
  logger.info("Site generated", { output: outputPath, template: settings.template, bytes });

  return {
    runId,
    configPath,
    templateName: settings.template,
    outputPath,
    bytes,
  };
}
