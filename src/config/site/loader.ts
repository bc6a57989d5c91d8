/**
 * Site configuration loader and validator.
 *
 * Responsible for:
 * - Reading configuration files from the content directory
 * - Validating against the schemas with fail-fast behavior
 * - Producing structured error messages
 * - Freezing the context so renders cannot mutate it
 */

import { existsSync, readFileSync } from "node:fs";
import type { ZodIssue } from "zod";

import {
  ContextMappingSchema,
  SiteSettingsSchema,
  type SiteConfig,
} from "./schema.js";

/**
 * Individual validation issue.
 */
export interface SiteConfigIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "io" / "json" for read and parse failures */
  code: string;
}

/**
 * Structured error for an unusable site configuration.
 */
export class SiteConfigError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: SiteConfigIssue[],
    message?: string
  ) {
    super(message ?? `Invalid site configuration ${source}: ${issues.length} problem(s)`);
    this.name = "SiteConfigError";
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [`Site configuration ${this.source} is invalid:`];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): SiteConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate a parsed configuration object.
 *
 * @param input  - Parsed JSON
 * @param source - Label for error messages (usually the file path)
 * @throws SiteConfigError if validation fails
 */
export function loadSiteConfig(input: unknown, source = "(inline)"): SiteConfig {
  const context = ContextMappingSchema.safeParse(input);
  if (!context.success) {
    throw new SiteConfigError(source, formatZodIssues(context.error.issues));
  }

  const settings = SiteSettingsSchema.safeParse(input);
  if (!settings.success) {
    throw new SiteConfigError(source, formatZodIssues(settings.error.issues));
  }

  return {
    settings: deepFreeze(settings.data),
    context: deepFreeze(context.data),
  };
}

/**
 * Read and validate a JSON site configuration file.
 *
 * @throws SiteConfigError if the file is missing, unreadable, not JSON or invalid
 */
export function readSiteConfigFile(filePath: string): SiteConfig {
  if (!existsSync(filePath)) {
    throw new SiteConfigError(filePath, [
      { path: [], message: "file not found", code: "io" },
    ]);
  }

  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SiteConfigError(filePath, [{ path: [], message, code: "io" }]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SiteConfigError(filePath, [{ path: [], message, code: "json" }]);
  }

  return loadSiteConfig(parsed, filePath);
}
