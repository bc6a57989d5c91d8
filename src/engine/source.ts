/**
 * Template and partial sources.
 *
 * The engine reads templates by name through a TemplateSource. A missing
 * template is fatal for the render; a missing partial is not, so the two
 * reads have different contracts:
 *
 *   readTemplate(name) → text, or throws TemplateLoadError
 *   readPartial(name)  → text, or undefined
 *
 * FileTemplateSource resolves names inside one directory and refuses names
 * that escape it. MemoryTemplateSource serves a fixed set of strings.
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { isAbsolute, join, relative, resolve } from "node:path";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateLoadError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly location: string,
    public readonly reason: string,
    message?: string
  ) {
    super(message ?? `Failed to load template "${templateName}" (${location}): ${reason}`);
    this.name = "TemplateLoadError";
  }
}

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface TemplateSource {
  readTemplate(name: string): string;
  readPartial(name: string): string | undefined;
}

// ---------------------------------------------------------------------------
// File system
// ---------------------------------------------------------------------------

export class FileTemplateSource implements TemplateSource {
  readonly baseDir: string;

  /**
   * @param baseDir - Directory holding templates and partials
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  /**
   * Absolute path for a name, or undefined when it points outside baseDir.
   */
  pathFor(name: string): string | undefined {
    const filePath = resolve(join(this.baseDir, name));
    const rel = relative(this.baseDir, filePath);
    if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
      return undefined;
    }
    return filePath;
  }

  readTemplate(name: string): string {
    const filePath = this.pathFor(name);
    if (filePath === undefined) {
      throw new TemplateLoadError(name, this.baseDir, "name resolves outside the template directory");
    }
    if (!existsSync(filePath)) {
      throw new TemplateLoadError(name, filePath, "file not found");
    }

    try {
      return readFileSync(filePath, "utf-8");
    } catch (err) {
      throw new TemplateLoadError(
        name,
        filePath,
        err instanceof Error ? err.message : String(err)
      );
    }
  }

  readPartial(name: string): string | undefined {
    const filePath = this.pathFor(name);
    if (filePath === undefined || !existsSync(filePath)) return undefined;
    if (!statSync(filePath).isFile()) return undefined;
    return readFileSync(filePath, "utf-8");
  }
}

// ---------------------------------------------------------------------------
// In memory
// ---------------------------------------------------------------------------

export class MemoryTemplateSource implements TemplateSource {
  private readonly files: ReadonlyMap<string, string>;

  constructor(files: Readonly<Record<string, string>>) {
    this.files = new Map(Object.entries(files));
  }

  readTemplate(name: string): string {
    const text = this.files.get(name);
    if (text === undefined) {
      throw new TemplateLoadError(name, `memory:${name}`, "no such template");
    }
    return text;
  }

  readPartial(name: string): string | undefined {
    return this.files.get(name);
  }
}
