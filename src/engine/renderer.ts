/**
 * Template renderer.
 *
 * Runs the fixed pipeline for one template:
 *
 *   1. read the template from the source (TemplateLoadError if it can't be)
 *   2. include expansion on the raw text
 *   3. parse into nodes
 *   4. conditional expansion against the full context
 *   5. loop expansion against the full context
 *   6. variable substitution against the full context
 *
 * Rendering never fails on template content. Unresolvable paths render as
 * "" (or their default), and block tags that do not pair up by id are
 * emitted as literal text. Only an unreadable template is an error.
 *
 * The engine keeps no state between calls beyond its source.
 */

import { createNullLogger, type Logger } from "../logging/index.js";
import { expandConditionals } from "./conditional.js";
import type { ContextMapping } from "./context.js";
import { expandIncludes } from "./include.js";
import { expandLoops } from "./loop.js";
import { parseTemplate } from "./parser.js";
import { FileTemplateSource, type TemplateSource } from "./source.js";
import { substituteVariables } from "./substitute.js";

export interface TemplateEngineOptions {
  /** Where templates and partials come from. Takes precedence over templateDir. */
  source?: TemplateSource;
  /** Directory for a FileTemplateSource when no source is given (default "."). */
  templateDir?: string;
  logger?: Logger;
}

export class TemplateEngine {
  readonly source: TemplateSource;
  private readonly logger: Logger;

  constructor(options: TemplateEngineOptions = {}) {
    this.source = options.source ?? new FileTemplateSource(options.templateDir ?? ".");
    this.logger = options.logger ?? createNullLogger();
  }

  /**
   * Render a named template against a context.
   *
   * @throws TemplateLoadError if the template cannot be read
   */
  render(templateName: string, context: ContextMapping): string {
    const text = this.source.readTemplate(templateName);
    this.logger.debug("Rendering template", { template: templateName, chars: text.length });
    return this.renderString(text, context);
  }

  /**
   * Render template text that is already in hand. Includes are still
   * read from the engine's source.
   */
  renderString(text: string, context: ContextMapping): string {
    const included = expandIncludes(text, (name) => this.source.readPartial(name), this.logger);
    const nodes = parseTemplate(included);
    const withoutConditionals = expandConditionals(nodes, context);
    const flat = expandLoops(withoutConditionals, context);
    return substituteVariables(flat, context);
  }
}
