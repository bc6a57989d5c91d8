/**
 * Include expansion.
 *
 * `{% include "header.html" %}` is replaced by the raw contents of the
 * named partial before anything else is parsed. Every occurrence of the
 * same directive text receives the same contents. A partial the source
 * cannot provide leaves its directive in place.
 *
 * Replacement is a single pass: directives that appear inside an included
 * partial are not expanded. Other directives in a partial (variables,
 * conditionals, loops) are processed by the later passes like inline text.
 */

import type { Logger } from "../logging/index.js";

/**
 * Groups:
 *   1: partial name
 */
const INCLUDE_RE = /\{%\s*include\s*"(.*?)"\s*%\}/g;

export type PartialReader = (name: string) => string | undefined;

export function expandIncludes(
  source: string,
  readPartial: PartialReader,
  logger?: Logger
): string {
  // One lookup per distinct directive text.
  const contents = new Map<string, string | undefined>();
  for (const match of source.matchAll(INCLUDE_RE)) {
    const [raw, name] = match;
    if (contents.has(raw)) continue;

    const partial = readPartial(name);
    if (partial === undefined) {
      logger?.debug("Partial not found, leaving include in place", { partial: name });
    }
    contents.set(raw, partial);
  }

  return source.replace(INCLUDE_RE, (raw: string) => contents.get(raw) ?? raw);
}
