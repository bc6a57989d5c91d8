/**
 * Path resolution against a render scope.
 *
 * A path expression is a dotted path, optionally followed by a default
 * filter:
 *
 *   user.name
 *   education.2.institute
 *   missing.path | default:'N/A'
 *
 * Segments that are all digits index into sequences (zero-based). Every
 * other segment must be an own key of the current mapping. A failed walk
 * never throws; it yields the default literal when one was given, and an
 * absent resolution otherwise. Callers decide what "absent" means for them.
 */

import {
  isMapping,
  isSequence,
  toDisplayString,
  type ContextValue,
  type Scope,
} from "./context.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Resolution =
  | { readonly kind: "resolved"; readonly value: ContextValue }
  | { readonly kind: "defaulted"; readonly value: string }
  | { readonly kind: "absent" };

export interface PathExpression {
  /** Path segments, trimmed. */
  segments: string[];
  /** Literal from `| default:'…'`, quotes stripped. */
  defaultValue?: string;
}

const ABSENT: Resolution = { kind: "absent" };

const INDEX_RE = /^\d+$/;
const SURROUNDING_QUOTES_RE = /^["']+|["']+$/g;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Remove any run of `"` / `'` characters from both ends. */
export function stripQuotes(text: string): string {
  return text.replace(SURROUNDING_QUOTES_RE, "");
}

export function parsePathExpression(expr: string): PathExpression {
  const pipe = expr.indexOf("|");
  const pathPart = pipe === -1 ? expr : expr.slice(0, pipe);
  const filterPart = pipe === -1 ? "" : expr.slice(pipe + 1);

  const segments = pathPart.trim().split(".").map((s) => s.trim());

  const marker = filterPart.indexOf("default:");
  if (marker === -1) {
    return { segments };
  }

  const literal = filterPart.slice(marker + "default:".length).trim();
  return { segments, defaultValue: stripQuotes(literal) };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function walk(segments: string[], scope: Scope): ContextValue | undefined {
  let current: ContextValue = scope;

  for (const segment of segments) {
    if (isSequence(current) && INDEX_RE.test(segment)) {
      const index = Number(segment);
      if (index >= current.length) return undefined;
      current = current[index];
    } else if (isMapping(current) && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }

  return current;
}

/**
 * Resolve a path expression against a scope.
 */
export function resolve(pathExpr: string, scope: Scope): Resolution {
  const { segments, defaultValue } = parsePathExpression(pathExpr);
  const value = walk(segments, scope);

  if (value !== undefined) {
    return { kind: "resolved", value };
  }
  if (defaultValue !== undefined) {
    return { kind: "defaulted", value: defaultValue };
  }
  return ABSENT;
}

// ---------------------------------------------------------------------------
// Interpretation helpers
// ---------------------------------------------------------------------------

/** Value of a resolution, with absent read as null. */
export function valueOf(resolution: Resolution): ContextValue {
  return resolution.kind === "absent" ? null : resolution.value;
}

/** Output text for a resolution, with absent read as "". */
export function displayOf(resolution: Resolution): string {
  return resolution.kind === "absent" ? "" : toDisplayString(resolution.value);
}
