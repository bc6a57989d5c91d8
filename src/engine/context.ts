/**
 * Render context model.
 *
 * A context is the tree-shaped data a template is rendered against:
 * scalars, ordered sequences and string-keyed mappings. Contexts are
 * never mutated by the engine; loop scopes are built as new mappings.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ContextScalar = string | number | boolean | null;

export type ContextSequence = readonly ContextValue[];

export interface ContextMapping {
  readonly [key: string]: ContextValue;
}

export type ContextValue = ContextScalar | ContextSequence | ContextMapping;

/**
 * The mapping a directive resolves against. The root scope is the
 * caller's context; a loop iteration scope holds only the loop variable.
 */
export type Scope = ContextMapping;

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isSequence(value: ContextValue): value is ContextSequence {
  return Array.isArray(value);
}

export function isMapping(value: ContextValue): value is ContextMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Scope construction
// ---------------------------------------------------------------------------

/**
 * Build an isolated loop iteration scope. Nothing from the enclosing
 * scope is visible through it.
 */
export function createLoopScope(variable: string, element: ContextValue): Scope {
  return { [variable]: element };
}

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

/**
 * Stringify a value for output.
 *
 *   string          → as-is
 *   number, boolean → String(value)
 *   null            → ""
 *   sequence/mapping → JSON
 */
export function toDisplayString(value: ContextValue): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Truthiness used by bare-path conditions.
 * Falsy: null, false, 0, NaN, "", empty sequence, empty mapping.
 */
export function isTruthy(value: ContextValue): boolean {
  if (isSequence(value)) return value.length > 0;
  if (isMapping(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}
