/**
 * Condition evaluation for `if` / `elseif` tags.
 *
 * Three forms are supported:
 *
 *   LITERAL      {%1 if true %}          case-insensitive true / false
 *   COMPARISON   {%1 if post.count >= 3 %}
 *                {%1 if user.role == 'admin' %}
 *   TRUTHINESS   {%1 if user.avatar %}
 *
 * Comparison operands are resolved as paths first. An operand that does not
 * resolve stands for its own text (quotes stripped), which is how literals
 * such as `3` or `'admin'` enter a comparison. When both sides read as
 * numbers the comparison is numeric; otherwise it is a case-insensitive
 * string comparison where only `==` and `!=` are defined.
 *
 * Only decimal notation reads as a number (`3`, `-2.5`, `1e3`); `0x10`,
 * `Infinity` and the like compare as text. Booleans never read as numbers,
 * so `flag == 1` is false for `flag: true` and `flag == true` is the way to
 * test one.
 *
 * There are no boolean combinators, no arithmetic and no function calls.
 */

import { isTruthy, toDisplayString, type ContextValue, type Scope } from "./context.js";
import { resolve, stripQuotes, valueOf } from "./resolver.js";

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

/**
 * Scan order. Two-character operators come before their one-character
 * prefixes so `>=` is never read as `>`.
 */
export const COMPARISON_OPERATORS = ["==", "!=", ">=", "<=", ">", "<"] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export interface Comparison {
  operator: ComparisonOperator;
  left: string;
  right: string;
}

/**
 * Split an expression at the first operator (in scan order) that appears
 * anywhere in it. Returns undefined for expressions with no operator.
 */
export function splitComparison(expr: string): Comparison | undefined {
  for (const operator of COMPARISON_OPERATORS) {
    const at = expr.indexOf(operator);
    if (at === -1) continue;

    return {
      operator,
      left: expr.slice(0, at).trim(),
      right: expr.slice(at + operator.length).trim(),
    };
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Operand handling
// ---------------------------------------------------------------------------

function operandValue(text: string, scope: Scope): ContextValue {
  const resolution = resolve(text, scope);
  return resolution.kind === "absent" ? stripQuotes(text) : valueOf(resolution);
}

const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function toNumber(value: ContextValue): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value !== "string") return undefined;

  const trimmed = value.trim();
  return DECIMAL_RE.test(trimmed) ? Number(trimmed) : undefined;
}

function compareNumbers(operator: ComparisonOperator, a: number, b: number): boolean {
  switch (operator) {
    case "==":
      return a === b;
    case "!=":
      return a !== b;
    case ">=":
      return a >= b;
    case "<=":
      return a <= b;
    case ">":
      return a > b;
    case "<":
      return a < b;
  }
}

/**
 * Compare two operand values with the given operator.
 */
export function compareValues(
  left: ContextValue,
  operator: ComparisonOperator,
  right: ContextValue
): boolean {
  const a = toNumber(left);
  const b = toNumber(right);
  if (a !== undefined && b !== undefined) {
    return compareNumbers(operator, a, b);
  }

  const lhs = toDisplayString(left).toLowerCase();
  const rhs = stripQuotes(toDisplayString(right)).toLowerCase();

  switch (operator) {
    case "==":
      return lhs === rhs;
    case "!=":
      return lhs !== rhs;
    default:
      return false;
  }
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Evaluate a condition expression against a scope.
 */
export function evaluateCondition(expr: string, scope: Scope): boolean {
  const trimmed = expr.trim();
  const lowered = trimmed.toLowerCase();
  if (lowered === "true") return true;
  if (lowered === "false") return false;

  const comparison = splitComparison(trimmed);
  if (comparison) {
    return compareValues(
      operandValue(comparison.left, scope),
      comparison.operator,
      operandValue(comparison.right, scope)
    );
  }

  return isTruthy(valueOf(resolve(trimmed, scope)));
}
