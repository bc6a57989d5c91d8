/**
 * Loop expansion.
 *
 * Each `for item in path` group renders its body once per element of the
 * resolved iterable:
 *
 *   - absent or null iterable → no iterations
 *   - a sequence              → one iteration per element, in order
 *   - any other value         → exactly one iteration over that value
 *
 * Every iteration gets a fresh scope holding only the loop variable. The
 * enclosing scope is NOT visible inside the body, nested loops included:
 * `{{ title }}` inside a loop renders "" even when the root has a title.
 */

import {
  createLoopScope,
  isSequence,
  type ContextValue,
  type Scope,
} from "./context.js";
import type { ExpandedNode, FlatNode, ForNode } from "./parser.js";
import { resolve } from "./resolver.js";
import { substituteVariables } from "./substitute.js";

/**
 * Elements a loop iterates over for a given iterable path.
 */
export function loopItems(iterable: string, scope: Scope): readonly ContextValue[] {
  const resolution = resolve(iterable, scope);
  if (resolution.kind === "absent" || resolution.value === null) return [];
  return isSequence(resolution.value) ? resolution.value : [resolution.value];
}

function expandLoop(node: ForNode<ExpandedNode>, scope: Scope): string {
  let out = "";
  for (const element of loopItems(node.iterable, scope)) {
    const iterationScope = createLoopScope(node.variable, element);
    out += substituteVariables(expandLoops(node.body, iterationScope), iterationScope);
  }
  return out;
}

export function expandLoops(nodes: readonly ExpandedNode[], scope: Scope): FlatNode[] {
  return nodes.map((node): FlatNode =>
    node.type === "for" ? { type: "text", text: expandLoop(node, scope) } : node
  );
}
