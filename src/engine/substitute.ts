/**
 * Final variable substitution: renders flat nodes to a string.
 * Unresolvable variables without a default render as "".
 */

import type { Scope } from "./context.js";
import type { FlatNode } from "./parser.js";
import { displayOf, resolve } from "./resolver.js";

export function substituteVariables(nodes: readonly FlatNode[], scope: Scope): string {
  let out = "";
  for (const node of nodes) {
    out += node.type === "text" ? node.text : displayOf(resolve(node.expr, scope));
  }
  return out;
}
