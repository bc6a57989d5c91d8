/**
 * Conditional expansion.
 *
 * Reduces every `if` group in a node tree to the body of its selected
 * branch. Branches are tried in order; the first whose condition holds
 * wins, an `else` branch always holds, and a group with no winning branch
 * contributes nothing.
 *
 * All conditions are evaluated against the scope passed in, which for a
 * render is the root context. This pass runs before loop expansion, so a
 * group inside a loop body cannot see the loop variable.
 */

import type { Scope } from "./context.js";
import { evaluateCondition } from "./condition.js";
import type { ConditionalBranch, ExpandedNode, TemplateNode } from "./parser.js";

/**
 * The branch an `if` group reduces to, or undefined when none applies.
 */
export function selectBranch(
  branches: readonly ConditionalBranch[],
  scope: Scope
): ConditionalBranch | undefined {
  return branches.find(
    (branch) => branch.condition === null || evaluateCondition(branch.condition, scope)
  );
}

export function expandConditionals(
  nodes: readonly TemplateNode[],
  scope: Scope
): ExpandedNode[] {
  const out: ExpandedNode[] = [];

  for (const node of nodes) {
    switch (node.type) {
      case "if": {
        const branch = selectBranch(node.branches, scope);
        if (branch) {
          out.push(...expandConditionals(branch.body, scope));
        }
        break;
      }
      case "for":
        out.push({ ...node, body: expandConditionals(node.body, scope) });
        break;
      default:
        out.push(node);
    }
  }

  return out;
}
