/**
 * Template directive engine.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { TemplateEngine } from "./engine/index.js";
 *
 * const engine = new TemplateEngine({ templateDir: "templates" });
 * const html = engine.render("base.html", {
 *   title: "Home",
 *   posts: [{ title: "First" }, { title: "Second" }],
 * });
 * ```
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SYNTAX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Variable     {{ user.name }}   {{ user.bio | default:'No bio yet' }}
 *   Conditional  {%1 if count > 3 %}…{%1 elseif count > 0 %}…{%1 else %}…{%1 endif %}
 *   Loop         {%1 for post in posts %}<li>{{ post.title }}</li>{%1 endfor %}
 *   Include      {% include "header.html" %}
 *
 * Block tags carry a numeric id that pairs an opening tag with its branch
 * and closing tags. Nested blocks use different ids. A loop body sees only
 * its loop variable.
 */

// Context
export {
  createLoopScope,
  isMapping,
  isSequence,
  isTruthy,
  toDisplayString,
  type ContextMapping,
  type ContextScalar,
  type ContextSequence,
  type ContextValue,
  type Scope,
} from "./context.js";

// Resolution
export {
  resolve,
  parsePathExpression,
  stripQuotes,
  valueOf,
  displayOf,
  type Resolution,
  type PathExpression,
} from "./resolver.js";

// Conditions
export {
  evaluateCondition,
  compareValues,
  splitComparison,
  COMPARISON_OPERATORS,
  type Comparison,
  type ComparisonOperator,
} from "./condition.js";

// Parsing
export {
  parseTemplate,
  tokenize,
  type TemplateNode,
  type ExpandedNode,
  type FlatNode,
  type TextNode,
  type VariableNode,
  type IfNode,
  type ForNode,
  type ConditionalBranch,
  type Token,
  type TagKeyword,
} from "./parser.js";

// Expansion passes
export { expandIncludes, type PartialReader } from "./include.js";
export { expandConditionals, selectBranch } from "./conditional.js";
export { expandLoops, loopItems } from "./loop.js";
export { substituteVariables } from "./substitute.js";

// Sources
export {
  FileTemplateSource,
  MemoryTemplateSource,
  TemplateLoadError,
  type TemplateSource,
} from "./source.js";

// Rendering
export { TemplateEngine, type TemplateEngineOptions } from "./renderer.js";
