/**
 * Template tokenizer and parser.
 *
 * Turns template text into a tree of nodes:
 *
 *   Text       literal text
 *   Variable   {{ path | default:'…' }}
 *   If         {%N if c %} … {%N elseif c %} … {%N else %} … {%N endif %}
 *   For        {%N for item in path %} … {%N endfor %}
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * BLOCK IDS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Every block tag carries a numeric id. An opening tag with id N pairs with
 * the FIRST following closing tag of its kind that carries the same id, in
 * the same way a non-greedy match would. Branch tags (`elseif`, `else`)
 * belong to the group whose id they carry, at that group's top level.
 *
 * Tags that do not pair up are not errors. They are kept as literal text,
 * so a template with `{%1 if x %}…{%2 endif %}` renders both tags verbatim.
 * Directives between such tags are still processed.
 *
 * Include directives are expanded on the raw text before parsing and are
 * not part of this grammar.
 */

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

export interface TextNode {
  type: "text";
  text: string;
}

export interface VariableNode {
  type: "variable";
  /** Path expression between the braces, trimmed. */
  expr: string;
}

export interface ConditionalBranch {
  /** null for the `else` branch. */
  condition: string | null;
  body: TemplateNode[];
}

export interface IfNode {
  type: "if";
  id: string;
  branches: ConditionalBranch[];
}

export interface ForNode<TBody> {
  type: "for";
  id: string;
  variable: string;
  iterable: string;
  body: TBody[];
}

export type TemplateNode = TextNode | VariableNode | IfNode | ForNode<TemplateNode>;

/** Nodes left once conditionals have been reduced. */
export type ExpandedNode = TextNode | VariableNode | ForNode<ExpandedNode>;

/** Nodes left once loops have been expanded. */
export type FlatNode = TextNode | VariableNode;

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

export type TagKeyword = "if" | "elseif" | "else" | "endif" | "for" | "endfor";

export type Token =
  | { type: "text"; raw: string }
  | { type: "variable"; raw: string; expr: string }
  | { type: "tag"; raw: string; id: string; keyword: TagKeyword; argument: string };

/**
 * Groups:
 *   1: variable expression
 *   2: block id
 *   3: keyword
 *   4: tag argument (condition or loop header), never running past the
 *      next `{%`
 */
const TOKEN_RE =
  /\{\{\s*(.*?)\s*\}\}|\{%(\d+)\s*(elseif|endfor|endif|else|for|if)\b\s*((?:(?!\{%)[\s\S])*?)\s*%\}/g;

const FOR_HEADER_RE = /^(\w+)\s+in\s+([\s\S]+)$/;

const BARE_KEYWORDS: ReadonlySet<TagKeyword> = new Set(["else", "endif", "endfor"]);

function isTagKeyword(value: string): value is TagKeyword {
  return ["if", "elseif", "else", "endif", "for", "endfor"].includes(value);
}

/**
 * Split template text into text, variable and block-tag tokens.
 *
 * Closing and `else` tags with trailing text are not tags; they stay text.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let last = 0;

  TOKEN_RE.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = TOKEN_RE.exec(source)) !== null) {
    const [raw, expr, id, keyword, argument] = match;

    if (match.index > last) {
      tokens.push({ type: "text", raw: source.slice(last, match.index) });
    }
    last = match.index + raw.length;

    if (expr !== undefined) {
      tokens.push({ type: "variable", raw, expr });
    } else if (
      isTagKeyword(keyword) &&
      !(BARE_KEYWORDS.has(keyword) && argument !== "")
    ) {
      tokens.push({ type: "tag", raw, id, keyword, argument });
    } else {
      tokens.push({ type: "text", raw });
    }
  }

  if (last < source.length) {
    tokens.push({ type: "text", raw: source.slice(last) });
  }

  return tokens;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

type TagToken = Extract<Token, { type: "tag" }>;

function isTag<K extends TagKeyword>(token: Token, keyword: K, id?: string): token is TagToken & { keyword: K } {
  return (
    token.type === "tag" &&
    token.keyword === keyword &&
    (id === undefined || token.id === id)
  );
}

function closingKeyword(token: Token): TagKeyword | undefined {
  if (isTag(token, "if")) return "endif";
  if (isTag(token, "for") && FOR_HEADER_RE.test(token.argument)) return "endfor";
  return undefined;
}

/**
 * Index of the closing tag for an opener at `at`, searching before `end`.
 * Returns -1 when the opener is unpaired.
 */
function findClose(tokens: Token[], at: number, end: number): number {
  const opener = tokens[at];
  const keyword = closingKeyword(opener);
  if (keyword === undefined || opener.type !== "tag") return -1;

  for (let i = at + 1; i < end; i++) {
    if (isTag(tokens[i], keyword, opener.id)) return i;
  }
  return -1;
}

function pushText(nodes: TemplateNode[], text: string): void {
  const previous = nodes[nodes.length - 1];
  if (previous !== undefined && previous.type === "text") {
    previous.text += text;
  } else {
    nodes.push({ type: "text", text });
  }
}

function parseIf(
  tokens: Token[],
  opener: TagToken,
  at: number,
  close: number
): IfNode {
  const branches: ConditionalBranch[] = [];
  let condition: string | null = opener.argument;
  let start = at + 1;

  let i = at + 1;
  while (i < close) {
    // Nested groups own any branch tags inside them.
    const nested = findClose(tokens, i, close);
    if (nested !== -1) {
      i = nested + 1;
      continue;
    }

    const token = tokens[i];
    if (isTag(token, "elseif", opener.id) || isTag(token, "else", opener.id)) {
      branches.push({ condition, body: parseRange(tokens, start, i) });
      condition = token.keyword === "else" ? null : token.argument;
      start = i + 1;
    }
    i++;
  }
  branches.push({ condition, body: parseRange(tokens, start, close) });

  return { type: "if", id: opener.id, branches };
}

function parseRange(tokens: Token[], start: number, end: number): TemplateNode[] {
  const nodes: TemplateNode[] = [];

  let i = start;
  while (i < end) {
    const token = tokens[i];
    const close = findClose(tokens, i, end);

    if (close !== -1 && token.type === "tag") {
      const header = FOR_HEADER_RE.exec(token.argument);
      if (token.keyword === "if") {
        nodes.push(parseIf(tokens, token, i, close));
      } else if (header !== null) {
        nodes.push({
          type: "for",
          id: token.id,
          variable: header[1],
          iterable: header[2].trim(),
          body: parseRange(tokens, i + 1, close),
        });
      }
      i = close + 1;
      continue;
    }

    if (token.type === "variable") {
      nodes.push({ type: "variable", expr: token.expr });
    } else {
      pushText(nodes, token.raw);
    }
    i++;
  }

  return nodes;
}

/**
 * Parse template text into a node tree.
 */
export function parseTemplate(source: string): TemplateNode[] {
  const tokens = tokenize(source);
  return parseRange(tokens, 0, tokens.length);
}
