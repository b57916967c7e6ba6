/**
 * Segment directive compilation and evaluation.
 *
 * Segment text mixes literal characters with two kinds of directive:
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SUPPORTED SYNTAX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   INTERPOLATION: substitute a variable's value ("" when unbound):
 *
 *     {{ title }}
 *
 *   CONDITIONAL BLOCK: include the body when the condition holds:
 *
 *     {% if title %}{{ title }}
 *     {% endif %}
 *
 *     {% if not title and not ticket_number %}
 *
 *     {% endif %}
 *
 *   A condition is one term or two terms joined by `and`; a term is a
 *   variable name, optionally preceded by `not`. A variable is true when
 *   its value is a non-empty string.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONSTRAINTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   - No nesting, no `else`, no `or`, no loops
 *   - Whitespace inside a block body is kept exactly as written
 *   - Malformed directives fail at compile time with TemplateSyntaxError,
 *     naming the segment index
 *
 * Segments are compiled once when a template loads; each render only walks
 * the resulting node list.
 */

import { TemplateSyntaxError } from "../errors.js";
import type { BindingContext } from "../types/template.js";

// ---------------------------------------------------------------------------
// AST
// ---------------------------------------------------------------------------

export interface LiteralNode {
  readonly kind: "literal";
  readonly text: string;
}

export interface InterpolationNode {
  readonly kind: "interpolation";
  readonly name: string;
}

export interface ConditionTerm {
  readonly name: string;
  readonly negated: boolean;
}

export type Condition =
  | readonly [ConditionTerm]
  | readonly [ConditionTerm, ConditionTerm];

export type InlineNode = LiteralNode | InterpolationNode;

export interface IfNode {
  readonly kind: "if";
  readonly condition: Condition;
  readonly body: readonly InlineNode[];
}

export type DirectiveNode = InlineNode | IfNode;

export interface CompileLocation {
  templateId: string;
  segmentIndex: number;
}

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Matches either `{{ … }}` or `{% … %}`.
 *
 * Groups:
 *   1: interpolation body
 *   2: tag body
 */
const DIRECTIVE_RE = /\{\{([\s\S]*?)\}\}|\{%([\s\S]*?)%\}/g;

const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

const RESERVED = new Set(["if", "endif", "not", "and", "or", "else"]);

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

/**
 * Compile segment text into a directive node list.
 *
 * @throws TemplateSyntaxError on any malformed or unsupported directive
 */
export function compileSegmentText(
  text: string,
  location: CompileLocation
): DirectiveNode[] {
  const fail = (detail: string): never => {
    throw new TemplateSyntaxError(location.templateId, location.segmentIndex, detail);
  };

  const nodes: DirectiveNode[] = [];
  let open: { condition: Condition; body: InlineNode[] } | null = null;

  const push = (node: InlineNode): void => {
    if (open) {
      open.body.push(node);
    } else {
      nodes.push(node);
    }
  };

  const pushLiteral = (literal: string): void => {
    if (literal === "") return;
    const stray = literal.match(/\{\{|\{%/);
    if (stray) {
      fail(`Unterminated directive "${stray[0]}"`);
    }
    push({ kind: "literal", text: literal });
  };

  DIRECTIVE_RE.lastIndex = 0;
  let cursor = 0;
  let match: RegExpExecArray | null;

  while ((match = DIRECTIVE_RE.exec(text)) !== null) {
    pushLiteral(text.slice(cursor, match.index));
    cursor = match.index + match[0].length;

    const [raw, interpolation, tag] = match;

    if (interpolation !== undefined) {
      const name = interpolation.trim();
      if (!NAME_RE.test(name) || RESERVED.has(name)) {
        fail(`Invalid interpolation ${raw}: expected a single variable name`);
      }
      push({ kind: "interpolation", name });
      continue;
    }

    const words = (tag ?? "").trim().split(/\s+/).filter((w) => w !== "");
    const keyword = words[0];

    if (keyword === "if") {
      if (open) {
        fail(`Nested conditionals are not supported (found ${raw} inside an open block)`);
      }
      open = { condition: parseCondition(words.slice(1), raw, fail), body: [] };
    } else if (keyword === "endif") {
      if (words.length > 1) {
        fail(`Unexpected text in ${raw}`);
      }
      if (!open) {
        fail(`${raw} without a matching {% if %}`);
      } else {
        nodes.push({ kind: "if", condition: open.condition, body: open.body });
        open = null;
      }
    } else {
      fail(`Unsupported tag ${raw}`);
    }
  }

  pushLiteral(text.slice(cursor));

  if (open) {
    fail("Unclosed {% if %} block (missing {% endif %})");
  }

  return nodes;
}

function parseCondition(
  words: string[],
  raw: string,
  fail: (detail: string) => never
): Condition {
  const terms: ConditionTerm[] = [];
  let i = 0;

  const readTerm = (): ConditionTerm => {
    let negated = false;
    if (words[i] === "not") {
      negated = true;
      i++;
    }
    const name = words[i];
    if (name === undefined || !NAME_RE.test(name) || RESERVED.has(name)) {
      return fail(`Malformed condition in ${raw}`);
    }
    i++;
    return { name, negated };
  };

  terms.push(readTerm());
  if (i < words.length) {
    if (words[i] !== "and") {
      fail(`Malformed condition in ${raw}: only "not" and a single "and" are supported`);
    }
    i++;
    terms.push(readTerm());
  }
  if (i < words.length) {
    fail(`Malformed condition in ${raw}: at most two terms are supported`);
  }

  const [first, second] = terms;
  if (!first) {
    return fail(`Malformed condition in ${raw}`);
  }
  return second ? [first, second] : [first];
}

// ---------------------------------------------------------------------------
// Inspection
// ---------------------------------------------------------------------------

/**
 * Every variable name a node list mentions, in first-seen order.
 */
export function collectReferences(nodes: readonly DirectiveNode[]): string[] {
  const found = new Set<string>();
  const visit = (node: DirectiveNode): void => {
    switch (node.kind) {
      case "literal":
        return;
      case "interpolation":
        found.add(node.name);
        return;
      case "if":
        for (const term of node.condition) found.add(term.name);
        for (const child of node.body) visit(child);
        return;
    }
  };
  nodes.forEach(visit);
  return [...found];
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export interface EvaluateOptions {
  /**
   * Applied to each interpolated value before it is inserted. The run
   * pipeline uses this to escape markdown in plain variables.
   */
  transform?: (name: string, value: string) => string;
}

/**
 * Evaluate a compiled condition. Unbound variables are false.
 */
export function evaluateCondition(condition: Condition, context: BindingContext): boolean {
  return condition.every((term) => {
    const truthy = (context[term.name] ?? "") !== "";
    return term.negated ? !truthy : truthy;
  });
}

/**
 * Expand compiled nodes against a binding context.
 */
export function evaluate(
  nodes: readonly DirectiveNode[],
  context: BindingContext,
  options: EvaluateOptions = {}
): string {
  const { transform } = options;

  const inline = (node: InlineNode): string => {
    if (node.kind === "literal") return node.text;
    const value = context[node.name] ?? "";
    return transform ? transform(node.name, value) : value;
  };

  let out = "";
  for (const node of nodes) {
    if (node.kind === "if") {
      if (evaluateCondition(node.condition, context)) {
        out += node.body.map(inline).join("");
      }
    } else {
      out += inline(node);
    }
  }
  return out;
}

/**
 * Compile and evaluate in one step. Prefer compiling once and calling
 * evaluate() when the same text renders repeatedly.
 */
export function expand(
  text: string,
  context: BindingContext,
  location: CompileLocation = { templateId: "(inline)", segmentIndex: 0 }
): string {
  return evaluate(compileSegmentText(text, location), context);
}
