/**
 * Tests for the conditional text engine.
 *
 * Run: node --import tsx src/templates/directives.test.ts
 *
 * Tests cover:
 *   1. Compilation: node shapes for interpolations and if-blocks
 *   2. Syntax errors: every malformed directive is rejected at compile time
 *   3. Evaluation: truthiness, negation, conjunction, transforms
 */

import { strict as assert } from "node:assert";

import { TemplateSyntaxError } from "../errors.js";
import {
  collectReferences,
  compileSegmentText,
  evaluate,
  evaluateCondition,
  expand,
  type CompileLocation,
  type Condition,
} from "./directives.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const at: CompileLocation = { templateId: "sample", segmentIndex: 2 };

function assertSyntaxError(text: string, detail: RegExp): void {
  assert.throws(
    () => compileSegmentText(text, at),
    (err: unknown) => {
      assert.ok(err instanceof TemplateSyntaxError);
      assert.equal(err.templateId, "sample");
      assert.equal(err.segmentIndex, 2);
      assert.match(err.detail, detail);
      return true;
    }
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// Compilation
// ═══════════════════════════════════════════════════════════════════════════

section("Compilation");

test("plain text compiles to a single literal", () => {
  assert.deepEqual(compileSegmentText("Hello\n", at), [{ kind: "literal", text: "Hello\n" }]);
});

test("empty text compiles to no nodes", () => {
  assert.deepEqual(compileSegmentText("", at), []);
});

test("interpolation tolerates surrounding whitespace", () => {
  assert.deepEqual(compileSegmentText("Hi {{name}} and {{  other }}!", at), [
    { kind: "literal", text: "Hi " },
    { kind: "interpolation", name: "name" },
    { kind: "literal", text: " and " },
    { kind: "interpolation", name: "other" },
    { kind: "literal", text: "!" },
  ]);
});

test("if block captures its body", () => {
  assert.deepEqual(compileSegmentText("{% if title %}{{ title }}\n{% endif %}", at), [
    {
      kind: "if",
      condition: [{ name: "title", negated: false }],
      body: [
        { kind: "interpolation", name: "title" },
        { kind: "literal", text: "\n" },
      ],
    },
  ]);
});

test("negated conjunction compiles to two terms", () => {
  const nodes = compileSegmentText("{% if not title and not ticket_number %}\n\n{% endif %}", at);
  assert.deepEqual(nodes, [
    {
      kind: "if",
      condition: [
        { name: "title", negated: true },
        { name: "ticket_number", negated: true },
      ],
      body: [{ kind: "literal", text: "\n\n" }],
    },
  ]);
});

test("a lone closing brace pair is literal text", () => {
  assert.deepEqual(compileSegmentText("a }} b", at), [{ kind: "literal", text: "a }} b" }]);
});

test("collectReferences lists names once in first-seen order", () => {
  const nodes = compileSegmentText("{% if b and not a %}{{ a }}{% endif %}{{ b }}{{ c }}", at);
  assert.deepEqual(collectReferences(nodes), ["b", "a", "c"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// Syntax errors
// ═══════════════════════════════════════════════════════════════════════════

section("Syntax errors");

test("unterminated interpolation", () => {
  assertSyntaxError("Hello {{ name", /Unterminated directive "\{\{"/);
});

test("unterminated tag", () => {
  assertSyntaxError("{% if name", /Unterminated directive "\{%"/);
});

test("interpolation of an expression", () => {
  assertSyntaxError("{{ a + b }}", /Invalid interpolation/);
});

test("interpolation of a reserved word", () => {
  assertSyntaxError("{{ endif }}", /Invalid interpolation/);
});

test("nested conditionals", () => {
  assertSyntaxError("{% if a %}{% if b %}x{% endif %}{% endif %}", /Nested conditionals/);
});

test("endif without if", () => {
  assertSyntaxError("text{% endif %}", /without a matching/);
});

test("unclosed if", () => {
  assertSyntaxError("{% if a %}text", /Unclosed/);
});

test("else is not supported", () => {
  assertSyntaxError("{% if a %}x{% else %}y{% endif %}", /Unsupported tag \{% else %\}/);
});

test("or is not supported", () => {
  assertSyntaxError("{% if a or b %}x{% endif %}", /only "not" and a single "and"/);
});

test("three terms are not supported", () => {
  assertSyntaxError("{% if a and b and c %}x{% endif %}", /at most two terms/);
});

test("if without a condition", () => {
  assertSyntaxError("{% if %}x{% endif %}", /Malformed condition/);
});

test("text after endif", () => {
  assertSyntaxError("{% if a %}x{% endif a %}", /Unexpected text/);
});

test("error message names template and segment", () => {
  assert.throws(() => compileSegmentText("{{ a", at), {
    message: `Template 'sample', segment 2: Unterminated directive "{{"`,
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Evaluation
// ═══════════════════════════════════════════════════════════════════════════

section("Evaluation");

test("interpolates bound values", () => {
  assert.equal(expand("Hi {{ name }}!", { name: "Ada" }), "Hi Ada!");
});

test("unbound interpolations expand to empty text", () => {
  assert.equal(expand("[{{ name }}]", {}), "[]");
});

test("non-empty string is truthy, empty string is falsy", () => {
  const cond: Condition = [{ name: "x", negated: false }];
  assert.equal(evaluateCondition(cond, { x: "0" }), true);
  assert.equal(evaluateCondition(cond, { x: " " }), true);
  assert.equal(evaluateCondition(cond, { x: "" }), false);
  assert.equal(evaluateCondition(cond, {}), false);
});

test("negation and conjunction", () => {
  const text = "{% if not title and not ticket_number %}EMPTY{% endif %}";
  assert.equal(expand(text, { title: "", ticket_number: "" }), "EMPTY");
  assert.equal(expand(text, { title: "T", ticket_number: "" }), "");
  assert.equal(expand(text, { title: "", ticket_number: "7" }), "");
});

test("conditional body is dropped entirely when false", () => {
  const text = "A{% if flag %}B{{ flag }}C{% endif %}D";
  assert.equal(expand(text, { flag: "" }), "AD");
  assert.equal(expand(text, { flag: "x" }), "ABxCD");
});

test("transform applies to interpolated values only", () => {
  const nodes = compileSegmentText("<{{ a }}>", at);
  const out = evaluate(nodes, { a: "v" }, { transform: (name, value) => `${name}=${value.toUpperCase()}` });
  assert.equal(out, "<a=V>");
});

test("evaluation is deterministic", () => {
  const nodes = compileSegmentText("{% if a %}{{ a }}{% endif %}-{{ b }}", at);
  const ctx = { a: "1", b: "2" };
  assert.equal(evaluate(nodes, ctx), evaluate(nodes, ctx));
  assert.equal(evaluate(nodes, ctx), "1-2");
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
