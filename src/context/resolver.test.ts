/**
 * Tests for binding context resolution and template scripts.
 *
 * Run: node --import tsx src/context/resolver.test.ts
 *
 * Tests cover:
 *   1. Static values: binding, coercion, required checks
 *   2. Script execution: output coercion, isolation, failures, timeouts
 *   3. Source selection: scripts win over supplied values, which become
 *      script parameters
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ScriptExecutionError, ScriptTimeoutError, ValidationError } from "../errors.js";
import { createTemplate } from "../templates/loader.js";
import type { Template } from "../types/template.js";
import { findMissingVariables, resolveContext, selectContextSource } from "./resolver.js";
import { ScriptContextProvider } from "./script-provider.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
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

const SCRIPTS_DIR = mkdtempSync(join(tmpdir(), "ticketpress-scripts-"));

const SCRIPTS: Record<string, string> = {
  "values.mjs": `export function computeVariables() {
  return { a: "from script", n: 42, flag: false, nothing: null, extra: "ignored" };
}`,
  "echo-input.mjs": `export function computeVariables(input) {
  return { a: input.template, n: input.variables.join(",") };
}`,
  "echo-values.mjs": `export function computeVariables({ values }) {
  return { a: values.a ?? "none", n: Object.keys(values).sort().join(",") };
}`,
  "default-export.mjs": `export default async () => ({ a: "default" });`,
  "env.mjs": `export function computeVariables() {
  return { a: process.env.HOME ?? "no-env" };
}`,
  "throws.mjs": `export function computeVariables() {
  throw new Error("boom");
}`,
  "loops.mjs": `export function computeVariables() {
  for (;;) {}
}`,
  "array.mjs": `export function computeVariables() {
  return ["a"];
}`,
  "nested.mjs": `export function computeVariables() {
  return { a: { deep: true } };
}`,
  "no-export.mjs": `export const value = 1;`,
  "blank.mjs": `export function computeVariables() {
  return { a: "   " };
}`,
};

for (const [file, source] of Object.entries(SCRIPTS)) {
  writeFileSync(join(SCRIPTS_DIR, file), source);
}

function scripted(script: string): Template {
  return createTemplate(
    script.replace(/\.mjs$/, ""),
    {
      name: "Scripted",
      script,
      variables: [
        { name: "a", description: "Alpha" },
        { name: "n", required: false },
        { name: "flag", required: false },
        { name: "nothing", required: false },
      ],
      segments: [{ text: "{{ a }}{{ n }}{{ flag }}{{ nothing }}" }],
    },
    { scriptsDir: SCRIPTS_DIR }
  );
}

const staticTemplate = createTemplate("plain", {
  name: "Plain",
  variables: [
    { name: "a", description: "First value" },
    { name: "b" },
    { name: "c", required: false },
  ],
  segments: [{ text: "{{ a }}{{ b }}{{ c }}" }],
});

const provider = new ScriptContextProvider({ timeoutMs: 2000 });

// ═══════════════════════════════════════════════════════════════════════════
// Static values
// ═══════════════════════════════════════════════════════════════════════════

section("Static values");

await test("binds declared variables and drops the rest", async () => {
  const ctx = await resolveContext(staticTemplate, { a: "1", b: "2", z: "unused" });
  assert.deepEqual(ctx, { a: "1", b: "2", c: "" });
  assert.equal(Object.isFrozen(ctx), true);
});

await test("scalars are stringified, other values bind as empty", async () => {
  const ctx = await resolveContext(staticTemplate, { a: 7, b: true, c: { nested: 1 } });
  assert.deepEqual(ctx, { a: "7", b: "true", c: "" });
});

await test("every missing required variable is reported at once", async () => {
  await assert.rejects(
    () => resolveContext(staticTemplate, {}),
    (err: unknown) => {
      assert.ok(err instanceof ValidationError);
      assert.deepEqual(err.missing, [{ name: "a", description: "First value" }, { name: "b" }]);
      assert.equal(err.message, "Template 'plain' is missing required variable(s): a, b");
      assert.deepEqual(err.format(), [
        "Required field missing: First value",
        "Required field missing: b",
      ]);
      return true;
    }
  );
});

await test("blank values count as missing", async () => {
  assert.deepEqual(
    findMissingVariables(staticTemplate, { a: "  ", b: "\n\t", c: "" }).map((m) => m.name),
    ["a", "b"]
  );
});

await test("optional variables never count as missing", async () => {
  assert.deepEqual(findMissingVariables(staticTemplate, { a: "x", b: "y" }), []);
});

await test("static source carries the supplied values", () => {
  const source = selectContextSource(staticTemplate, { a: "1" });
  assert.equal(source.kind, "static");
  if (source.kind === "static") {
    assert.deepEqual(source.values, { a: "1" });
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// Scripts
// ═══════════════════════════════════════════════════════════════════════════

section("Scripts");

await test("script output is coerced to strings for declared variables", async () => {
  const values = await provider.execute(scripted("values.mjs"));
  assert.deepEqual(values, { a: "from script", n: "42", flag: "false", nothing: "" });
});

await test("script receives the template id and variable names", async () => {
  const values = await provider.execute(scripted("echo-input.mjs"));
  assert.deepEqual(values, { a: "echo-input", n: "a,n,flag,nothing" });
});

await test("an async default export is accepted", async () => {
  const ctx = await resolveContext(scripted("default-export.mjs"), {}, { scriptProvider: provider });
  assert.equal(ctx.a, "default");
});

await test("scripts run with an empty environment", async () => {
  const values = await provider.execute(scripted("env.mjs"));
  assert.equal(values.a, "no-env");
});

await test("a throwing script raises ScriptExecutionError", async () => {
  await assert.rejects(
    () => resolveContext(scripted("throws.mjs"), {}, { scriptProvider: provider }),
    (err: unknown) => {
      assert.ok(err instanceof ScriptExecutionError);
      assert.equal(err.templateId, "throws");
      assert.equal(err.scriptPath, join(SCRIPTS_DIR, "throws.mjs"));
      assert.equal(err.reason, "boom");
      return true;
    }
  );
});

await test("a script that never returns is stopped by the timeout", async () => {
  const quick = new ScriptContextProvider({ timeoutMs: 300 });
  const started = Date.now();
  await assert.rejects(
    () => quick.execute(scripted("loops.mjs")),
    (err: unknown) => err instanceof ScriptTimeoutError && err.timeoutMs === 300
  );
  assert.ok(Date.now() - started < 2000, "timeout should fire near its budget");
});

await test("non-object output is rejected", async () => {
  await assert.rejects(() => provider.execute(scripted("array.mjs")), /expected an object of variable values, got an array/);
});

await test("non-scalar variable values are rejected", async () => {
  await assert.rejects(
    () => provider.execute(scripted("nested.mjs")),
    /variable "a" must be a string, number or boolean \(got object\)/
  );
});

await test("a module without computeVariables is rejected", async () => {
  await assert.rejects(
    () => provider.execute(scripted("no-export.mjs")),
    /script must export a computeVariables\(\) function/
  );
});

await test("blank required script output fails validation", async () => {
  await assert.rejects(
    () => resolveContext(scripted("blank.mjs"), {}, { scriptProvider: provider }),
    (err: unknown) => err instanceof ValidationError && err.missing.length === 1 && err.missing[0]?.name === "a"
  );
});

await test("execute refuses a template without a script", async () => {
  await assert.rejects(() => provider.execute(staticTemplate), ScriptExecutionError);
});

// ═══════════════════════════════════════════════════════════════════════════
// Source selection
// ═══════════════════════════════════════════════════════════════════════════

section("Source selection");

await test("script output wins over supplied values", async () => {
  const ctx = await resolveContext(
    scripted("values.mjs"),
    { a: "from caller", n: "caller", extra: "caller" },
    { scriptProvider: provider }
  );
  assert.equal(ctx.a, "from script");
  assert.equal(ctx.n, "42");
});

await test("supplied values reach the script as parameters", async () => {
  const ctx = await resolveContext(
    scripted("echo-values.mjs"),
    { a: "from caller", count: 3, on: true, nested: { x: 1 } },
    { scriptProvider: provider }
  );
  assert.equal(ctx.a, "from caller");
  assert.equal(ctx.n, "a,count,on");
});

await test("a script called without values sees an empty parameter map", async () => {
  const values = await provider.execute(scripted("echo-values.mjs"));
  assert.deepEqual(values, { a: "none", n: "" });
});

await test("script source keeps the supplied values as parameters", () => {
  const source = selectContextSource(scripted("values.mjs"), { a: "1" }, { scriptProvider: provider });
  assert.equal(source.kind, "script");
  if (source.kind === "script") {
    assert.deepEqual(source.parameters, { a: "1" });
  }
});

await test("supplied values do not fill variables a script leaves out", async () => {
  const ctx = await resolveContext(
    scripted("default-export.mjs"),
    { n: "caller" },
    { scriptProvider: provider }
  );
  assert.equal(ctx.n, "");
});

await test("a scripted template without a provider is refused", () => {
  assert.throws(() => selectContextSource(scripted("values.mjs"), {}), /declares a script but no ScriptContextProvider/);
});

// ═══════════════════════════════════════════════════════════════════════════
// Cleanup & Summary
// ═══════════════════════════════════════════════════════════════════════════

rmSync(SCRIPTS_DIR, { recursive: true, force: true });

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
