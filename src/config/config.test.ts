/**
 * Tests for environment-driven configuration.
 *
 * Run: node --import tsx src/config/config.test.ts
 */

import { strict as assert } from "node:assert";

import {
  ConfigError,
  DEFAULT_PRINTER_SETTINGS,
  loadAppConfig,
  loadPrinterSettings,
  requireEnv,
  requirePrinterHost,
  SettingsError,
} from "./index.js";
import { optionalEnvBool, optionalEnvInt } from "./env.js";

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

function settingsIssue(fn: () => unknown): { path: string; code: string } {
  try {
    fn();
  } catch (err) {
    if (err instanceof SettingsError) {
      const issue = err.issues[0];
      return { path: issue ? issue.path.join(".") : "", code: issue?.code ?? "" };
    }
    throw err;
  }
  throw new Error("expected a SettingsError");
}

// ═══════════════════════════════════════════════════════════════════════════
// Environment helpers
// ═══════════════════════════════════════════════════════════════════════════

section("Environment helpers");

test("requireEnv returns the trimmed value", () => {
  assert.equal(requireEnv("KEY", { KEY: " value " }), "value");
});

test("requireEnv rejects missing and blank values", () => {
  assert.throws(() => requireEnv("KEY", {}), { name: "ConfigError", message: "Missing required environment variable: KEY" });
  assert.throws(() => requireEnv("KEY", { KEY: "   " }), ConfigError);
});

test("integers must be whole numbers", () => {
  assert.equal(optionalEnvInt("N", { N: "42" }), 42);
  assert.equal(optionalEnvInt("N", {}), undefined);
  assert.throws(() => optionalEnvInt("N", { N: "12.5" }), {
    message: "Environment variable N must be a valid integer, got: 12.5",
  });
  assert.throws(() => optionalEnvInt("N", { N: "9100abc" }), ConfigError);
});

test("booleans accept the usual spellings", () => {
  for (const yes of ["true", "TRUE", "1", "yes"]) assert.equal(optionalEnvBool("B", { B: yes }), true);
  for (const no of ["false", "0", "No"]) assert.equal(optionalEnvBool("B", { B: no }), false);
  assert.throws(() => optionalEnvBool("B", { B: "maybe" }), {
    message: "Environment variable B must be a boolean (true/false/1/0/yes/no), got: maybe",
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// loadAppConfig
// ═══════════════════════════════════════════════════════════════════════════

section("loadAppConfig");

test("an empty environment yields the defaults", () => {
  assert.deepEqual(loadAppConfig({}), DEFAULT_PRINTER_SETTINGS);
});

test("every variable is read", () => {
  const settings = loadAppConfig({
    NODE_ENV: "production",
    PRINTER_HOST: "192.168.1.50",
    PRINTER_PORT: "9101",
    CHARS_PER_LINE: "48",
    ENABLE_SPECIAL_LETTERS: "yes",
    SCRIPT_TIMEOUT_MS: "1500",
    TEMPLATES_DIR: "/srv/templates",
    LOG_LEVEL: "debug",
    LOG_DIR: "/var/log/ticketpress",
  });
  assert.deepEqual(settings, {
    env: "production",
    printerHost: "192.168.1.50",
    printerPort: 9101,
    charsPerLine: 48,
    unicode: true,
    scriptTimeoutMs: 1500,
    templatesDir: "/srv/templates",
    logLevel: "debug",
    logDir: "/var/log/ticketpress",
  });
});

test("blank variables count as unset", () => {
  const settings = loadAppConfig({ PRINTER_HOST: "  ", CHARS_PER_LINE: "" });
  assert.equal(settings.printerHost, undefined);
  assert.equal(settings.charsPerLine, 32);
});

test("settings are frozen", () => {
  assert.equal(Object.isFrozen(loadAppConfig({})), true);
});

test("out-of-range port fails validation", () => {
  assert.deepEqual(settingsIssue(() => loadAppConfig({ PRINTER_PORT: "70000" })), {
    path: "printerPort",
    code: "too_big",
  });
});

test("unknown log level fails validation", () => {
  assert.deepEqual(settingsIssue(() => loadAppConfig({ LOG_LEVEL: "verbose" })), {
    path: "logLevel",
    code: "invalid_enum_value",
  });
});

test("unknown NODE_ENV fails validation", () => {
  assert.deepEqual(settingsIssue(() => loadAppConfig({ NODE_ENV: "staging" })), {
    path: "env",
    code: "invalid_enum_value",
  });
});

test("SettingsError is a ConfigError", () => {
  assert.throws(() => loadAppConfig({ CHARS_PER_LINE: "2" }), ConfigError);
});

test("requirePrinterHost names the variable to set", () => {
  assert.throws(() => requirePrinterHost(loadAppConfig({})), {
    name: "ConfigError",
    message: "No printer configured: set PRINTER_HOST to the printer's network address",
  });
  assert.equal(requirePrinterHost(loadAppConfig({ PRINTER_HOST: "printer.local" })), "printer.local");
});

// ═══════════════════════════════════════════════════════════════════════════
// Settings schema
// ═══════════════════════════════════════════════════════════════════════════

section("Printer settings");

test("unknown keys are rejected", () => {
  assert.deepEqual(settingsIssue(() => loadPrinterSettings({ colour: "red" })), {
    path: "",
    code: "unrecognized_keys",
  });
});

test("format lists each issue with its path", () => {
  const err = new SettingsError("Invalid printer settings: 2 validation error(s)", [
    { path: ["printerPort"], message: "Number must be less than or equal to 65535", code: "too_big" },
    { path: [], message: "Unrecognized key(s) in object: 'colour'", code: "unrecognized_keys" },
  ]);
  assert.equal(
    err.format(),
    [
      "Printer settings validation failed:",
      "  - printerPort: Number must be less than or equal to 65535",
      "  - (root): Unrecognized key(s) in object: 'colour'",
    ].join("\n")
  );
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
