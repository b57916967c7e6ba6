#!/usr/bin/env node
/**
 * CLI tool to list, preview, validate and print templates.
 *
 * USAGE
 *
 * List templates:
 *   npm run print-template -- --list
 *
 * Preview a template:
 *   npm run print-template -- --template ticket --set title="Order #5" --set text="**Thank you**"
 *
 * Check values without rendering:
 *   npm run print-template -- --template ticket --validate
 *
 * Send to the configured printer (PRINTER_HOST):
 *   npm run print-template -- --template agenda --print
 *
 * Options:
 *   --list                  List available templates
 *   --template <id>         Template id (file name without extension)
 *   --set <name=value>      Variable value; repeat for each variable
 *   --validate              Check the values instead of previewing
 *   --print                 Print instead of previewing
 *   --templates <dir>       Template directory (default: TEMPLATES_DIR or templates/)
 *   --json                  Output as JSON
 *   --no-color              Disable ANSI colors
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (unknown template, invalid definition, render or transport failure)
 *   2 - Validation failed (required values missing)
 */

import { parseArgs } from "node:util";

import { loadAppConfig, SettingsError } from "../config/index.js";
import { SchemaError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { TemplateService } from "../service/template-service.js";
import { TemplateLoader } from "../templates/loader.js";
import type { TemplateSummary } from "../types/template.js";

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      list: { type: "boolean", default: false },
      template: { type: "string" },
      set: { type: "string", multiple: true, default: [] },
      validate: { type: "boolean", default: false },
      print: { type: "boolean", default: false },
      templates: { type: "string" },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: print-template --list
       print-template --template <id> [--set name=value ...] [--validate | --print]

Options:
  --list                  List available templates
  --template <id>         Template id (file name without extension)
  --set <name=value>      Variable value; repeat for each variable
  --validate              Check the values instead of previewing
  --print                 Print instead of previewing
  --templates <dir>       Template directory (default: TEMPLATES_DIR or templates/)
  --json                  Output as JSON
  --no-color              Disable ANSI colors
  -h, --help              Show this help message

Exit codes:
  0 - Success
  1 - Error
  2 - Validation failed
`);
    process.exit(0);
  }

  return values;
}

/**
 * Turn repeated `name=value` flags into a value map.
 * The first `=` splits; later ones belong to the value. Later flags win.
 *
 * @throws Error for an assignment without `=` or with an empty name
 */
export function parseAssignments(assignments: readonly string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const assignment of assignments) {
    const eq = assignment.indexOf("=");
    const name = eq === -1 ? "" : assignment.slice(0, eq).trim();
    if (name === "") {
      throw new Error(`Invalid --set value "${assignment}": expected name=value`);
    }
    values[name] = unescapeValue(assignment.slice(eq + 1));
  }
  return values;
}

/** Shells make literal newlines awkward; accept `\n` in values. */
function unescapeValue(value: string): string {
  return value.replace(/\\(\\|n)/g, (_, ch: string) => (ch === "n" ? "\n" : "\\"));
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

let useColors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/**
 * One line per template: padded id, display name, description.
 */
export function formatTemplateList(summaries: readonly TemplateSummary[]): string {
  if (summaries.length === 0) return "(no templates)";
  const width = Math.max(...summaries.map((s) => s.id.length));
  return summaries
    .map((s) => {
      const description = s.description ? ` - ${s.description}` : "";
      return `${s.id.padEnd(width)}  ${s.name}${description}`;
    })
    .join("\n");
}

function frame(body: string, width: number): string {
  const rule = c("dim", "─".repeat(width));
  return `${rule}\n${body}\n${rule}`;
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();

  if (args["no-color"]) {
    useColors = false;
  }

  const settings = loadAppConfig();
  const logger = createLogger({ level: settings.logLevel, logDir: settings.logDir, console: false });
  const loader = new TemplateLoader(args.templates ?? settings.templatesDir, { logger });
  const service = new TemplateService({ loader, settings, logger });

  if (args.list) {
    const summaries = service.listTemplates();
    console.log(args.json ? JSON.stringify(summaries, null, 2) : formatTemplateList(summaries));
    process.exit(0);
  }

  if (!args.template) {
    console.error(c("red", "Error: --template or --list is required"));
    console.error("  Usage: npm run print-template -- --template <id> [--set name=value ...]");
    process.exit(1);
  }

  const supplied = parseAssignments(args.set);

  if (args.validate) {
    const result = await service.validate(args.template, supplied);
    if (args.json) {
      console.log(JSON.stringify(result, null, 2));
    } else if (result.valid) {
      console.log(c("green", `✓ ${result.message}`));
    } else {
      for (const error of result.errors) {
        console.error(c("red", `✗ ${error}`));
      }
    }
    process.exit(result.valid ? 0 : 2);
  }

  if (args.print) {
    const result = await service.print(args.template, supplied);
    if (args.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(c("green", `✓ Sent ${result.operations} operation(s), ${result.bytes} byte(s)`));
    }
    process.exit(0);
  }

  const result = await service.preview(args.template, supplied);
  if (args.json) {
    console.log(JSON.stringify(result, null, 2));
    process.exit(result.success ? 0 : 1);
  }
  if (!result.success) {
    console.error(c("red", `Error: ${result.error}`));
    process.exit(1);
  }
  console.log(frame(result.preview, settings.charsPerLine));
  for (const warning of result.warnings) {
    console.error(c("yellow", `⚠ ${warning}`));
  }
  process.exit(0);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("print-template.ts") ||
   process.argv[1].endsWith("print-template.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    if (err instanceof SchemaError || err instanceof SettingsError) {
      console.error(c("dim", err.format()));
    }
    process.exit(1);
  });
}
