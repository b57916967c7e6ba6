/**
 * Printer settings loader and validator.
 *
 * Responsible for:
 * - Validating raw settings against the schema, failing fast
 * - Producing structured error messages
 * - Freezing the result
 */

import type { ZodIssue } from "zod";
import { deepFreeze } from "../../utils/deep-freeze.js";
import { ConfigError } from "../env.js";
import { PrinterSettingsSchema, type PrinterSettings } from "./schema.js";

/**
 * Individual validation issue.
 */
export interface SettingsIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for printer settings.
 */
export class SettingsError extends ConfigError {
  public readonly issues: SettingsIssue[];

  constructor(message: string, issues: SettingsIssue[]) {
    super(message);
    this.name = "SettingsError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Printer settings validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): SettingsIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate and load printer settings.
 *
 * @param input - Raw settings object; absent keys take their defaults
 * @returns Validated and frozen settings
 * @throws SettingsError if validation fails
 */
export function loadPrinterSettings(input: unknown): Readonly<PrinterSettings> {
  const result = PrinterSettingsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new SettingsError(
      `Invalid printer settings: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}
