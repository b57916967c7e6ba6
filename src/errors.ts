/**
 * Error taxonomy for the template → print pipeline.
 *
 * Every stage throws a subclass of PipelineError carrying enough context
 * (template id, segment index, variable or attribute name) for the caller
 * to build a user-facing message. Nothing here is retried: rendering is
 * deterministic, so the same input reproduces the same error.
 */

import { inspect } from "node:util";

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export abstract class PipelineError extends Error {
  /** Stable, machine-readable error code. */
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export class NotFoundError extends PipelineError {
  readonly code = "TEMPLATE_NOT_FOUND";

  constructor(
    public readonly templateId: string,
    public readonly searchedDir: string
  ) {
    super(`Template '${templateId}' not found in ${searchedDir}`);
  }
}

/**
 * Individual schema problem in a template definition.
 */
export interface SchemaIssue {
  /** Path to the offending field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod issue code, or a local code for cross-field checks */
  code: string;
}

export class SchemaError extends PipelineError {
  readonly code = "TEMPLATE_SCHEMA";

  constructor(
    public readonly templateId: string,
    public readonly issues: SchemaIssue[]
  ) {
    super(
      `Template '${templateId}' has an invalid definition: ${issues.length} issue(s)` +
        (issues.length > 0 ? ` (${formatIssuePath(issues[0]?.path ?? [])}: ${issues[0]?.message ?? ""})` : "")
    );
  }

  /**
   * Format issues for display.
   */
  format(): string {
    const lines = [`Template '${this.templateId}' failed validation:`];
    for (const issue of this.issues) {
      lines.push(`  - ${formatIssuePath(issue.path)}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export class TemplateSyntaxError extends PipelineError {
  readonly code = "TEMPLATE_SYNTAX";

  constructor(
    public readonly templateId: string,
    public readonly segmentIndex: number,
    public readonly detail: string
  ) {
    super(`Template '${templateId}', segment ${segmentIndex}: ${detail}`);
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export interface MissingVariable {
  name: string;
  description?: string;
}

export class ValidationError extends PipelineError {
  readonly code = "MISSING_VARIABLES";

  constructor(
    public readonly templateId: string,
    public readonly missing: MissingVariable[]
  ) {
    super(
      `Template '${templateId}' is missing required variable(s): ` +
        missing.map((m) => m.name).join(", ")
    );
  }

  /**
   * One line per missing variable, labelled by description when present.
   */
  format(): string[] {
    return this.missing.map((m) => `Required field missing: ${m.description || m.name}`);
  }
}

export class ScriptExecutionError extends PipelineError {
  readonly code = "SCRIPT_FAILED";

  constructor(
    public readonly templateId: string,
    public readonly scriptPath: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Script for template '${templateId}' failed: ${reason}`, options);
  }
}

export class ScriptTimeoutError extends PipelineError {
  readonly code = "SCRIPT_TIMEOUT";

  constructor(
    public readonly templateId: string,
    public readonly scriptPath: string,
    public readonly timeoutMs: number
  ) {
    super(`Script for template '${templateId}' exceeded its ${timeoutMs} ms budget`);
  }
}

// ---------------------------------------------------------------------------
// Rendering and transport
// ---------------------------------------------------------------------------

export type RenderTargetName = "printer" | "preview";

/**
 * Short description of an arbitrary value for error and warning text.
 * JSON where the value has a JSON form, otherwise `util.inspect` output
 * (bigints, symbols, functions, circular objects).
 */
export function describeValue(value: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch {
    json = undefined;
  }
  return json ?? inspect(value, { depth: 2, breakLength: Infinity });
}

export class RenderError extends PipelineError {
  readonly code = "RENDER_FAILED";

  constructor(
    public readonly target: RenderTargetName,
    public readonly attribute: string,
    public readonly value: unknown,
    public readonly runIndex: number
  ) {
    super(
      `Cannot render run ${runIndex} for ${target}: unsupported value ` +
        `${describeValue(value)} for style attribute "${attribute}"`
    );
  }
}

export class PrintTransportError extends PipelineError {
  readonly code = "PRINT_TRANSPORT";

  constructor(
    public readonly endpoint: string,
    public readonly operationsSent: number,
    public readonly operationsTotal: number,
    reason: string,
    options?: ErrorOptions
  ) {
    super(
      `Printer transport to ${endpoint} failed after ${operationsSent}/${operationsTotal} ` +
        `operation(s): ${reason}. The document must be resent in full.`,
      options
    );
  }

  /** True when some, but not all, of the document reached the device. */
  get partial(): boolean {
    return this.operationsSent > 0 && this.operationsSent < this.operationsTotal;
  }
}

function formatIssuePath(path: (string | number)[]): string {
  return path.length > 0 ? path.join(".") : "(root)";
}
