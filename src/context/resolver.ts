/**
 * Variable resolution.
 *
 * Produces the BindingContext for one render pass. The source of values is
 * chosen once, at entry, from the template itself:
 *
 *   StaticVariables: the template has no script; values come from the
 *                    caller (form fields, CLI prompts, --set flags).
 *   ScriptGenerated: the template names a script; caller-supplied values
 *                    are handed to it as parameters, and its output
 *                    alone is the context.
 *
 * Either way the result is checked for blank required variables, and every
 * missing one is reported in a single ValidationError.
 */

import { ValidationError, type MissingVariable } from "../errors.js";
import type { BindingContext, Template } from "../types/template.js";
import type { ScriptContextProvider } from "./script-provider.js";

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export interface StaticVariables {
  readonly kind: "static";
  readonly values: Readonly<Record<string, unknown>>;
}

export interface ScriptGenerated {
  readonly kind: "script";
  readonly provider: ScriptContextProvider;
  /** Script parameters; never bound directly. */
  readonly parameters: Readonly<Record<string, unknown>>;
}

export type ContextSource = StaticVariables | ScriptGenerated;

export interface ResolveOptions {
  /** Required when the template declares a script. */
  scriptProvider?: ScriptContextProvider;
}

/**
 * Pick the context source for a template.
 *
 * Scripted templates always use their script; `supplied` becomes its parameters.
 */
export function selectContextSource(
  template: Template,
  supplied: Readonly<Record<string, unknown>>,
  options: ResolveOptions = {}
): ContextSource {
  if (template.script === undefined) {
    return { kind: "static", values: supplied };
  }
  if (!options.scriptProvider) {
    throw new Error(
      `Template '${template.id}' declares a script but no ScriptContextProvider was given`
    );
  }
  return { kind: "script", provider: options.scriptProvider, parameters: supplied };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolve the binding context for a render.
 *
 * @param template - Loaded template
 * @param supplied - Caller values keyed by variable name (script parameters for scripted templates)
 * @throws ValidationError       if any required variable is blank
 * @throws ScriptExecutionError  if the template script fails
 * @throws ScriptTimeoutError    if the template script runs too long
 */
export async function resolveContext(
  template: Template,
  supplied: Readonly<Record<string, unknown>>,
  options: ResolveOptions = {}
): Promise<BindingContext> {
  const source = selectContextSource(template, supplied, options);

  const raw: Readonly<Record<string, unknown>> =
    source.kind === "static"
      ? source.values
      : await source.provider.execute(template, source.parameters);

  const context: Record<string, string> = {};
  for (const variable of template.variables) {
    context[variable.name] = toValue(raw[variable.name]);
  }

  const missing = findMissingVariables(template, context);
  if (missing.length > 0) {
    throw new ValidationError(template.id, missing);
  }

  return Object.freeze(context);
}

/**
 * Every required variable whose value is absent or blank, in declaration order.
 */
export function findMissingVariables(
  template: Template,
  values: Readonly<Record<string, unknown>>
): MissingVariable[] {
  const missing: MissingVariable[] = [];
  for (const variable of template.variables) {
    if (variable.required && toValue(values[variable.name]).trim() === "") {
      missing.push({
        name: variable.name,
        ...(variable.description !== undefined ? { description: variable.description } : {}),
      });
    }
  }
  return missing;
}

/**
 * Supplied values arrive from forms and flags; only scalars bind.
 */
function toValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}
