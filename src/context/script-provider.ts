/**
 * Script context provider.
 *
 * A template may name a script that generates its variable values (an
 * agenda for the current week, for instance). Scripts are ES modules that
 * export `computeVariables(input)` (or a default function), sync or async:
 *
 *   export function computeVariables({ template, variables, values }) {
 *     return { week_number: "42" };
 *   }
 *
 * `values` holds the caller's scalar inputs as strings (form fields, --set
 * flags). Scripts read their parameters from it; only what they return
 * binds to the template.
 *
 * Each execution runs in its own worker thread:
 *
 *   - the worker gets an empty `process.env`, no inherited exec arguments
 *     and a bounded heap, so nothing from the host process leaks in
 *   - a hard wall-clock budget terminates the worker when exceeded
 *   - the result either covers the template (all-or-nothing) or the call
 *     fails; a partial context is never returned
 */

import { Worker } from "node:worker_threads";
import { pathToFileURL } from "node:url";

import { ScriptExecutionError, ScriptTimeoutError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { Template } from "../types/template.js";

// ---------------------------------------------------------------------------
// Worker bootstrap
// ---------------------------------------------------------------------------

/**
 * Evaluated inside the worker. Imports the script, calls it, and posts a
 * single `{ ok, … }` message back.
 */
const WORKER_SOURCE = `
const { parentPort, workerData } = require("node:worker_threads");
import(workerData.url)
  .then(async (mod) => {
    const fn = typeof mod.computeVariables === "function" ? mod.computeVariables : mod.default;
    if (typeof fn !== "function") {
      throw new Error("script must export a computeVariables() function");
    }
    const variables = await fn(workerData.input);
    parentPort.postMessage({ ok: true, variables });
  })
  .catch((err) => {
    parentPort.postMessage({
      ok: false,
      message: err instanceof Error ? err.message : String(err),
    });
  });
`;

export const DEFAULT_SCRIPT_TIMEOUT_MS = 5000;

/** Heap ceiling for a script worker, in megabytes. */
const SCRIPT_HEAP_MB = 64;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What a script receives. */
export interface ScriptInput {
  template: string;
  variables: string[];
  /** Caller-supplied parameters, as strings. */
  values: Record<string, string>;
}

export interface ScriptContextProviderOptions {
  /** Wall-clock budget per execution (default: 5000 ms). */
  timeoutMs?: number;
  logger?: Logger;
}

type WorkerReply =
  | { ok: true; variables: unknown }
  | { ok: false; message: string };

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class ScriptContextProvider {
  readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ScriptContextProviderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run the template's script and return its values for the declared
   * variables, as strings.
   *
   * @throws ScriptExecutionError if the script fails or returns unusable output
   * @throws ScriptTimeoutError   if it exceeds the time budget
   */
  async execute(
    template: Template,
    supplied: Readonly<Record<string, unknown>> = {}
  ): Promise<Record<string, string>> {
    const scriptPath = template.script;
    if (scriptPath === undefined) {
      throw new ScriptExecutionError(template.id, "(none)", "template has no script");
    }

    const input: ScriptInput = {
      template: template.id,
      variables: template.variables.map((v) => v.name),
      values: scriptParameters(supplied),
    };

    const started = Date.now();
    const output = await this.runWorker(template.id, scriptPath, input);
    this.logger.debug("Template script finished", {
      template: template.id,
      elapsedMs: Date.now() - started,
    });

    return coerceOutput(template, scriptPath, output);
  }

  private runWorker(templateId: string, scriptPath: string, input: ScriptInput): Promise<unknown> {
    return new Promise<unknown>((resolvePromise, rejectPromise) => {
      let settled = false;

      const worker = new Worker(WORKER_SOURCE, {
        eval: true,
        workerData: { url: pathToFileURL(scriptPath).href, input },
        env: {},
        execArgv: [],
        resourceLimits: { maxOldGenerationSizeMb: SCRIPT_HEAP_MB },
      });

      const finish = (outcome: { value: unknown } | { error: Error }): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        // The worker may still hold timers or handles the script left behind.
        worker.terminate().catch((err: unknown) => {
          this.logger.warn("Failed to terminate script worker", {
            template: templateId,
            message: err instanceof Error ? err.message : String(err),
          });
        });
        if ("error" in outcome) {
          rejectPromise(outcome.error);
        } else {
          resolvePromise(outcome.value);
        }
      };

      const timer = setTimeout(() => {
        this.logger.warn("Template script timed out", { template: templateId, timeoutMs: this.timeoutMs });
        finish({ error: new ScriptTimeoutError(templateId, scriptPath, this.timeoutMs) });
      }, this.timeoutMs);

      worker.on("message", (reply: WorkerReply) => {
        if (reply.ok) {
          finish({ value: reply.variables });
        } else {
          finish({ error: new ScriptExecutionError(templateId, scriptPath, reply.message) });
        }
      });

      worker.on("error", (err: Error) => {
        finish({ error: new ScriptExecutionError(templateId, scriptPath, err.message, { cause: err }) });
      });

      worker.on("exit", (code: number) => {
        finish({
          error: new ScriptExecutionError(
            templateId,
            scriptPath,
            `worker exited with code ${code} before producing a result`
          ),
        });
      });
    });
  }
}

// ---------------------------------------------------------------------------
// Output coercion
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Scalar caller values as strings; anything else cannot cross into the worker.
 */
function scriptParameters(supplied: Readonly<Record<string, unknown>>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [name, value] of Object.entries(supplied)) {
    if (typeof value === "string") {
      values[name] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      values[name] = String(value);
    }
  }
  return values;
}

/**
 * Keep the declared variables from a script's output, as strings.
 * Missing keys are left out; the resolver reports required ones.
 */
function coerceOutput(
  template: Template,
  scriptPath: string,
  output: unknown
): Record<string, string> {
  if (!isRecord(output)) {
    throw new ScriptExecutionError(
      template.id,
      scriptPath,
      `expected an object of variable values, got ${Array.isArray(output) ? "an array" : typeof output}`
    );
  }

  const values: Record<string, string> = {};
  for (const { name } of template.variables) {
    if (!Object.prototype.hasOwnProperty.call(output, name)) continue;
    const value = output[name];
    if (typeof value === "string") {
      values[name] = value;
    } else if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
      values[name] = String(value);
    } else if (value === null || value === undefined) {
      values[name] = "";
    } else {
      throw new ScriptExecutionError(
        template.id,
        scriptPath,
        `variable "${name}" must be a string, number or boolean (got ${Array.isArray(value) ? "array" : typeof value})`
      );
    }
  }
  return values;
}
