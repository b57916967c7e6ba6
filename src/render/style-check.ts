/**
 * Runtime style checks shared by the render targets.
 *
 * Runs built by the pipeline only carry validated attributes, but the Run
 * sequence is a public seam: adapters check every run again and name the
 * first attribute they cannot encode.
 */

import { StyleSetSchema, type StyleSet } from "../styles/attributes.js";
import type { Run } from "../types/run.js";

export interface StyleProblem {
  /** Offending attribute name ("style" when the map itself is malformed). */
  attribute: string;
  value: unknown;
}

function readAttribute(style: unknown, attribute: string): unknown {
  if (typeof style !== "object" || style === null) return style;
  return Object.getOwnPropertyDescriptor(style, attribute)?.value;
}

/**
 * Every attribute of a run's style that falls outside the known set.
 */
export function findStyleProblems(run: Run): StyleProblem[] {
  const result = StyleSetSchema.safeParse(run.style);
  if (result.success) return [];

  const problems: StyleProblem[] = [];
  for (const issue of result.error.issues) {
    if (issue.code === "unrecognized_keys") {
      for (const key of issue.keys) {
        problems.push({ attribute: key, value: readAttribute(run.style, key) });
      }
      continue;
    }
    const key = issue.path[0];
    if (typeof key === "string") {
      problems.push({ attribute: key, value: readAttribute(run.style, key) });
    } else {
      problems.push({ attribute: "style", value: run.style });
    }
  }
  return problems;
}

/**
 * The style with unknown attributes and out-of-range values dropped, so
 * they fall back to their defaults.
 */
export function sanitizeStyle(run: Run, problems: readonly StyleProblem[]): StyleSet {
  if (problems.length === 0) return run.style;
  const bad = new Set(problems.map((p) => p.attribute));
  if (bad.has("style")) return {};

  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(run.style)) {
    if (!bad.has(key)) cleaned[key] = value;
  }
  const result = StyleSetSchema.safeParse(cleaned);
  return result.success ? result.data : {};
}
