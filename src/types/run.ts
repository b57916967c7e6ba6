/**
 * Runs are the pipeline's canonical output: styled text, in print order,
 * before any target-specific encoding.
 */

import type { StyleSet } from "../styles/attributes.js";

export interface Run {
  readonly text: string;
  readonly style: StyleSet;
}
