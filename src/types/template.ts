/**
 * Loaded template entities.
 * Templates are deep-frozen by the loader and shared across renders.
 */

import type { StyleSet } from "../styles/attributes.js";
import type { DirectiveNode } from "../templates/directives.js";

export interface TemplateVariable {
  readonly name: string;
  readonly description?: string;
  /** Renders fail when a required variable is blank. */
  readonly required: boolean;
  /** Whether the value's own markdown is honored inside markdown segments. */
  readonly markdown: boolean;
}

export interface TemplateSegment {
  readonly index: number;
  readonly text: string;
  readonly markdown: boolean;
  readonly styles: StyleSet;
  /** Directives compiled once at load time. */
  readonly nodes: readonly DirectiveNode[];
}

export interface TemplateSummary {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
}

export interface Template extends TemplateSummary {
  readonly variables: readonly TemplateVariable[];
  readonly segments: readonly TemplateSegment[];
  /** Absolute path of the context script, when the template has one. */
  readonly script?: string;
}

/** Resolved variable values for one render pass. */
export type BindingContext = Readonly<Record<string, string>>;
