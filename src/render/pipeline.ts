/**
 * Run pipeline.
 *
 * Turns a loaded template and a resolved binding context into the ordered
 * Run sequence both render targets consume:
 *
 *   1. Evaluate each segment's compiled directives against the context.
 *      In markdown segments, values of plain (non-markdown) variables are
 *      escaped first so their characters print literally.
 *   2. Split markdown segments into styled spans; plain segments are one
 *      span with no overrides.
 *   3. Merge each span's overrides onto the segment's base style.
 *   4. Optionally transliterate text to ASCII for printers without unicode.
 *
 * Segment order is run order, an empty expansion yields no runs, and the
 * same template + context always yields the same runs.
 */

import { transliterate } from "transliteration";

import { escapeMarkdown, parseMarkdown, type MarkdownSpan } from "../markdown/spans.js";
import { mergeStyles } from "../styles/merge.js";
import { evaluate } from "../templates/directives.js";
import type { Run } from "../types/run.js";
import type { BindingContext, Template, TemplateSegment } from "../types/template.js";

export interface RenderRunsOptions {
  /**
   * When false, run text is transliterated to ASCII (e.g. "Łódź" → "Lodz").
   * Default: true.
   */
  unicode?: boolean;
}

/**
 * Expand one segment to its final text.
 */
export function expandSegment(
  template: Template,
  segment: TemplateSegment,
  context: BindingContext
): string {
  if (!segment.markdown) {
    return evaluate(segment.nodes, context);
  }
  const plainVariables = new Set(
    template.variables.filter((v) => !v.markdown).map((v) => v.name)
  );
  return evaluate(segment.nodes, context, {
    transform: (name, value) => (plainVariables.has(name) ? escapeMarkdown(value) : value),
  });
}

/**
 * Render a template to runs.
 */
export function renderRuns(
  template: Template,
  context: BindingContext,
  options: RenderRunsOptions = {}
): Run[] {
  const { unicode = true } = options;
  const runs: Run[] = [];

  for (const segment of template.segments) {
    const text = expandSegment(template, segment, context);
    if (text === "") continue;

    const spans: MarkdownSpan[] = segment.markdown
      ? parseMarkdown(text)
      : [{ text, overrides: {} }];

    for (const span of spans) {
      const runText = unicode ? span.text : transliterate(span.text);
      if (runText === "") continue;
      runs.push(
        Object.freeze({
          text: runText,
          style: Object.freeze(mergeStyles(segment.styles, span.overrides)),
        })
      );
    }
  }

  return runs;
}
