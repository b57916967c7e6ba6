/**
 * Preview render target.
 *
 * Lays the run sequence out the way a receipt would look: display lines
 * wrapped to the printer's characters-per-line, aligned by padding, with
 * each attribute shown as an annotation around the text it styles:
 *
 *   [small]…[/small]   font b
 *   [h]…[/h]           double height
 *   [w]…[/w]           double width (counts two columns per character)
 *   [u]…[/u]           underline
 *   [b]…[/b]           bold
 *
 * Wrapping is display-only. `text` is the exact concatenation of the runs,
 * and every display line records whether it ended at a real newline, so
 * the lines rebuild `text` character for character.
 */

import { describeValue, RenderError } from "../errors.js";
import type { Alignment, ResolvedStyle } from "../styles/attributes.js";
import { resolveStyle } from "../styles/merge.js";
import type { Run } from "../types/run.js";
import { findStyleProblems, sanitizeStyle } from "./style-check.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PreviewSpan {
  readonly text: string;
  readonly style: ResolvedStyle;
}

export interface PreviewLine {
  readonly spans: readonly PreviewSpan[];
  readonly align: Alignment;
  /** Display columns used (double-width characters count twice). */
  readonly columns: number;
  /** True when the line ended at a newline in the text, false when wrapped. */
  readonly newline: boolean;
}

export interface PreviewDocument {
  /** Concatenated run text, unchanged. */
  readonly text: string;
  readonly lines: readonly PreviewLine[];
  /** Annotated, aligned display text. */
  readonly markup: string;
  /** Problems tolerated in lenient mode. */
  readonly warnings: readonly string[];
}

export interface PreviewOptions {
  /** Display width in columns (default: 32). */
  charsPerLine?: number;
  /** Throw RenderError on unknown style values instead of warning (default: false). */
  strict?: boolean;
}

export const DEFAULT_CHARS_PER_LINE = 32;

interface Cell {
  ch: string;
  style: ResolvedStyle;
  cols: number;
}

interface LogicalLine {
  cells: Cell[];
  align: Alignment;
  newline: boolean;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render runs for on-screen preview.
 *
 * @throws RenderError in strict mode, naming the first unsupported attribute
 */
export function renderPreview(runs: readonly Run[], options: PreviewOptions = {}): PreviewDocument {
  const width = Math.max(1, Math.trunc(options.charsPerLine ?? DEFAULT_CHARS_PER_LINE));
  const strict = options.strict ?? false;
  const warnings: string[] = [];

  const logical: LogicalLine[] = [];
  let cells: Cell[] = [];
  let lineAlign: Alignment | null = null;

  runs.forEach((run, index) => {
    const problems = findStyleProblems(run);
    const first = problems[0];
    if (first && strict) {
      throw new RenderError("preview", first.attribute, first.value, index);
    }
    for (const problem of problems) {
      warnings.push(
        `Run ${index}: unsupported value ${describeValue(problem.value)} ` +
          `for style attribute "${problem.attribute}"; using the default`
      );
    }
    const style = resolveStyle(sanitizeStyle(run, problems));

    for (const ch of Array.from(run.text)) {
      lineAlign ??= style.align;
      if (ch === "\n") {
        logical.push({ cells, align: lineAlign, newline: true });
        cells = [];
        lineAlign = null;
      } else {
        cells.push({ ch, style, cols: style.double_width ? 2 : 1 });
      }
    }
  });
  if (cells.length > 0) {
    logical.push({ cells, align: lineAlign ?? "left", newline: false });
  }

  const lines = logical.flatMap((line) => wrapLine(line, width));

  return {
    text: runs.map((r) => r.text).join(""),
    lines,
    markup: lines.map((line) => formatLine(line, width)).join("\n"),
    warnings,
  };
}

/**
 * Rebuild the original text from display lines.
 */
export function previewLinesToText(lines: readonly PreviewLine[]): string {
  return lines
    .map((line) => line.spans.map((s) => s.text).join("") + (line.newline ? "\n" : ""))
    .join("");
}

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

/**
 * Split a logical line into display lines of at most `width` columns,
 * breaking after the last space that fits when there is one.
 */
function wrapLine(line: LogicalLine, width: number): PreviewLine[] {
  const { cells } = line;
  if (cells.length === 0) {
    return [{ spans: [], align: line.align, columns: 0, newline: line.newline }];
  }

  const out: PreviewLine[] = [];
  let start = 0;

  while (start < cells.length) {
    let end = start;
    let cols = 0;
    for (let cell = cells[end]; cell && cols + cell.cols <= width; cell = cells[end]) {
      cols += cell.cols;
      end++;
    }
    // A single character wider than the line still has to go somewhere.
    if (end === start) end = start + 1;

    if (end >= cells.length) {
      out.push(toPreviewLine(cells.slice(start), line.align, line.newline));
      break;
    }

    let cut = end;
    if (cells[end]?.ch === " ") {
      // The space after a full line hangs off its end.
      cut = end + 1;
    } else {
      for (let k = end - 1; k > start; k--) {
        if (cells[k]?.ch === " ") {
          cut = k + 1;
          break;
        }
      }
    }
    out.push(toPreviewLine(cells.slice(start, cut), line.align, false));
    start = cut;
  }

  return out;
}

function sameStyle(a: ResolvedStyle, b: ResolvedStyle): boolean {
  return (
    a.align === b.align &&
    a.font === b.font &&
    a.bold === b.bold &&
    a.underline === b.underline &&
    a.double_width === b.double_width &&
    a.double_height === b.double_height
  );
}

function toPreviewLine(cells: Cell[], align: Alignment, newline: boolean): PreviewLine {
  const spans: PreviewSpan[] = [];
  let columns = 0;
  for (const cell of cells) {
    columns += cell.cols;
    const last = spans[spans.length - 1];
    if (last && sameStyle(last.style, cell.style)) {
      spans[spans.length - 1] = { text: last.text + cell.ch, style: last.style };
    } else {
      spans.push({ text: cell.ch, style: cell.style });
    }
  }
  return { spans, align, columns, newline };
}

// ---------------------------------------------------------------------------
// Markup
// ---------------------------------------------------------------------------

const ANNOTATIONS: readonly [tag: string, applies: (s: ResolvedStyle) => boolean][] = [
  ["small", (s) => s.font === "b"],
  ["h", (s) => s.double_height],
  ["w", (s) => s.double_width],
  ["u", (s) => s.underline],
  ["b", (s) => s.bold],
];

export function annotateSpan(span: PreviewSpan): string {
  const tags = ANNOTATIONS.filter(([, applies]) => applies(span.style)).map(([tag]) => tag);
  const open = tags.map((t) => `[${t}]`).join("");
  const close = [...tags].reverse().map((t) => `[/${t}]`).join("");
  return open + span.text + close;
}

function formatLine(line: PreviewLine, width: number): string {
  const free = Math.max(0, width - line.columns);
  const pad = line.align === "center" ? Math.floor(free / 2) : line.align === "right" ? free : 0;
  return " ".repeat(pad) + line.spans.map(annotateSpan).join("");
}
