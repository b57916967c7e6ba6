/**
 * Restricted markdown → styled spans.
 *
 * Only the constructs a receipt printer can express are recognized:
 *
 *   **bold**  __bold__      → bold
 *   *emphasis*  _emphasis_  → underline (printers have no italics)
 *   # Heading               → bold + double width + double height
 *   ## Heading              → bold + double height
 *   ### … ###### Heading    → bold
 *   \*  \_  \#  \\          → the literal character
 *
 * Anything else (links, lists, code, unmatched delimiters) is literal text.
 * Delimiters never span lines. Each line's terminating newline belongs to
 * the last span of that line, and neighbouring spans with identical
 * overrides are coalesced, so plain text comes back as a single span.
 */

import type { StyleSet } from "../styles/attributes.js";
import { mergeStyles, stylesEqual } from "../styles/merge.js";

export interface MarkdownSpan {
  readonly text: string;
  readonly overrides: StyleSet;
}

const HEADING_RE = /^(#{1,6})[ \t]+(.*)$/;

const ESCAPABLE = new Set(["\\", "*", "_", "#"]);

const BOLD: StyleSet = { bold: true };
const EMPHASIS: StyleSet = { underline: true };

const HEADING_STYLES: readonly StyleSet[] = [
  { bold: true, double_width: true, double_height: true },
  { bold: true, double_height: true },
  { bold: true },
];

/**
 * Parse markdown text into styled spans.
 */
export function parseMarkdown(text: string): MarkdownSpan[] {
  const spans: MarkdownSpan[] = [];
  const lines = text.split("\n");

  lines.forEach((line, index) => {
    const lineSpans = parseLine(line);
    const isLast = index === lines.length - 1;
    if (!isLast) {
      const tail = lineSpans.pop();
      lineSpans.push(
        tail ? { text: tail.text + "\n", overrides: tail.overrides } : { text: "\n", overrides: {} }
      );
    }
    for (const span of lineSpans) appendSpan(spans, span);
  });

  return spans;
}

/**
 * Backslash-escape every character the parser treats as markup, so the
 * text survives parseMarkdown() unchanged.
 */
export function escapeMarkdown(text: string): string {
  let out = "";
  for (const ch of text) {
    out += ESCAPABLE.has(ch) ? `\\${ch}` : ch;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Line and inline parsing
// ---------------------------------------------------------------------------

function parseLine(line: string): MarkdownSpan[] {
  const heading = HEADING_RE.exec(line);
  if (heading) {
    const level = heading[1]?.length ?? 1;
    const style = HEADING_STYLES[Math.min(level, HEADING_STYLES.length) - 1] ?? BOLD;
    return parseInline(heading[2] ?? "", style);
  }
  return parseInline(line, {});
}

function parseInline(source: string, base: StyleSet): MarkdownSpan[] {
  const spans: MarkdownSpan[] = [];
  let literal = "";

  const flush = (): void => {
    if (literal !== "") {
      appendSpan(spans, { text: literal, overrides: base });
      literal = "";
    }
  };

  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    const next = source.charAt(i + 1);

    if (ch === "\\" && ESCAPABLE.has(next)) {
      literal += next;
      i += 2;
      continue;
    }

    if (ch === "*" || ch === "_") {
      const strong = next === ch;
      const marker = strong ? ch + ch : ch;
      const close = findClosing(source, i, marker);
      if (close !== -1) {
        flush();
        const inner = source.slice(i + marker.length, close);
        const overrides = mergeStyles(base, strong ? BOLD : EMPHASIS);
        for (const span of parseInline(inner, overrides)) appendSpan(spans, span);
        i = close + marker.length;
        continue;
      }
      // Unmatched: keep the whole run of delimiter characters literal.
      literal += marker;
      i += marker.length;
      continue;
    }

    literal += ch;
    i++;
  }

  flush();
  return spans;
}

/**
 * Locate the closing delimiter for an opener at `start`, or -1.
 *
 * Openers must be followed by a non-space, closers preceded by one.
 * Underscore delimiters must not touch a word character on the outside.
 */
function findClosing(source: string, start: number, marker: string): number {
  const ch = marker.charAt(0);
  const contentStart = start + marker.length;
  const first = source.charAt(contentStart);

  if (first === "" || /\s/.test(first)) return -1;
  if (ch === "_" && isWordChar(source.charAt(start - 1))) return -1;

  let j = contentStart;
  while (j < source.length) {
    const c = source.charAt(j);
    if (c === "\\" && ESCAPABLE.has(source.charAt(j + 1))) {
      j += 2;
      continue;
    }
    if (c !== ch) {
      j++;
      continue;
    }

    // Measure the whole delimiter run at j.
    let runEnd = j;
    while (source.charAt(runEnd) === ch) runEnd++;
    const runLength = runEnd - j;

    const closesHere =
      runLength === marker.length &&
      j > contentStart &&
      !/\s/.test(source.charAt(j - 1)) &&
      !(ch === "_" && isWordChar(source.charAt(runEnd)));

    if (closesHere) return j;
    j = runEnd;
  }
  return -1;
}

function isWordChar(c: string): boolean {
  return c !== "" && /[\p{L}\p{N}]/u.test(c);
}

function appendSpan(spans: MarkdownSpan[], span: MarkdownSpan): void {
  if (span.text === "") return;
  const last = spans[spans.length - 1];
  if (last && stylesEqual(last.overrides, span.overrides)) {
    spans[spans.length - 1] = { text: last.text + span.text, overrides: last.overrides };
  } else {
    spans.push(span);
  }
}
