/**
 * ESC/POS command builders.
 *
 * Only the commands the style attribute set maps onto, plus the document
 * framing (initialize, feed, cut):
 *
 *   ESC @        initialize (resets every attribute to its default)
 *   ESC a n      justification       0 left, 1 center, 2 right
 *   ESC M n      character font      0 font A, 1 font B
 *   ESC E n      emphasized (bold)   0 off, 1 on
 *   ESC - n      underline           0 off, 1 on (1-dot)
 *   GS ! n       character size      bits 4-7 width, bits 0-3 height
 *   ESC d n      print and feed n lines
 *   GS V 0       full cut
 */

import type { Alignment, Font } from "../styles/attributes.js";

const ESC = 0x1b;
const GS = 0x1d;

export type CommandName =
  | "initialize"
  | "align"
  | "font"
  | "bold"
  | "underline"
  | "size"
  | "feed"
  | "cut";

export interface CommandOperation {
  readonly kind: "command";
  readonly name: CommandName;
  readonly bytes: Uint8Array;
}

export interface TextOperation {
  readonly kind: "text";
  readonly text: string;
  readonly bytes: Uint8Array;
}

/** One unit of the ordered printer stream. */
export type PrinterOperation = CommandOperation | TextOperation;

const ALIGN_CODES: Record<Alignment, number> = { left: 0, center: 1, right: 2 };
const FONT_CODES: Record<Font, number> = { a: 0, b: 1 };

function command(name: CommandName, ...bytes: number[]): CommandOperation {
  return { kind: "command", name, bytes: Uint8Array.from(bytes) };
}

export const initialize = (): CommandOperation => command("initialize", ESC, 0x40);

export const setAlign = (align: Alignment): CommandOperation =>
  command("align", ESC, 0x61, ALIGN_CODES[align]);

export const setFont = (font: Font): CommandOperation =>
  command("font", ESC, 0x4d, FONT_CODES[font]);

export const setBold = (on: boolean): CommandOperation =>
  command("bold", ESC, 0x45, on ? 1 : 0);

export const setUnderline = (on: boolean): CommandOperation =>
  command("underline", ESC, 0x2d, on ? 1 : 0);

export const setCharacterSize = (doubleWidth: boolean, doubleHeight: boolean): CommandOperation =>
  command("size", GS, 0x21, (doubleWidth ? 0x10 : 0) | (doubleHeight ? 0x01 : 0));

export const feedLines = (lines: number): CommandOperation =>
  command("feed", ESC, 0x64, Math.max(0, Math.min(255, Math.trunc(lines))));

export const cutPaper = (): CommandOperation => command("cut", GS, 0x56, 0x00);

export function textOperation(text: string): TextOperation {
  return { kind: "text", text, bytes: new TextEncoder().encode(text) };
}

/**
 * Concatenate operations into the byte stream sent to the device.
 */
export function operationsToBytes(operations: readonly PrinterOperation[]): Uint8Array {
  const total = operations.reduce((sum, op) => sum + op.bytes.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const op of operations) {
    out.set(op.bytes, offset);
    offset += op.bytes.length;
  }
  return out;
}
