/**
 * Printer render target.
 *
 * Encodes runs as an ordered ESC/POS operation stream. Attributes are
 * device state: after `ESC @` the printer sits at the defaults, and the
 * encoder tracks what it has switched since, emitting a command only when
 * a run needs a different value. Double width and double height share the
 * one `GS !` command.
 *
 * Printing is encode-then-send. Encoding fails before anything reaches the
 * device; a transport failure part-way leaves the printer in an unknown
 * state and is reported, never retried or resumed.
 */

import { PrintTransportError, RenderError } from "../errors.js";
import { STYLE_DEFAULTS, type ResolvedStyle } from "../styles/attributes.js";
import { resolveStyle } from "../styles/merge.js";
import type { Run } from "../types/run.js";
import {
  cutPaper,
  feedLines,
  initialize,
  operationsToBytes,
  setAlign,
  setBold,
  setCharacterSize,
  setFont,
  setUnderline,
  textOperation,
  type PrinterOperation,
} from "./escpos.js";
import { findStyleProblems } from "./style-check.js";
import type { PrinterConnection } from "./transport.js";

export interface PrinterEncodeOptions {
  /** Lines fed before cutting (default: 3). */
  feedLines?: number;
  /** Append a paper cut (default: true). */
  cut?: boolean;
}

export interface PrintResult {
  operations: number;
  bytes: number;
}

/**
 * Encode runs into printer operations.
 *
 * @throws RenderError naming the first attribute the printer cannot encode
 */
export function encodeForPrinter(
  runs: readonly Run[],
  options: PrinterEncodeOptions = {}
): PrinterOperation[] {
  const { feedLines: feed = 3, cut = true } = options;
  const ops: PrinterOperation[] = [initialize()];
  let state: ResolvedStyle = STYLE_DEFAULTS;

  runs.forEach((run, index) => {
    const problem = findStyleProblems(run)[0];
    if (problem) {
      throw new RenderError("printer", problem.attribute, problem.value, index);
    }

    const want = resolveStyle(run.style);
    if (want.align !== state.align) ops.push(setAlign(want.align));
    if (want.font !== state.font) ops.push(setFont(want.font));
    if (want.bold !== state.bold) ops.push(setBold(want.bold));
    if (want.underline !== state.underline) ops.push(setUnderline(want.underline));
    if (want.double_width !== state.double_width || want.double_height !== state.double_height) {
      ops.push(setCharacterSize(want.double_width, want.double_height));
    }
    state = want;

    ops.push(textOperation(run.text));
  });

  if (feed > 0) ops.push(feedLines(feed));
  if (cut) ops.push(cutPaper());
  return ops;
}

/**
 * Encode runs straight to the device byte stream.
 */
export function encodeToBytes(runs: readonly Run[], options: PrinterEncodeOptions = {}): Uint8Array {
  return operationsToBytes(encodeForPrinter(runs, options));
}

/**
 * Encode and send a document over one connection.
 *
 * The connection is closed on every exit path.
 *
 * @throws RenderError          before the connection is opened
 * @throws PrintTransportError  if opening or any write fails
 */
export async function printRuns(
  runs: readonly Run[],
  connection: PrinterConnection,
  options: PrinterEncodeOptions = {}
): Promise<PrintResult> {
  const ops = encodeForPrinter(runs, options);
  let sent = 0;
  let bytes = 0;

  try {
    await connection.open();
    for (const op of ops) {
      await connection.write(op.bytes);
      sent++;
      bytes += op.bytes.length;
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    const closeError = await closeQuietly(connection);
    throw new PrintTransportError(
      connection.endpoint,
      sent,
      ops.length,
      closeError ? `${reason}; close also failed: ${closeError.message}` : reason,
      { cause: err }
    );
  }

  try {
    await connection.close();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PrintTransportError(connection.endpoint, sent, ops.length, `close failed: ${reason}`, {
      cause: err,
    });
  }

  return { operations: ops.length, bytes };
}

async function closeQuietly(connection: PrinterConnection): Promise<Error | null> {
  try {
    await connection.close();
    return null;
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  }
}
