/**
 * Run pipeline and render targets.
 */

export { renderRuns, expandSegment, type RenderRunsOptions } from "./pipeline.js";

export {
  encodeForPrinter,
  encodeToBytes,
  printRuns,
  type PrinterEncodeOptions,
  type PrintResult,
} from "./printer.js";

export {
  renderPreview,
  previewLinesToText,
  annotateSpan,
  DEFAULT_CHARS_PER_LINE,
  type PreviewDocument,
  type PreviewLine,
  type PreviewSpan,
  type PreviewOptions,
} from "./preview.js";

export {
  operationsToBytes,
  type PrinterOperation,
  type CommandOperation,
  type TextOperation,
  type CommandName,
} from "./escpos.js";

export { findStyleProblems, type StyleProblem } from "./style-check.js";

export {
  TcpPrinterConnection,
  tcpConnectionFactory,
  DEFAULT_PRINTER_PORT,
  type PrinterConnection,
  type ConnectionFactory,
  type TcpConnectionOptions,
} from "./transport.js";
