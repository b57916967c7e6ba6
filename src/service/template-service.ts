/**
 * Template service.
 *
 * The facade a web layer or CLI calls: it wires the loader, resolver, run
 * pipeline and render targets together and turns pipeline failures into
 * response payloads for the preview and validate calls.
 *
 * USAGE:
 *
 *   const service = new TemplateService({
 *     loader: new TemplateLoader(settings.templatesDir),
 *     settings,
 *   });
 *
 *   const result = await service.preview("ticket", { title: "Order #5" });
 *   if (result.success) console.log(result.preview);
 *
 * Every call gets its own job id, carried on each log entry it writes.
 */

import { requirePrinterHost, type PrinterSettings } from "../config/index.js";
import { findMissingVariables, resolveContext } from "../context/resolver.js";
import { ScriptContextProvider } from "../context/script-provider.js";
import { ValidationError } from "../errors.js";
import { generateJobId } from "../logging/job-id.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { renderRuns } from "../render/pipeline.js";
import { renderPreview } from "../render/preview.js";
import { printRuns, type PrintResult } from "../render/printer.js";
import { tcpConnectionFactory, type ConnectionFactory } from "../render/transport.js";
import type { TemplateLoader } from "../templates/loader.js";
import type { Run } from "../types/run.js";
import type { TemplateSummary } from "../types/template.js";

/** Shown in place of a preview that renders to nothing visible. */
export const EMPTY_PREVIEW_NOTICE = "Template contains only whitespace/formatting.";

export const VALIDATION_OK_MESSAGE = "Template validation successful";

export type SuppliedValues = Readonly<Record<string, unknown>>;

export type PreviewResponse =
  | {
      success: true;
      /** Annotated, aligned display text (or the empty-preview notice). */
      preview: string;
      /** Exact concatenated run text. */
      text: string;
      runs: Run[];
      warnings: string[];
    }
  | { success: false; error: string };

export type ValidateResponse =
  | { valid: true; message: string }
  | { valid: false; errors: string[] };

export interface TemplateServiceOptions {
  loader: TemplateLoader;
  settings: Readonly<PrinterSettings>;
  /** Default: a provider bounded by `settings.scriptTimeoutMs`. */
  scriptProvider?: ScriptContextProvider;
  /** Default: TCP to `settings.printerHost`, resolved on each print. */
  connectionFactory?: ConnectionFactory;
  logger?: Logger;
}

export class TemplateService {
  private readonly loader: TemplateLoader;
  private readonly settings: Readonly<PrinterSettings>;
  private readonly scriptProvider: ScriptContextProvider;
  private readonly connectionFactory: ConnectionFactory | undefined;
  private readonly logger: Logger;

  constructor(options: TemplateServiceOptions) {
    this.loader = options.loader;
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger;
    this.scriptProvider =
      options.scriptProvider ??
      new ScriptContextProvider({ timeoutMs: options.settings.scriptTimeoutMs, logger: this.logger });
    this.connectionFactory = options.connectionFactory;
  }

  listTemplates(): TemplateSummary[] {
    return this.loader.listAll();
  }

  /**
   * Resolve and render a template to runs.
   *
   * @throws PipelineError from any stage
   */
  async render(templateId: string, supplied: SuppliedValues = {}): Promise<Run[]> {
    return this.renderWith(templateId, supplied, this.jobLogger("render", templateId));
  }

  async preview(templateId: string, supplied: SuppliedValues = {}): Promise<PreviewResponse> {
    const log = this.jobLogger("preview", templateId);
    try {
      const runs = await this.renderWith(templateId, supplied, log);
      const document = renderPreview(runs, { charsPerLine: this.settings.charsPerLine });
      for (const warning of document.warnings) {
        log.warn(warning);
      }
      return {
        success: true,
        preview: document.markup.trim() === "" ? EMPTY_PREVIEW_NOTICE : document.markup,
        text: document.text,
        runs,
        warnings: [...document.warnings],
      };
    } catch (err) {
      const error = describeError(err);
      log.error("Preview failed", { error });
      return { success: false, error };
    }
  }

  /**
   * Check supplied values against a template without rendering it.
   * Scripted templates produce their own values, so only loading is checked.
   */
  async validate(templateId: string, supplied: SuppliedValues = {}): Promise<ValidateResponse> {
    const log = this.jobLogger("validate", templateId);
    try {
      const template = this.loader.load(templateId);
      if (template.script === undefined) {
        const missing = findMissingVariables(template, supplied);
        if (missing.length > 0) {
          log.info("Required fields missing", { missing: missing.map((m) => m.name) });
          return { valid: false, errors: new ValidationError(template.id, missing).format() };
        }
      }
      return { valid: true, message: VALIDATION_OK_MESSAGE };
    } catch (err) {
      const error = describeError(err);
      log.error("Validation failed", { error });
      return { valid: false, errors: [`Validation error: ${error}`] };
    }
  }

  /**
   * Render and send a template to the printer.
   *
   * @throws ConfigError          if no printer is configured
   * @throws PipelineError        from rendering, encoding or transport
   */
  async print(templateId: string, supplied: SuppliedValues = {}): Promise<PrintResult> {
    const log = this.jobLogger("print", templateId);
    const connect = this.connectionFactory ?? this.defaultConnectionFactory();
    try {
      const runs = await this.renderWith(templateId, supplied, log);
      const connection = connect();
      const result = await printRuns(runs, connection);
      log.info("Printed", { endpoint: connection.endpoint, ...result });
      return result;
    } catch (err) {
      log.error("Print failed", { error: describeError(err) });
      throw err;
    }
  }

  private async renderWith(templateId: string, supplied: SuppliedValues, log: Logger): Promise<Run[]> {
    const template = this.loader.load(templateId);
    const context = await resolveContext(template, supplied, { scriptProvider: this.scriptProvider });
    const runs = renderRuns(template, context, { unicode: this.settings.unicode });
    log.debug("Rendered", { runs: runs.length, scripted: template.script !== undefined });
    return runs;
  }

  private defaultConnectionFactory(): ConnectionFactory {
    const host = requirePrinterHost(this.settings);
    return tcpConnectionFactory({ host, port: this.settings.printerPort });
  }

  private jobLogger(action: string, templateId: string): Logger {
    const log = this.logger.child({ jobId: generateJobId(), template: templateId });
    log.debug(`Starting ${action}`);
    return log;
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
