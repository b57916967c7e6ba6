/**
 * Printer settings schema.
 *
 * Settings are validated once at startup and then treated as read-only:
 * every render and print call in a process uses the same frozen values.
 */

import { z } from "zod";

import { DEFAULT_PRINTER_SETTINGS as DEFAULTS } from "./defaults.js";

export const RuntimeEnvironment = z.enum(["development", "production", "test"]);
export type RuntimeEnvironment = z.infer<typeof RuntimeEnvironment>;

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const PrinterSettingsSchema = z
  .object({
    /** Runtime environment */
    env: RuntimeEnvironment.default(DEFAULTS.env),

    /** Network printer host; printing is unavailable while unset */
    printerHost: z.string().min(1).optional(),

    /** Raw TCP port the printer listens on */
    printerPort: z.number().int().min(1).max(65535).default(DEFAULTS.printerPort),

    /** Preview line width in characters */
    charsPerLine: z.number().int().min(8).max(256).default(DEFAULTS.charsPerLine),

    /** Printer renders unicode text; when false, text is transliterated to ASCII */
    unicode: z.boolean().default(DEFAULTS.unicode),

    /** Upper bound on a template script's run time */
    scriptTimeoutMs: z.number().int().min(100).max(600_000).default(DEFAULTS.scriptTimeoutMs),

    /** Directory holding template definitions */
    templatesDir: z.string().min(1).default(DEFAULTS.templatesDir),

    logLevel: LogLevelSchema.default(DEFAULTS.logLevel),

    logDir: z.string().min(1).default(DEFAULTS.logDir),
  })
  .strict();

export type PrinterSettings = z.infer<typeof PrinterSettingsSchema>;
export type PrinterSettingsInput = z.input<typeof PrinterSettingsSchema>;
