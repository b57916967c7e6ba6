/**
 * Default printer settings.
 *
 * A typical 58 mm receipt printer: 32 characters per line in font A, no
 * unicode code page. No host is configured, so nothing prints until one is.
 * The settings schema takes its defaults from here.
 */

export const DEFAULT_PRINTER_SETTINGS = {
  env: "development",
  printerPort: 9100,
  charsPerLine: 32,
  unicode: false,
  scriptTimeoutMs: 5000,
  templatesDir: "templates",
  logLevel: "info",
  logDir: "logs",
} as const;
