/**
 * Application configuration.
 *
 * Reads the environment (and `.env`), validates it and returns frozen
 * settings. Nothing is read at import time; callers load configuration once
 * at startup and pass it down explicitly.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvInt,
  type EnvSource,
} from "./env.js";
import { loadPrinterSettings, type PrinterSettings } from "./printer/index.js";

export { ConfigError, requireEnv, type EnvSource } from "./env.js";
export * from "./printer/index.js";

/** Environment variable backing each settings key. */
export const ENV_KEYS = {
  env: "NODE_ENV",
  printerHost: "PRINTER_HOST",
  printerPort: "PRINTER_PORT",
  charsPerLine: "CHARS_PER_LINE",
  unicode: "ENABLE_SPECIAL_LETTERS",
  scriptTimeoutMs: "SCRIPT_TIMEOUT_MS",
  templatesDir: "TEMPLATES_DIR",
  logLevel: "LOG_LEVEL",
  logDir: "LOG_DIR",
} as const satisfies Record<keyof PrinterSettings, string>;

/**
 * Load and validate application configuration.
 * Unset variables take their defaults; invalid ones fail fast.
 *
 * @throws ConfigError
 */
export function loadAppConfig(source: EnvSource = process.env): Readonly<PrinterSettings> {
  // Raw values; the schema checks enums and ranges.
  const input: Partial<Record<keyof PrinterSettings, unknown>> = {};
  const set = (key: keyof PrinterSettings, value: unknown): void => {
    if (value !== undefined) input[key] = value;
  };

  set("env", optionalEnv(ENV_KEYS.env, source));
  set("printerHost", optionalEnv(ENV_KEYS.printerHost, source));
  set("printerPort", optionalEnvInt(ENV_KEYS.printerPort, source));
  set("charsPerLine", optionalEnvInt(ENV_KEYS.charsPerLine, source));
  set("unicode", optionalEnvBool(ENV_KEYS.unicode, source));
  set("scriptTimeoutMs", optionalEnvInt(ENV_KEYS.scriptTimeoutMs, source));
  set("templatesDir", optionalEnv(ENV_KEYS.templatesDir, source));
  set("logLevel", optionalEnv(ENV_KEYS.logLevel, source));
  set("logDir", optionalEnv(ENV_KEYS.logDir, source));

  return loadPrinterSettings(input);
}

/**
 * The printer host, or ConfigError naming the variable to set.
 */
export function requirePrinterHost(settings: Readonly<PrinterSettings>): string {
  if (settings.printerHost === undefined) {
    throw new ConfigError(
      `No printer configured: set ${ENV_KEYS.printerHost} to the printer's network address`
    );
  }
  return settings.printerHost;
}
