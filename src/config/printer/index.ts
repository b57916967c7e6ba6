export {
  PrinterSettingsSchema,
  RuntimeEnvironment,
  type PrinterSettings,
  type PrinterSettingsInput,
} from "./schema.js";
export { DEFAULT_PRINTER_SETTINGS } from "./defaults.js";
export {
  loadPrinterSettings,
  SettingsError,
  type SettingsIssue,
} from "./loader.js";
