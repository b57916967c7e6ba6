/**
 * Binding context resolution: caller values or template scripts.
 */

export {
  resolveContext,
  selectContextSource,
  findMissingVariables,
  type ContextSource,
  type StaticVariables,
  type ScriptGenerated,
  type ResolveOptions,
} from "./resolver.js";

export {
  ScriptContextProvider,
  DEFAULT_SCRIPT_TIMEOUT_MS,
  type ScriptContextProviderOptions,
  type ScriptInput,
} from "./script-provider.js";
