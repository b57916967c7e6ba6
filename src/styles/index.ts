/**
 * Style attributes and the merge engine.
 */

export {
  Alignment,
  Font,
  StyleSetSchema,
  STYLE_ATTRIBUTES,
  STYLE_DEFAULTS,
  type StyleSet,
  type ResolvedStyle,
  type StyleAttribute,
} from "./attributes.js";

export { mergeStyles, resolveStyle, stylesEqual } from "./merge.js";
