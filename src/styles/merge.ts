/**
 * Style merging.
 *
 * merge(base, override) is right-biased per attribute: a key present in
 * the override replaces the base value, every other key carries over.
 * Attributes are atomic, so nothing is blended.
 */

import {
  STYLE_ATTRIBUTES,
  STYLE_DEFAULTS,
  type ResolvedStyle,
  type StyleSet,
} from "./attributes.js";

type MutableStyle = { -readonly [K in keyof StyleSet]: StyleSet[K] };

/**
 * Merge inline overrides onto a base style.
 */
export function mergeStyles(base: StyleSet, override: StyleSet): StyleSet {
  const merged: MutableStyle = {};
  for (const key of STYLE_ATTRIBUTES) {
    const value = override[key] ?? base[key];
    if (value !== undefined) {
      assign(merged, key, value);
    }
  }
  return merged;
}

/**
 * Fill every absent attribute with its documented default.
 */
export function resolveStyle(style: StyleSet): ResolvedStyle {
  return {
    align: style.align ?? STYLE_DEFAULTS.align,
    font: style.font ?? STYLE_DEFAULTS.font,
    bold: style.bold ?? STYLE_DEFAULTS.bold,
    underline: style.underline ?? STYLE_DEFAULTS.underline,
    double_width: style.double_width ?? STYLE_DEFAULTS.double_width,
    double_height: style.double_height ?? STYLE_DEFAULTS.double_height,
  };
}

/**
 * Attribute-wise equality of two sparse styles (absent ≠ default).
 */
export function stylesEqual(a: StyleSet, b: StyleSet): boolean {
  return STYLE_ATTRIBUTES.every((key) => a[key] === b[key]);
}

function assign<K extends keyof MutableStyle>(
  target: MutableStyle,
  key: K,
  value: NonNullable<MutableStyle[K]>
): void {
  target[key] = value;
}
