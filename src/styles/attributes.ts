/**
 * Style attribute definitions.
 *
 * The attribute set is closed: these six keys are the only formatting a
 * template can ask for, and each has a fixed value domain. Unknown keys
 * are rejected when a template loads, not passed through to the printer.
 *
 *   align          left | center | right    (default: left)
 *   font           a | b                    (default: a)
 *   bold           boolean                  (default: false)
 *   underline      boolean                  (default: false)
 *   double_width   boolean                  (default: false)
 *   double_height  boolean                  (default: false)
 */

import { z } from "zod";

export const Alignment = z.enum(["left", "center", "right"]);
export type Alignment = z.infer<typeof Alignment>;

export const Font = z.enum(["a", "b"]);
export type Font = z.infer<typeof Font>;

/**
 * Sparse style map. Strict: unknown attribute names fail validation.
 */
export const StyleSetSchema = z
  .object({
    align: Alignment.optional(),
    font: Font.optional(),
    bold: z.boolean().optional(),
    underline: z.boolean().optional(),
    double_width: z.boolean().optional(),
    double_height: z.boolean().optional(),
  })
  .strict();

export type StyleSet = Readonly<z.infer<typeof StyleSetSchema>>;

/** A StyleSet with every attribute filled in. */
export type ResolvedStyle = Readonly<Required<z.infer<typeof StyleSetSchema>>>;

export type StyleAttribute = keyof ResolvedStyle;

/** Attribute names in canonical order. */
export const STYLE_ATTRIBUTES: readonly StyleAttribute[] = [
  "align",
  "font",
  "bold",
  "underline",
  "double_width",
  "double_height",
];

/** Values an absent attribute inherits. */
export const STYLE_DEFAULTS: ResolvedStyle = Object.freeze({
  align: "left",
  font: "a",
  bold: false,
  underline: false,
  double_width: false,
  double_height: false,
});
