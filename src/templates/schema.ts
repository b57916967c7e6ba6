/**
 * Template definition schema.
 *
 * Definitions are YAML (or JSON) documents:
 *
 *   name: Ticket
 *   description: Print a ticket with a title, ticket number, and text.
 *   variables:
 *     - name: title
 *       description: Ticket Title
 *       required: false
 *   segments:
 *     - text: "{% if title %}{{ title }}\n{% endif %}"
 *       styles: { align: center, bold: true }
 *   script: agenda.mjs            # optional
 *
 * Structural rules live in the zod schema; rules that need the whole
 * definition (unique names) are superRefine checks. Directive syntax and
 * dangling references are checked by the loader after compilation.
 */

import { z } from "zod";
import { StyleSetSchema } from "../styles/attributes.js";

export const VARIABLE_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const VariableDefinitionSchema = z
  .object({
    name: z
      .string()
      .regex(VARIABLE_NAME_RE, "Variable names must be identifiers ([A-Za-z_][A-Za-z0-9_]*)")
      .describe("Name used in {{ }} and {% if %} directives"),
    description: z.string().optional().describe("Prompt shown when asking for a value"),
    required: z.boolean().default(true),
    markdown: z.boolean().default(false),
  })
  .strict();

export type VariableDefinition = z.infer<typeof VariableDefinitionSchema>;

export const SegmentDefinitionSchema = z
  .object({
    text: z.string().describe("Literal text with interpolation and conditional directives"),
    markdown: z.boolean().default(false),
    styles: StyleSetSchema.default({}),
  })
  .strict();

export type SegmentDefinition = z.infer<typeof SegmentDefinitionSchema>;

export const TemplateDefinitionSchema = z
  .object({
    name: z.string().min(1).describe("Display name"),
    description: z.string().optional(),
    variables: z.array(VariableDefinitionSchema).default([]),
    segments: z.array(SegmentDefinitionSchema).min(1, "A template needs at least one segment"),
    script: z
      .string()
      .min(1)
      .optional()
      .describe("File name of a context script in the scripts directory"),
  })
  .strict()
  .superRefine((definition, ctx) => {
    const seen = new Map<string, number>();
    definition.variables.forEach((variable, index) => {
      const first = seen.get(variable.name);
      if (first !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["variables", index, "name"],
          message: `Duplicate variable "${variable.name}" (first declared at index ${first})`,
        });
      } else {
        seen.set(variable.name, index);
      }
    });
  });

export type TemplateDefinition = z.infer<typeof TemplateDefinitionSchema>;
