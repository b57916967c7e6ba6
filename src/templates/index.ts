/**
 * Template loading, validation and directive compilation.
 */

export { TemplateLoader, createTemplate, type TemplateLoaderOptions, type CreateTemplateOptions } from "./loader.js";

export {
  TemplateDefinitionSchema,
  VariableDefinitionSchema,
  SegmentDefinitionSchema,
  VARIABLE_NAME_RE,
  type TemplateDefinition,
  type VariableDefinition,
  type SegmentDefinition,
} from "./schema.js";

export {
  compileSegmentText,
  collectReferences,
  evaluate,
  evaluateCondition,
  expand,
  type DirectiveNode,
  type InlineNode,
  type LiteralNode,
  type InterpolationNode,
  type IfNode,
  type Condition,
  type ConditionTerm,
  type EvaluateOptions,
  type CompileLocation,
} from "./directives.js";
