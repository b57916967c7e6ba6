/**
 * Template loader.
 *
 * Loads template definitions from disk (.yaml, .yml or .json files),
 * validates them, compiles segment directives, and exposes immutable
 * Template entities.
 *
 * USAGE:
 *
 *   const loader = new TemplateLoader("templates/");
 *
 *   // Load a single template by id (file name without extension)
 *   const ticket = loader.load("ticket");
 *
 *   // List every valid template in stable (sorted file name) order
 *   const summaries = loader.listAll();
 *
 * Templates are parsed once and cached. Loading is synchronous, so two
 * callers asking for the same id at once either hit the cache or build
 * equivalent frozen values from the same file.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { basename, extname, isAbsolute, join, resolve } from "node:path";
import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { NotFoundError, SchemaError, TemplateSyntaxError, type SchemaIssue } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { Template, TemplateSegment, TemplateSummary } from "../types/template.js";
import { deepFreeze } from "../utils/deep-freeze.js";
import { collectReferences, compileSegmentText } from "./directives.js";
import { TemplateDefinitionSchema } from "./schema.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Extensions recognized as template definitions, in lookup order. */
const TEMPLATE_EXTENSIONS = [".yaml", ".yml", ".json"] as const;

/** Default scripts directory, relative to the template directory. */
const DEFAULT_SCRIPTS_DIR = "scripts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Convert Zod issues to our structured format.
 */
function formatZodIssues(zodIssues: ZodIssue[]): SchemaIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

export interface CreateTemplateOptions {
  /** Directory script references are resolved against. */
  scriptsDir?: string;
}

/**
 * Validate and compile a raw definition into a frozen Template.
 *
 * @param id         - Template id (usually the file stem)
 * @param definition - Parsed but unvalidated definition
 * @throws SchemaError          for structural problems or dangling references
 * @throws TemplateSyntaxError  for malformed directives
 */
export function createTemplate(
  id: string,
  definition: unknown,
  options: CreateTemplateOptions = {}
): Template {
  const result = TemplateDefinitionSchema.safeParse(definition);
  if (!result.success) {
    throw new SchemaError(id, formatZodIssues(result.error.issues));
  }
  const data = result.data;
  const issues: SchemaIssue[] = [];

  const segments: TemplateSegment[] = data.segments.map((segment, index) => ({
    index,
    text: segment.text,
    markdown: segment.markdown,
    styles: segment.styles,
    nodes: compileSegmentText(segment.text, { templateId: id, segmentIndex: index }),
  }));

  // Dangling references
  const declared = new Set(data.variables.map((v) => v.name));
  for (const segment of segments) {
    for (const name of collectReferences(segment.nodes)) {
      if (!declared.has(name)) {
        issues.push({
          path: ["segments", segment.index, "text"],
          message: `References undeclared variable "${name}"`,
          code: "undeclared_variable",
        });
      }
    }
  }

  // Script reference
  let script: string | undefined;
  if (data.script !== undefined) {
    const reference = data.script;
    if (isAbsolute(reference) || reference.split(/[\\/]/).includes("..")) {
      issues.push({
        path: ["script"],
        message: `Script reference "${reference}" must be a file name inside the scripts directory`,
        code: "unsafe_script_path",
      });
    } else if (!options.scriptsDir) {
      issues.push({
        path: ["script"],
        message: "Template declares a script but no scripts directory is configured",
        code: "missing_script",
      });
    } else {
      const scriptPath = resolve(options.scriptsDir, reference);
      if (!existsSync(scriptPath)) {
        issues.push({
          path: ["script"],
          message: `Script file not found: ${scriptPath}`,
          code: "missing_script",
        });
      } else {
        script = scriptPath;
      }
    }
  }

  if (issues.length > 0) {
    throw new SchemaError(id, issues);
  }

  const template: Template = {
    id,
    name: data.name,
    ...(data.description !== undefined ? { description: data.description } : {}),
    variables: data.variables.map((v) => ({
      name: v.name,
      ...(v.description !== undefined ? { description: v.description } : {}),
      required: v.required,
      markdown: v.markdown,
    })),
    segments,
    ...(script !== undefined ? { script } : {}),
  };

  return deepFreeze(template);
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export interface TemplateLoaderOptions {
  /** Scripts directory (default: `<baseDir>/scripts`). */
  scriptsDir?: string;
  logger?: Logger;
}

export class TemplateLoader {
  readonly baseDir: string;
  readonly scriptsDir: string;
  private readonly logger: Logger | undefined;
  private readonly cache = new Map<string, Template>();

  /**
   * @param baseDir - Directory containing template definition files
   */
  constructor(baseDir: string, options: TemplateLoaderOptions = {}) {
    this.baseDir = resolve(baseDir);
    this.scriptsDir = resolve(options.scriptsDir ?? join(this.baseDir, DEFAULT_SCRIPTS_DIR));
    this.logger = options.logger;
  }

  /**
   * Load, validate and compile a template by id.
   *
   * @param id - File name without extension (e.g. "ticket")
   * @throws NotFoundError        if no definition file exists
   * @throws SchemaError          if the definition is malformed
   * @throws TemplateSyntaxError  if a segment directive is malformed
   */
  load(id: string): Template {
    const cached = this.cache.get(id);
    if (cached) return cached;

    const filePath = this.findDefinition(id);
    if (!filePath) {
      throw new NotFoundError(id, this.baseDir);
    }

    let raw: unknown;
    try {
      raw = yaml.load(readFileSync(filePath, "utf-8"), { filename: filePath });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SchemaError(id, [{ path: [], message: `Unparseable definition: ${message}`, code: "parse_error" }]);
    }

    const template = createTemplate(id, raw, { scriptsDir: this.scriptsDir });
    this.cache.set(id, template);
    this.logger?.debug("Template loaded", {
      template: id,
      segments: template.segments.length,
      variables: template.variables.length,
      scripted: template.script !== undefined,
    });
    return template;
  }

  /**
   * Summaries of every loadable template in the directory, sorted by id.
   *
   * A definition that fails to parse or validate is left out of the list
   * and logged as a warning; loading it by id still raises its error.
   */
  listAll(): TemplateSummary[] {
    const summaries: TemplateSummary[] = [];
    for (const id of TemplateLoader.listIds(this.baseDir)) {
      let template: Template;
      try {
        template = this.load(id);
      } catch (err) {
        if (!(err instanceof SchemaError || err instanceof TemplateSyntaxError)) throw err;
        this.logger?.warn("Skipping invalid template", { template: id, error: err.message });
        continue;
      }
      summaries.push({
        id: template.id,
        name: template.name,
        ...(template.description !== undefined ? { description: template.description } : {}),
      });
    }
    return summaries;
  }

  /**
   * Clear the internal template cache.
   * Useful if definition files have been modified on disk.
   */
  clearCache(): void {
    this.cache.clear();
  }

  /**
   * List template ids in a directory without loading them.
   */
  static listIds(dir: string): string[] {
    const resolved = resolve(dir);
    if (!existsSync(resolved)) return [];

    const ids = new Set<string>();
    for (const entry of readdirSync(resolved)) {
      const ext = extname(entry).toLowerCase();
      if (!isTemplateExtension(ext)) continue;
      if (!statSync(join(resolved, entry)).isFile()) continue;
      ids.add(basename(entry, extname(entry)));
    }
    return [...ids].sort();
  }

  private findDefinition(id: string): string | undefined {
    if (id === "" || id.includes("/") || id.includes("\\") || id.startsWith(".")) {
      return undefined;
    }
    for (const ext of TEMPLATE_EXTENSIONS) {
      const candidate = join(this.baseDir, id + ext);
      if (existsSync(candidate) && statSync(candidate).isFile()) return candidate;
    }
    return undefined;
  }
}

function isTemplateExtension(ext: string): boolean {
  return (TEMPLATE_EXTENSIONS as readonly string[]).includes(ext);
}
