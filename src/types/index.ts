/**
 * Shared type foundations for the template → print pipeline.
 */

export * from "./template.js";
export * from "./run.js";
