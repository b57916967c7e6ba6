/**
 * ticketpress: template rendering and print composition for receipt printers.
 */

export * from "./errors.js";
export * from "./types/index.js";
export * from "./styles/index.js";
export * from "./templates/index.js";
export * from "./markdown/index.js";
export * from "./context/index.js";
export * from "./render/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./service/index.js";
