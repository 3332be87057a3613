/**
 * Boot environment rendering and lifecycle engine.
 */

export { ProvisionerError, ProgrammingError, describeError } from "./errors.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./templates/index.js";
export * from "./machines/index.js";
export * from "./bootenv/index.js";
