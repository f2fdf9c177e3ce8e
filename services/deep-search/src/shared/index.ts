/**
 * Shared Infrastructure Exports
 */

// Agent primitives
export * from "./agent/index.js";

// Executor (LLM execution)
export * from "./executor/index.js";

// Observability (logging, events, metrics)
export * from "./observability/index.js";
