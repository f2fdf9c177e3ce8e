/**
 * Research System Exports
 */

// System
export * from "./types.js";
export * from "./system.js";

// Engine
export { Job, type JobOptions } from "./job.js";
export { Step, type StepOptions } from "./step.js";
export { Session, degradedResults, SYNTHESIS_FAILURE_PREFIX, type SessionOptions } from "./session.js";
export { createQueryConfig, fallbackQueryConfig, validateQueryConfig, MAX_GOALS } from "./query-config.js";
export { reduceJobFindings, completeAnswers, joinFindings } from "./findings.js";
export * from "./schema.js";

// Agents
export * from "./agents/index.js";

// Shared infrastructure (executor, observability, agent base)
export * from "../../shared/index.js";
