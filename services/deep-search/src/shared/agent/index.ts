export * from "./types.js";
export { BaseAgent, OutputParseError } from "./base.js";
export type { AgentDependencies, BaseAgentConfig } from "./base.js";
