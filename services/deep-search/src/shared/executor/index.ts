export * from "./types.js";
export { ClaudeExecutor, createClaudeExecutor, getModelId } from "./claude.js";
