export * from "./types.js";
export {
  ConsoleObservability,
  NoOpObservability,
  createConsoleObservability,
  createNoOpObservability,
} from "./console.js";
