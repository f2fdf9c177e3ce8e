export * from "./query-deriver/index.js";
export * from "./synthesizer/index.js";
