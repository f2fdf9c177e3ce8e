export { ReportSynthesizerAgent } from "./agent.js";
export { getSynthesizerPrompt, SYNTHESIZER_SYSTEM_PROMPT } from "./prompt.js";
export { ResearchResultsSchema, SynthesizerInputSchema, type SynthesizerInput } from "./schema.js";
