export { QueryDeriverAgent, type QueryDeriverOptions } from "./agent.js";
export { getQueryDeriverPrompt, QUERY_DERIVER_SYSTEM_PROMPT } from "./prompt.js";
export {
  QueryDeriverInputSchema,
  QueryDeriverOutputSchema,
  DerivedQuerySchema,
  type QueryDeriverInput,
  type QueryDeriverOutput,
  type DerivedQuery,
} from "./schema.js";
