/**
 * Query Deriver Prompt
 * Turns a topic and what is already known into the next batch of web sub-queries
 */

import { MAX_GOALS } from "../../query-config.js";
import type { ParsedQueryDeriverInput } from "./schema.js";

export const QUERY_DERIVER_SYSTEM_PROMPT = `You plan web research. You never browse and never answer the research questions yourself.
You reply with a single JSON object and nothing else.`;

/** Prior findings are clipped to keep the prompt bounded */
const MAX_FINDINGS_CHARS = 12_000;

export function getQueryDeriverPrompt(input: ParsedQueryDeriverInput): string {
  const { topic, priorFindings, batchSize, language } = input;
  const findings = clip(priorFindings.join("\n\n"), MAX_FINDINGS_CHARS);

  const knownSection =
    findings.length > 0
      ? `## What is already known

${findings}

Target gaps, contradictions and follow-up angles in the material above. Do not repeat queries that were already answered.`
      : `## What is already known

Nothing yet. This is the first round: cover the main facets of the topic.`;

  return `## Research topic

${topic}

${knownSection}

## Task

Write up to ${batchSize} search queries for a web search engine. For each query list 1 to ${MAX_GOALS} goals: short, specific questions that a page returned by that query should answer.

- Queries are in ${language} and read like something a person types into a search box.
- Goals are factual questions (who, what, when, how much), not instructions.
- Each query covers a different angle.

## Output

{
  "queries": [
    { "query": "...", "goals": ["...", "..."] }
  ]
}`;
}

function clip(text: string, limit: number): string {
  return text.length <= limit ? text : `${text.slice(0, limit)}\n[truncated]`;
}
