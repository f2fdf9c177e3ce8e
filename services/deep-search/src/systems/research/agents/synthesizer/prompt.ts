/**
 * Synthesizer Prompt
 */

import type { SynthesizerInput } from "./schema.js";

export const SYNTHESIZER_SYSTEM_PROMPT = `You write research reports strictly from the findings you are given.
You never add facts that are not in the findings. You reply with a single JSON object and nothing else.`;

export function getSynthesizerPrompt(input: SynthesizerInput): string {
  const findings =
    input.findings.length > 0
      ? input.findings.map((finding, index) => `### Findings ${index + 1}\n\n${finding}`).join("\n\n")
      : "(no findings were gathered)";

  return `## Research topic

${input.topic}

## Findings

Each block starts with the search query, followed by "- question: answer" lines.

${findings}

## Task

Write the final report on the topic.

- mainReport: a structured report in Markdown that answers the topic as fully as the findings allow. Where findings conflict, say so.
- keyLearnings: the most important individual facts, one per entry.
- areasCovered: the aspects of the topic the findings address.
- areasToExplore: open questions the findings leave unanswered.
- additionalNotes: optional caveats about gaps or reliability.

## Output

{
  "mainReport": "...",
  "keyLearnings": ["..."],
  "areasCovered": ["..."],
  "areasToExplore": ["..."],
  "additionalNotes": "..."
}`;
}
