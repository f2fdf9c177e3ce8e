/**
 * Findings
 * Reductions from extraction answers to findings text
 */

import { goalKey, isNotFound, NOT_FOUND } from "@deepsearch/web";

/**
 * Fill in every goal's answer, defaulting missing ones to the not-found sentinel
 */
export function completeAnswers(
  goals: readonly string[],
  answers: Readonly<Record<string, string>>
): Record<string, string> {
  const complete: Record<string, string> = {};
  goals.forEach((_goal, index) => {
    const key = goalKey(index);
    complete[key] = answers[key] ?? NOT_FOUND;
  });
  return complete;
}

/**
 * The query line followed by one `- goal: answer` line per answered goal
 */
export function reduceJobFindings(
  query: string,
  goals: readonly string[],
  answers: Readonly<Record<string, string>>
): string {
  const lines = [query];

  goals.forEach((goal, index) => {
    const answer = answers[goalKey(index)];
    if (answer !== undefined && !isNotFound(answer)) {
      lines.push(`- ${goal}: ${answer.trim()}`);
    }
  });

  return lines.join("\n");
}

/**
 * Order-stable newline join
 */
export function joinFindings(findings: readonly string[]): string {
  return findings.join("\n");
}
