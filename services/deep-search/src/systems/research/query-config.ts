/**
 * Query Config
 * Construction and validation of sub-query configurations
 */

import type { QueryConfig, QueryConfigInput } from "./types.js";

/** Goals beyond this are dropped rather than rejected */
export const MAX_GOALS = 4;

/**
 * Normalise a query config: trim text, drop blank goals, cap the goal list.
 * Never fails; an unusable result is rejected by `Job.initialize`.
 */
export function createQueryConfig(input: QueryConfigInput): QueryConfig {
  const goals = input.goals
    .map((goal) => goal.trim())
    .filter((goal) => goal.length > 0)
    .slice(0, MAX_GOALS);

  const config: {
    query: string;
    goals: readonly string[];
    context?: string;
    maxDepth?: number;
    maxResultsPerGoal?: number;
  } = {
    query: input.query.trim(),
    goals: Object.freeze(goals),
  };

  const context = input.context?.trim();
  if (context) {
    config.context = context;
  }
  if (isPositiveInteger(input.maxDepth)) {
    config.maxDepth = input.maxDepth;
  }
  if (isPositiveInteger(input.maxResultsPerGoal)) {
    config.maxResultsPerGoal = input.maxResultsPerGoal;
  }

  return Object.freeze(config);
}

/**
 * Topic-only sub-query used when derivation produces nothing
 */
export function fallbackQueryConfig(topic: string): QueryConfig {
  const query = topic.trim();
  return createQueryConfig({
    query,
    goals: [`What are the key facts about ${query}?`],
  });
}

/**
 * Returns the reason a config cannot run, or null when it can
 */
export function validateQueryConfig(config: QueryConfig): string | null {
  if (config.query.trim().length === 0) {
    return "Invalid query configuration: missing query";
  }
  if (config.goals.length === 0) {
    return "Invalid query configuration: no research goals provided";
  }
  return null;
}

function isPositiveInteger(value: number | undefined): value is number {
  return value !== undefined && Number.isInteger(value) && value > 0;
}
