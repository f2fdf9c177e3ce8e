/**
 * Web Types
 * Zod schemas for Brave Search and Firecrawl payloads, plus normalized records
 */

import { z } from "zod";

// ============================================
// BRAVE SEARCH
// ============================================

export const BraveWebResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  description: z.string().default(""),
  age: z.string().optional(),
  page_age: z.string().optional(),
});

export type BraveWebResult = z.infer<typeof BraveWebResultSchema>;

// `web` is omitted entirely when a query has no hits
export const BraveSearchResponseSchema = z.object({
  web: z
    .object({
      results: z.array(BraveWebResultSchema).default([]),
    })
    .optional(),
});

export type BraveSearchResponse = z.infer<typeof BraveSearchResponseSchema>;

// ============================================
// NORMALIZED (INTERNAL)
// ============================================

/**
 * One discovered reference
 */
export interface DiscoveryRecord {
  title: string;
  url: string;
  description: string;
  /** Freshness hint as reported by the search engine, e.g. "2 days ago" */
  age?: string;
}

/**
 * Per-goal answers keyed goal1..goalN, in goal order
 */
export interface ExtractionResult {
  answers: Record<string, string>;
  sources: string[];
}

/** Answer used when a page holds nothing for a goal */
export const NOT_FOUND = "NA";

export function goalKey(index: number): string {
  return `goal${index + 1}`;
}

export function isNotFound(answer: string | undefined): boolean {
  if (answer === undefined) {
    return true;
  }
  const normalized = answer.trim().toUpperCase();
  return normalized === "" || normalized === NOT_FOUND || normalized === "N/A";
}

export function normalizeBraveResult(result: BraveWebResult): DiscoveryRecord {
  const record: DiscoveryRecord = {
    title: result.title,
    url: result.url,
    description: result.description,
  };

  const age = result.age ?? result.page_age;
  if (age) {
    record.age = age;
  }

  return record;
}

// ============================================
// FIRECRAWL EXTRACT
// ============================================

export const ExtractResponseSchema = z.object({
  success: z.boolean(),
  data: z.record(z.string(), z.unknown()).nullish(),
  error: z.string().optional(),
});

export type ExtractResponse = z.infer<typeof ExtractResponseSchema>;

/**
 * JSON schema sent to Firecrawl: one string property per goal,
 * goal1 required, the rest defaulting to the not-found sentinel
 */
export function buildGoalSchema(goals: readonly string[]): Record<string, unknown> {
  const properties: Record<string, Record<string, string>> = {};

  goals.forEach((goal, index) => {
    const property: Record<string, string> = {
      type: "string",
      description: goal,
    };
    if (index > 0) {
      property.default = NOT_FOUND;
    }
    properties[goalKey(index)] = property;
  });

  return {
    type: "object",
    properties,
    required: [goalKey(0)],
  };
}
