/**
 * Research Input Schema
 * Zod validation for session input and settings
 */

import { z } from "zod";
import { getBaseConfig, MAX_SEARCH_RESULTS, type BaseConfig } from "@deepsearch/core";

// ============================================
// SETTINGS
// ============================================

export const EmptyRoundPolicySchema = z.enum(["fail", "skip"]);

export type EmptyRoundPolicy = z.infer<typeof EmptyRoundPolicySchema>;

export const ResearchSettingsSchema = z.object({
  /** Number of rounds to run */
  maxDepth: z.number().int().min(1),
  /** Discovery results per sub-query */
  maxResults: z.number().int().min(1).max(MAX_SEARCH_RESULTS),
  /** Sub-queries per round */
  batchSize: z.number().int().min(1),
  language: z.string().min(1),
  /** What a round in which every job fails does to the session */
  emptyRoundPolicy: EmptyRoundPolicySchema,
});

export type ResearchSettings = z.infer<typeof ResearchSettingsSchema>;

// ============================================
// INPUT
// ============================================

export const ResearchInputSchema = z.object({
  topic: z.string().trim().min(1, "Research topic must not be empty"),
  settings: ResearchSettingsSchema.partial().optional(),
});

export type ResearchInput = z.input<typeof ResearchInputSchema>;

/**
 * Settings taken from configuration
 */
export function defaultSettings(config: BaseConfig = getBaseConfig()): ResearchSettings {
  return {
    maxDepth: config.research.maxDepth,
    maxResults: config.research.maxResults,
    batchSize: config.research.batchSize,
    language: config.research.language,
    emptyRoundPolicy: "fail",
  };
}

export type ParsedResearchInput =
  | { success: true; topic: string; settings: ResearchSettings }
  | { success: false; message: string };

/**
 * Validate a research input and merge its settings over the defaults
 */
export function parseResearchInput(
  input: ResearchInput,
  defaults: ResearchSettings
): ParsedResearchInput {
  const parsed = ResearchInputSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, message: formatIssues(parsed.error) };
  }

  const overrides = Object.fromEntries(
    Object.entries(parsed.data.settings ?? {}).filter(([, value]) => value !== undefined)
  );

  const settings = ResearchSettingsSchema.safeParse({ ...defaults, ...overrides });
  if (!settings.success) {
    return { success: false, message: formatIssues(settings.error) };
  }

  return { success: true, topic: parsed.data.topic, settings: settings.data };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
