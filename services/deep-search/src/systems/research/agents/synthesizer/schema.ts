/**
 * Synthesizer Schemas
 */

import { z } from "zod";

export const ResearchResultsSchema = z.object({
  mainReport: z.string().trim().min(1),
  keyLearnings: z.array(z.string()).default([]),
  areasCovered: z.array(z.string()).default([]),
  areasToExplore: z.array(z.string()).default([]),
  additionalNotes: z.string().optional(),
});

export const SynthesizerInputSchema = z.object({
  topic: z.string().trim().min(1),
  findings: z.array(z.string()),
});

export type SynthesizerInput = z.infer<typeof SynthesizerInputSchema>;
