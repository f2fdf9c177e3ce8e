/**
 * Query Deriver Schemas
 */

import { z } from "zod";

export const DerivedQuerySchema = z.object({
  query: z.string().trim().min(1),
  goals: z.array(z.string().trim().min(1)).min(1),
  context: z.string().optional(),
});

export const QueryDeriverOutputSchema = z.object({
  queries: z.array(DerivedQuerySchema),
});

export type DerivedQuery = z.infer<typeof DerivedQuerySchema>;
export type QueryDeriverOutput = z.infer<typeof QueryDeriverOutputSchema>;

export const QueryDeriverInputSchema = z.object({
  topic: z.string().trim().min(1),
  priorFindings: z.array(z.string()),
  batchSize: z.number().int().min(1),
  language: z.string().min(1).default("en"),
});

export type QueryDeriverInput = z.input<typeof QueryDeriverInputSchema>;
export type ParsedQueryDeriverInput = z.output<typeof QueryDeriverInputSchema>;
