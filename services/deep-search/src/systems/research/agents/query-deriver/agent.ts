/**
 * Query Deriver Agent
 * Produces each round's sub-queries from the topic and accumulated findings
 */

import { AgentError } from "@deepsearch/core";
import { BaseAgent, OutputParseError, type AgentDependencies } from "../../../../shared/agent/base.js";
import type { AgentContext, AgentProfile } from "../../../../shared/agent/types.js";
import type { QueryConfigInput, QueryDeriver } from "../../types.js";
import { getQueryDeriverPrompt, QUERY_DERIVER_SYSTEM_PROMPT } from "./prompt.js";
import {
  QueryDeriverInputSchema,
  QueryDeriverOutputSchema,
  type ParsedQueryDeriverInput,
  type QueryDeriverInput,
} from "./schema.js";

// ============================================
// AGENT CONFIGURATION
// ============================================

const QUERY_DERIVER_PROFILE: AgentProfile = {
  model: "haiku",
  maxTurns: 1,
  tools: [],
  retries: 2,
  backoffMs: 1000,
};

export interface QueryDeriverOptions {
  profile?: Partial<AgentProfile>;
  language?: string;
}

// ============================================
// QUERY DERIVER AGENT
// ============================================

export class QueryDeriverAgent
  extends BaseAgent<ParsedQueryDeriverInput, QueryConfigInput[]>
  implements QueryDeriver
{
  private readonly language: string;

  constructor(deps: AgentDependencies, options: QueryDeriverOptions = {}) {
    super(
      {
        name: "query-deriver",
        version: "1.0.0",
        description: "Derives the next batch of search sub-queries from prior findings",
        role: "planning",
        profile: { ...QUERY_DERIVER_PROFILE, ...options.profile },
        systemPrompt: QUERY_DERIVER_SYSTEM_PROMPT,
      },
      deps
    );
    this.language = options.language ?? "en";
  }

  /**
   * QueryDeriver capability; throws AgentError when the run fails
   */
  async derive(
    topic: string,
    priorFindings: readonly string[],
    batchSize: number,
    context?: AgentContext
  ): Promise<QueryConfigInput[]> {
    const input: QueryDeriverInput = {
      topic,
      priorFindings: [...priorFindings],
      batchSize,
      language: this.language,
    };
    const result = await this.run(this.validateInput(input), context);

    if (!result.success) {
      throw new AgentError(`Query derivation failed: ${result.error.message}`, this.name, {
        cause: result.error.cause,
        retryable: result.error.retryable,
      });
    }
    return result.output;
  }

  validateInput(input: unknown): ParsedQueryDeriverInput {
    return QueryDeriverInputSchema.parse(input);
  }

  protected buildPrompt(input: ParsedQueryDeriverInput): string {
    return getQueryDeriverPrompt(input);
  }

  protected parseOutput(raw: string, input: ParsedQueryDeriverInput): QueryConfigInput[] {
    const parsed = QueryDeriverOutputSchema.safeParse(this.extractJson(raw));
    if (!parsed.success) {
      throw new OutputParseError(`query-deriver output did not match schema: ${parsed.error.message}`);
    }
    return parsed.data.queries.slice(0, input.batchSize);
  }
}
