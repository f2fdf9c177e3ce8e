/**
 * Report Synthesizer Agent
 * Consolidates every round's findings into the final research report
 */

import { AgentError } from "@deepsearch/core";
import { BaseAgent, OutputParseError, type AgentDependencies } from "../../../../shared/agent/base.js";
import type { AgentContext, AgentProfile } from "../../../../shared/agent/types.js";
import type { ReportSynthesizer, ResearchResults } from "../../types.js";
import { getSynthesizerPrompt, SYNTHESIZER_SYSTEM_PROMPT } from "./prompt.js";
import { ResearchResultsSchema, SynthesizerInputSchema, type SynthesizerInput } from "./schema.js";

const SYNTHESIZER_PROFILE: AgentProfile = {
  model: "sonnet",
  maxTurns: 1,
  tools: [],
  retries: 2,
  backoffMs: 2000,
};

export class ReportSynthesizerAgent
  extends BaseAgent<SynthesizerInput, ResearchResults>
  implements ReportSynthesizer
{
  constructor(deps: AgentDependencies, profile?: Partial<AgentProfile>) {
    super(
      {
        name: "synthesizer",
        version: "1.0.0",
        description: "Writes the final research report from accumulated findings",
        role: "synthesis",
        profile: { ...SYNTHESIZER_PROFILE, ...profile },
        systemPrompt: SYNTHESIZER_SYSTEM_PROMPT,
      },
      deps
    );
  }

  async synthesize(
    findings: readonly string[],
    topic: string,
    context?: AgentContext
  ): Promise<ResearchResults> {
    const result = await this.run({ topic, findings: [...findings] }, context);

    if (!result.success) {
      throw new AgentError(`Report synthesis failed: ${result.error.message}`, this.name, {
        cause: result.error.cause,
        retryable: result.error.retryable,
      });
    }
    return result.output;
  }

  validateInput(input: unknown): SynthesizerInput {
    return SynthesizerInputSchema.parse(input);
  }

  protected buildPrompt(input: SynthesizerInput): string {
    return getSynthesizerPrompt(input);
  }

  protected parseOutput(raw: string): ResearchResults {
    const parsed = ResearchResultsSchema.safeParse(this.extractJson(raw));
    if (!parsed.success) {
      throw new OutputParseError(`synthesizer output did not match schema: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
