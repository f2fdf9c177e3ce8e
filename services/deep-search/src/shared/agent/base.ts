/**
 * Base Agent Class
 * Abstract base class the research agents extend
 */

import { randomUUID } from "crypto";
import { isRetryableError, ValidationError } from "@deepsearch/core";
import type {
  IAgent,
  AgentContext,
  AgentResult,
  AgentMetadata,
  AgentProfile,
  AgentRole,
  ExecutionMetadata,
} from "./types.js";
import type { IExecutor } from "../executor/types.js";
import type { IObservability } from "../observability/types.js";

/**
 * Dependencies injected into agents
 */
export interface AgentDependencies {
  executor: IExecutor;
  observability: IObservability;
}

/**
 * Base agent configuration
 */
export interface BaseAgentConfig {
  name: string;
  version: string;
  description: string;
  role?: AgentRole;
  profile: AgentProfile;
  systemPrompt?: string;
}

/**
 * Abstract base agent class
 * Handles session tracking, execution and failure classification
 */
export abstract class BaseAgent<TInput, TOutput> implements IAgent<TInput, TOutput> {
  readonly name: string;
  readonly version: string;

  protected readonly config: BaseAgentConfig;
  protected readonly deps: AgentDependencies;

  constructor(config: BaseAgentConfig, deps: AgentDependencies) {
    this.name = config.name;
    this.version = config.version;
    this.config = config;
    this.deps = deps;
  }

  /**
   * Run the agent
   */
  async run(input: TInput, context?: AgentContext): Promise<AgentResult<TOutput>> {
    const startedAt = new Date().toISOString();
    const startTime = Date.now();
    const correlationId = context?.correlationId ?? randomUUID();

    const sessionId = await this.deps.observability.startSession({
      agentName: this.name,
      agentVersion: this.version,
      correlationId,
      input,
      metadata: { researchSessionId: context?.sessionId, round: context?.round },
    });

    let costUsd = 0;
    let turns = 0;

    try {
      const validatedInput = this.validateInput(input);
      const prompt = this.buildPrompt(validatedInput, context);

      const execResult = await this.deps.executor.execute({
        prompt,
        systemPrompt: this.config.systemPrompt,
        profile: this.config.profile,
      });

      costUsd = execResult.costUsd;
      turns = execResult.turns;

      if (!execResult.success) {
        throw new Error(execResult.error.message);
      }

      const output = this.parseOutput(execResult.output, validatedInput);

      const metadata: ExecutionMetadata = {
        ...this.buildMetadata(startedAt, startTime, costUsd, turns),
        tokens: execResult.tokens,
        model: execResult.model,
      };

      this.deps.observability.metric("agent.duration_ms", metadata.durationMs, { agent: this.name });
      this.deps.observability.metric("agent.cost_usd", metadata.costUsd, { agent: this.name });

      await this.deps.observability.endSession(sessionId, {
        success: true,
        output,
        metadata,
      });

      return { success: true, output, metadata };
    } catch (error) {
      const metadata = this.buildMetadata(startedAt, startTime, costUsd, turns);

      await this.deps.observability.endSession(sessionId, {
        success: false,
        error,
        metadata,
      });

      return {
        success: false,
        error: {
          type: error instanceof OutputParseError ? "validation" : "execution",
          code: error instanceof OutputParseError ? "INVALID_OUTPUT" : "AGENT_ERROR",
          message: error instanceof Error ? error.message : String(error),
          retryable: isRetryableError(error),
          cause: error instanceof Error ? error : undefined,
        },
        metadata,
      };
    }
  }

  /**
   * Validate input - must be implemented by subclass
   */
  abstract validateInput(input: unknown): TInput;

  /**
   * Build prompt for the agent - must be implemented by subclass
   */
  protected abstract buildPrompt(input: TInput, context?: AgentContext): string;

  /**
   * Parse output from executor - must be implemented by subclass
   */
  protected abstract parseOutput(raw: string, input: TInput): TOutput;

  /**
   * Get agent metadata
   */
  getMetadata(): AgentMetadata {
    return {
      name: this.name,
      version: this.version,
      description: this.config.description,
      role: this.config.role,
      model: this.config.profile.model,
    };
  }

  /**
   * Pull the JSON payload out of a model reply: a fenced block if present,
   * otherwise the text from the first `{` or `[` to its matching closer
   */
  protected extractJson(raw: string): unknown {
    const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/);
    const text = fenced ? fenced[1] : sliceJson(raw);

    if (text === undefined) {
      throw new OutputParseError(`${this.name} returned no JSON`);
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new OutputParseError(
        `${this.name} returned malformed JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private buildMetadata(
    startedAt: string,
    startTime: number,
    costUsd: number,
    turns: number
  ): ExecutionMetadata {
    return {
      agentName: this.name,
      agentVersion: this.version,
      startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - startTime,
      costUsd,
      turns,
    };
  }
}

/**
 * Raised when a model reply does not match the agent's output schema
 */
export class OutputParseError extends ValidationError {
  constructor(message: string) {
    super(message, { field: "output" });
    this.name = "OutputParseError";
  }
}

function sliceJson(raw: string): string | undefined {
  const objectStart = raw.indexOf("{");
  const arrayStart = raw.indexOf("[");
  const useArray = arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart);
  const start = useArray ? arrayStart : objectStart;
  const end = raw.lastIndexOf(useArray ? "]" : "}");

  if (start === -1 || end <= start) {
    return undefined;
  }
  return raw.slice(start, end + 1);
}
