/**
 * Claude Executor
 * Implementation using Claude Agent SDK
 */

import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import {
  getBaseConfig,
  isRetryableError,
  AgentError,
  MaxTurnsExceededError,
} from "@deepsearch/core";
import type {
  IExecutor,
  ExecutorRequest,
  ExecutorResponse,
  ExecutorOptions,
} from "./types.js";
import type { AgentProfile } from "../agent/types.js";

/**
 * Map profile tiers to model IDs
 */
export function getModelId(model: AgentProfile["model"]): string {
  const models = {
    haiku: "claude-3-5-haiku-20241022",
    sonnet: "claude-sonnet-4-20250514",
    opus: "claude-opus-4-20250514",
  };
  return models[model];
}

/**
 * Claude SDK Executor
 */
export class ClaudeExecutor implements IExecutor {
  private readonly options: ExecutorOptions;

  constructor(options: ExecutorOptions = {}) {
    this.options = {
      cwd: options.cwd ?? process.cwd(),
      retries: options.retries,
      backoffMs: options.backoffMs,
    };
  }

  /**
   * Check if executor is ready
   */
  isReady(): boolean {
    return !!getBaseConfig().anthropic.apiKey;
  }

  /**
   * Execute a prompt, retrying transient failures with exponential backoff
   */
  async execute(request: ExecutorRequest): Promise<ExecutorResponse> {
    const startTime = Date.now();
    const { prompt, systemPrompt, profile } = request;
    const maxAttempts = Math.max(1, this.options.retries ?? profile.retries);
    const backoffMs = this.options.backoffMs ?? profile.backoffMs;

    let lastError: Error | undefined;
    let attempt = 0;

    while (attempt < maxAttempts) {
      attempt++;

      try {
        return await this.executeOnce(prompt, systemPrompt, profile, startTime);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!isRetryableError(error) || attempt >= maxAttempts) {
          break;
        }

        const delay = backoffMs * Math.pow(2, attempt - 1);
        await new Promise((r) => setTimeout(r, delay));
      }
    }

    return {
      success: false,
      output: "",
      costUsd: 0,
      durationMs: Date.now() - startTime,
      turns: 0,
      error: {
        code: "EXECUTOR_ERROR",
        message: lastError?.message ?? "Unknown error",
      },
    };
  }

  /**
   * Execute once (no retries)
   */
  private async executeOnce(
    prompt: string,
    systemPrompt: string | undefined,
    profile: AgentProfile,
    startTime: number
  ): Promise<ExecutorResponse> {
    const model = getModelId(profile.model);
    const options: Options = {
      systemPrompt,
      model,
      allowedTools: profile.tools,
      maxTurns: profile.maxTurns,
      permissionMode: "bypassPermissions",
      cwd: this.options.cwd,
    };

    const result = query({ prompt, options });

    let output = "";
    let sessionId: string | undefined;
    let costUsd = 0;
    let durationMs = 0;
    let turns = 0;
    let inputTokens = 0;
    let outputTokens = 0;

    for await (const message of result) {
      if (message.type === "assistant") {
        for (const block of message.message.content) {
          if (block.type === "text") {
            output += block.text;
          }
        }
        turns++;
      } else if (message.type === "result") {
        if (message.subtype === "success") {
          costUsd = message.total_cost_usd;
          durationMs = message.duration_ms;
          sessionId = message.session_id;
          inputTokens = message.usage.input_tokens;
          outputTokens = message.usage.output_tokens;

          // The final result text is the authoritative answer
          if (message.result) {
            output = message.result;
          }
        } else if (message.subtype === "error_max_turns") {
          throw new MaxTurnsExceededError("executor", profile.maxTurns);
        } else {
          throw new AgentError(`Execution ended with ${message.subtype}`, "executor");
        }
      }
    }

    return {
      success: true,
      output,
      sessionId,
      costUsd,
      durationMs: durationMs || Date.now() - startTime,
      tokens: {
        input: inputTokens,
        output: outputTokens,
      },
      turns,
      model,
    };
  }
}

/**
 * Create a Claude executor with default options
 */
export function createClaudeExecutor(options?: ExecutorOptions): IExecutor {
  return new ClaudeExecutor(options);
}
