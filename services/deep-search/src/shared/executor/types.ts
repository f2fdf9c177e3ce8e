/**
 * Executor Types
 * Interface for LLM execution layer
 */

import type { AgentProfile, TokenUsage } from "../agent/types.js";

// ============================================
// EXECUTOR INTERFACE
// ============================================

/**
 * Executor interface - abstracts LLM execution
 */
export interface IExecutor {
  /**
   * Execute a prompt with given profile
   */
  execute(request: ExecutorRequest): Promise<ExecutorResponse>;

  /**
   * Check if executor is ready
   */
  isReady(): boolean;
}

// ============================================
// REQUEST / RESPONSE
// ============================================

export interface ExecutorRequest {
  prompt: string;
  systemPrompt?: string;
  profile: AgentProfile;
}

export type ExecutorResponse =
  | ({ success: true } & ExecutorUsage)
  | ({ success: false; error: { code: string; message: string } } & ExecutorUsage);

export interface ExecutorUsage {
  /** Raw text output from the model */
  output: string;
  sessionId?: string;
  costUsd: number;
  durationMs: number;
  tokens?: TokenUsage;
  turns: number;
  model?: string;
}

// ============================================
// EXECUTOR OPTIONS
// ============================================

export interface ExecutorOptions {
  /** Working directory handed to the SDK */
  cwd?: string;

  /** Overrides the profile's retry count */
  retries?: number;
  backoffMs?: number;
}
