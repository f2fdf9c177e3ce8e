/**
 * Core Agent Types
 * Interfaces shared by the LLM-backed agents
 */

// ============================================
// AGENT INTERFACE
// ============================================

/**
 * Base agent interface - all agents implement this
 */
export interface IAgent<TInput = unknown, TOutput = unknown> {
  /** Unique agent identifier */
  readonly name: string;

  /** Agent version for tracking changes */
  readonly version: string;

  /** Run the agent with given input */
  run(input: TInput, context?: AgentContext): Promise<AgentResult<TOutput>>;

  /** Validate input before running */
  validateInput(input: unknown): TInput;

  /** Get agent metadata */
  getMetadata(): AgentMetadata;
}

// ============================================
// CONTEXT
// ============================================

/**
 * Context passed to agent runs
 */
export interface AgentContext {
  /** Research session this call belongs to */
  sessionId?: string;

  /** Correlation ID for tracing */
  correlationId?: string;

  /** Round number, when called from the research loop */
  round?: number;
}

// ============================================
// RESULTS
// ============================================

/**
 * Result from an agent run
 */
export type AgentResult<T> =
  | { success: true; output: T; metadata: ExecutionMetadata }
  | { success: false; error: AgentFailure; metadata: ExecutionMetadata };

/**
 * Execution metadata
 */
export interface ExecutionMetadata {
  agentName: string;
  agentVersion: string;

  startedAt: string;
  completedAt: string;
  durationMs: number;

  costUsd: number;
  tokens?: TokenUsage;
  turns: number;
  model?: string;
}

export interface TokenUsage {
  input: number;
  output: number;
  cached?: number;
}

// ============================================
// METADATA
// ============================================

/**
 * Agent metadata - describes what an agent does
 */
export interface AgentMetadata {
  name: string;
  version: string;
  description: string;
  role?: AgentRole;
  model: AgentProfile["model"];
}

export type AgentRole =
  | "planning"   // Derives the next round of sub-queries
  | "synthesis"  // Consolidates findings into a report
  | string;

// ============================================
// ERRORS
// ============================================

/**
 * Agent failure with classification
 */
export interface AgentFailure {
  type: AgentFailureType;
  code: string;
  message: string;
  retryable: boolean;
  cause?: Error;
}

export type AgentFailureType =
  | "validation"   // Input or output failed its schema
  | "execution"    // Executor or model error
  | "unknown";

// ============================================
// CONFIGURATION
// ============================================

/**
 * Agent profile configuration
 */
export interface AgentProfile {
  /** Model tier */
  model: "haiku" | "sonnet" | "opus";

  maxTurns: number;

  /** Tools the model may call; the research agents use none */
  tools: string[];

  retries: number;
  backoffMs: number;
}
