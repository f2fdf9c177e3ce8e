/**
 * Observability Types
 * Interface for logging, events, and metrics
 */

// ============================================
// OBSERVABILITY INTERFACE
// ============================================

/**
 * Observability interface - abstracts logging/tracing
 */
export interface IObservability {
  /**
   * Start tracking an agent session
   */
  startSession(params: StartSessionParams): Promise<string>;

  /**
   * End a session
   */
  endSession(sessionId: string, result: SessionResult): Promise<void>;

  /**
   * Record an event
   */
  recordEvent(event: ObservabilityEvent): Promise<void>;

  /**
   * Log a message
   */
  log(level: LogLevel, message: string, data?: Record<string, unknown>): void;

  /**
   * Record a metric
   */
  metric(name: MetricName, value: number, tags?: Record<string, string>): void;
}

// ============================================
// SESSION TRACKING
// ============================================

export interface StartSessionParams {
  agentName: string;
  agentVersion: string;
  correlationId: string;
  input: unknown;
  metadata?: Record<string, unknown>;
}

export interface SessionResult {
  success: boolean;
  output?: unknown;
  error?: unknown;
  metadata?: {
    durationMs?: number;
    costUsd?: number;
  };
}

// ============================================
// EVENT TAXONOMY
// ============================================

/**
 * Standardized event types
 */
export type EventType =
  // Research session events
  | "session.started"
  | "session.completed"
  | "session.failed"

  // Round (step) events
  | "round.started"
  | "round.completed"
  | "round.failed"

  // Job events
  | "job.completed"
  | "job.failed"

  // Collaborator events
  | "derive.fallback"
  | "synthesis.degraded";

/**
 * Structured observability event
 */
export interface ObservabilityEvent {
  type: EventType;
  timestamp?: string;
  correlationId?: string;
  sessionId?: string;
  round?: number;
  jobId?: string;
  level?: LogLevel;
  data?: Record<string, unknown>;
}

// ============================================
// LOG LEVELS
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

// ============================================
// OPTIONS
// ============================================

export interface ObservabilityOptions {
  /** Name attached to every log line as `system` */
  systemName?: string;

  /** Minimum log level */
  logLevel?: LogLevel;

  /** Custom event handler */
  onEvent?: (event: ObservabilityEvent) => void;
}

// ============================================
// METRICS
// ============================================

export type MetricName =
  | "session.duration_ms"
  | "session.rounds"
  | "step.duration_ms"
  | "step.completed_jobs"
  | "step.failed_jobs"
  | "agent.duration_ms"
  | "agent.cost_usd";
