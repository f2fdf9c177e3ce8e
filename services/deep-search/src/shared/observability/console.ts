/**
 * Console Observability
 * Routes sessions, events and metrics through the core logger
 */

import { randomUUID } from "crypto";
import { logger, type ChildLogger } from "@deepsearch/core";
import type {
  IObservability,
  StartSessionParams,
  SessionResult,
  ObservabilityEvent,
  ObservabilityOptions,
  LogLevel,
  MetricName,
} from "./types.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console-based observability
 */
export class ConsoleObservability implements IObservability {
  private readonly options: ObservabilityOptions;
  private readonly minLevel: number;
  private readonly log$: ChildLogger;

  constructor(options: ObservabilityOptions = {}) {
    this.options = options;
    this.minLevel = LOG_LEVELS[options.logLevel ?? "debug"];
    this.log$ = logger.child({ system: options.systemName ?? "research" });
  }

  async startSession(params: StartSessionParams): Promise<string> {
    const sessionId = randomUUID();

    this.log("debug", `[${params.agentName}] Session started`, {
      sessionId,
      correlationId: params.correlationId,
      agentVersion: params.agentVersion,
    });

    return sessionId;
  }

  async endSession(sessionId: string, result: SessionResult): Promise<void> {
    if (result.success) {
      this.log("debug", "Session completed", {
        sessionId,
        durationMs: result.metadata?.durationMs,
        costUsd: result.metadata?.costUsd,
      });
    } else {
      this.log("warn", "Session failed", {
        sessionId,
        error: result.error instanceof Error ? result.error.message : String(result.error),
      });
    }
  }

  async recordEvent(event: ObservabilityEvent): Promise<void> {
    this.log(event.level ?? "info", `[Event] ${event.type}`, {
      correlationId: event.correlationId,
      sessionId: event.sessionId,
      round: event.round,
      jobId: event.jobId,
      ...event.data,
    });

    if (this.options.onEvent) {
      this.options.onEvent(event);
    }
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < this.minLevel) {
      return;
    }

    const context = data ? stripUndefined(data) : undefined;

    switch (level) {
      case "debug":
        this.log$.debug(message, context);
        break;
      case "info":
        this.log$.info(message, context);
        break;
      case "warn":
        this.log$.warn(message, context);
        break;
      case "error":
        this.log$.error(message, undefined, context);
        break;
    }
  }

  metric(name: MetricName, value: number, tags?: Record<string, string>): void {
    this.log$.metric(name, value, tags);
  }
}

function stripUndefined(data: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(data).filter(([, value]) => value !== undefined));
}

/**
 * No-op observability for testing
 */
export class NoOpObservability implements IObservability {
  async startSession(_params: StartSessionParams): Promise<string> {
    return randomUUID();
  }

  async endSession(_sessionId: string, _result: SessionResult): Promise<void> {
    // No-op
  }

  async recordEvent(_event: ObservabilityEvent): Promise<void> {
    // No-op
  }

  log(_level: LogLevel, _message: string, _data?: Record<string, unknown>): void {
    // No-op
  }

  metric(_name: MetricName, _value: number, _tags?: Record<string, string>): void {
    // No-op
  }
}

/**
 * Create console observability
 */
export function createConsoleObservability(options?: ObservabilityOptions): IObservability {
  return new ConsoleObservability(options);
}

/**
 * Create no-op observability (for testing)
 */
export function createNoOpObservability(): IObservability {
  return new NoOpObservability();
}
