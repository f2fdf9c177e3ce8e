/**
 * Custom Error Types
 * Structured errors for better handling and debugging
 */

/**
 * Base error class for all deep-search errors
 */
export class DeepSearchError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "DeepSearchError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends DeepSearchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * LLM agent errors (query derivation, synthesis)
 */
export class AgentError extends DeepSearchError {
  public readonly agentType: string;

  constructor(
    message: string,
    agentType: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message, "AGENT_ERROR", options);
    this.name = "AgentError";
    this.agentType = agentType;
  }
}

/**
 * Agent max turns exceeded
 */
export class MaxTurnsExceededError extends AgentError {
  public readonly maxTurns: number;

  constructor(agentType: string, maxTurns: number) {
    super(`Max turns exceeded: limit was ${maxTurns}`, agentType, {
      context: { maxTurns },
      retryable: false,
    });
    this.name = "MaxTurnsExceededError";
    this.maxTurns = maxTurns;
  }
}

/**
 * Search API errors
 */
export class SearchError extends DeepSearchError {
  public readonly statusCode?: number;
  public readonly query?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      statusCode?: number;
      query?: string;
      context?: Record<string, unknown>;
    }
  ) {
    const retryable = options?.statusCode === 429;
    super(message, "SEARCH_ERROR", { ...options, retryable });
    this.name = "SearchError";
    this.statusCode = options?.statusCode;
    this.query = options?.query;
  }

  get rateLimited(): boolean {
    return this.statusCode === 429;
  }
}

/**
 * Content extraction errors
 */
export class ExtractionError extends DeepSearchError {
  public readonly statusCode?: number;
  public readonly urls: string[];

  constructor(
    message: string,
    options?: {
      cause?: Error;
      statusCode?: number;
      urls?: string[];
      retryable?: boolean;
    }
  ) {
    super(message, "EXTRACTION_ERROR", {
      cause: options?.cause,
      context: options?.urls ? { urls: options.urls } : undefined,
      retryable: options?.retryable ?? options?.statusCode === 429,
    });
    this.name = "ExtractionError";
    this.statusCode = options?.statusCode;
    this.urls = options?.urls ?? [];
  }
}

/**
 * Network/connectivity errors
 */
export class NetworkError extends DeepSearchError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", { cause, retryable: true });
    this.name = "NetworkError";
  }
}

/**
 * Validation errors (schemas, inputs)
 */
export class ValidationError extends DeepSearchError {
  public readonly field?: string;
  public readonly expected?: string;
  public readonly received?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      expected?: string;
      received?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
    this.expected = options?.expected;
    this.received = options?.received;
  }
}

/**
 * Type guard to check if error is a deep-search error
 */
export function isDeepSearchError(error: unknown): error is DeepSearchError {
  return error instanceof DeepSearchError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isDeepSearchError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a deep-search error
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): DeepSearchError {
  if (isDeepSearchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new DeepSearchError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new DeepSearchError(
    typeof error === "string" && error.length > 0 ? error : defaultMessage,
    "UNKNOWN_ERROR"
  );
}
