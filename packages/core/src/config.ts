/**
 * Configuration Management
 * Loads and validates base configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";

// Brave caps a single result page at 20 entries
export const MAX_SEARCH_RESULTS = 20;

const baseEnvSchema = z.object({
  // Discovery
  BRAVE_API_KEY: z.string().optional(),

  // Extraction
  FIRECRAWL_API_KEY: z.string().optional(),
  FIRECRAWL_API_URL: z.string().url().optional(),

  // Query derivation / synthesis
  ANTHROPIC_API_KEY: z.string().optional(),

  // Research defaults
  RESEARCH_MAX_DEPTH: z.coerce.number().int().min(1).default(3),
  RESEARCH_MAX_RESULTS: z.coerce.number().int().min(1).max(MAX_SEARCH_RESULTS).default(3),
  RESEARCH_BATCH_SIZE: z.coerce.number().int().min(1).default(3),
  RESEARCH_LANGUAGE: z.string().min(2).default("en"),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type BaseEnv = z.infer<typeof baseEnvSchema>;

/**
 * Base configuration - shared across all workspaces
 */
export interface BaseConfig {
  brave: {
    apiKey?: string;
  };

  firecrawl: {
    apiKey?: string;
    apiUrl?: string;
  };

  anthropic: {
    apiKey?: string;
  };

  research: {
    maxDepth: number;
    maxResults: number;
    batchSize: number;
    language: string;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    logFormat: "pretty" | "json";
    nodeEnv: "development" | "production" | "test";
  };
}

let baseConfigInstance: BaseConfig | null = null;

/**
 * Load and validate base configuration
 */
export function loadBaseConfig(source: NodeJS.ProcessEnv = process.env): BaseConfig {
  const parseResult = baseEnvSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  const env = parseResult.data;

  return {
    brave: {
      apiKey: env.BRAVE_API_KEY || undefined,
    },

    firecrawl: {
      apiKey: env.FIRECRAWL_API_KEY || undefined,
      apiUrl: env.FIRECRAWL_API_URL,
    },

    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || undefined,
    },

    research: {
      maxDepth: env.RESEARCH_MAX_DEPTH,
      maxResults: env.RESEARCH_MAX_RESULTS,
      batchSize: env.RESEARCH_BATCH_SIZE,
      language: env.RESEARCH_LANGUAGE,
    },

    env: {
      logLevel: env.LOG_LEVEL,
      logFormat: env.LOG_FORMAT,
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get base configuration (lazy-loaded singleton)
 */
export function getBaseConfig(): BaseConfig {
  if (!baseConfigInstance) {
    baseConfigInstance = loadBaseConfig();
  }
  return baseConfigInstance;
}

/**
 * Reset config (for testing)
 */
export function resetBaseConfig(): void {
  baseConfigInstance = null;
}

/**
 * Helper to require environment variable
 */
export function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Helper to get optional environment variable with default
 */
export function getEnv(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}
