/**
 * Firecrawl Extractor
 * Answers a list of research goals from a set of pages via Firecrawl's extract endpoint
 */

import FirecrawlApp from "@mendable/firecrawl-js";
import {
  getBaseConfig,
  logger,
  isRetryableError,
  ConfigError,
  ExtractionError,
  type ChildLogger,
} from "@deepsearch/core";
import {
  ExtractResponseSchema,
  NOT_FOUND,
  buildGoalSchema,
  goalKey,
  type ExtractionResult,
} from "./types.js";
import { sleep, withSingleRetry } from "./retry.js";

const RETRY_DELAY_MS = 2000;

export interface ExtractRequest {
  prompt: string;
  schema: Record<string, unknown>;
}

/**
 * The slice of the Firecrawl SDK this client needs
 */
export interface ExtractApi {
  extract(urls: string[], params: ExtractRequest): Promise<unknown>;
}

export interface FirecrawlExtractorOptions {
  apiKey?: string;
  apiUrl?: string;
  /** Replaces the Firecrawl SDK (tests) */
  api?: ExtractApi;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export function buildExtractionPrompt(goals: readonly string[]): string {
  const goalList = goals.map((goal) => `- ${goal}`).join("\n");

  return `Provide ONLY factual, data-oriented information found on these pages.

Answer each research goal below directly and concisely, using only what the sources explicitly state:
${goalList}

Rules:
1. Include only facts stated in the sources
2. Prefer exact numbers, dates and statistics
3. Keep each answer short but complete
4. If a source says nothing about a goal, answer "${NOT_FOUND}"
5. No opinions, interpretation or speculation`;
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "statusCode" in error) {
    return typeof error.statusCode === "number" ? error.statusCode : undefined;
  }
  return undefined;
}

/**
 * Firecrawl-backed extraction client
 */
export class FirecrawlExtractor {
  private readonly log: ChildLogger;
  private readonly api: ExtractApi;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: FirecrawlExtractorOptions = {}) {
    this.log = logger.child({ component: "firecrawl" });
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
    this.sleep = options.sleep ?? sleep;

    if (options.api) {
      this.api = options.api;
      return;
    }

    const config = options.apiKey ? undefined : getBaseConfig();
    const apiKey = options.apiKey ?? config?.firecrawl.apiKey;
    if (!apiKey) {
      throw new ConfigError("FIRECRAWL_API_KEY must be provided or set in the environment");
    }

    const apiUrl = options.apiUrl ?? config?.firecrawl.apiUrl;
    const app = new FirecrawlApp(apiUrl ? { apiKey, apiUrl } : { apiKey });
    this.api = {
      extract: (urls, params) => app.extract(urls, params),
    };
  }

  /**
   * Extractor capability: one answer per goal, keyed goal1..goalN.
   * Goals the pages do not cover come back as the not-found sentinel.
   */
  async extract(urls: string[], goals: readonly string[]): Promise<ExtractionResult> {
    if (urls.length === 0) {
      throw new ExtractionError("No URLs supplied for extraction", { urls });
    }
    if (goals.length === 0) {
      throw new ExtractionError("No research goals supplied for extraction", { urls });
    }

    this.log.info("Starting content extraction", { urls: urls.length, goals: goals.length });

    return withSingleRetry(() => this.extractOnce(urls, goals), {
      delayMs: this.retryDelayMs,
      sleep: this.sleep,
      log: this.log,
      meta: { urls: urls.length },
    });
  }

  private async extractOnce(urls: string[], goals: readonly string[]): Promise<ExtractionResult> {
    let raw: unknown;

    try {
      raw = await this.api.extract(urls, {
        prompt: buildExtractionPrompt(goals),
        schema: buildGoalSchema(goals),
      });
    } catch (error) {
      const statusCode = statusCodeOf(error);
      const message = error instanceof Error ? error.message : String(error);
      this.log.error("Firecrawl extract request failed", error, { statusCode });

      throw new ExtractionError(`Firecrawl extract failed: ${message}`, {
        cause: error instanceof Error ? error : undefined,
        statusCode,
        urls,
        retryable: statusCode === 429 || isRetryableError(error),
      });
    }

    const parsed = ExtractResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExtractionError("Unexpected Firecrawl extract response", { urls });
    }

    if (!parsed.data.success) {
      throw new ExtractionError(`Extraction failed: ${parsed.data.error ?? "unknown error"}`, { urls });
    }

    const data = parsed.data.data;
    if (!data) {
      throw new ExtractionError("Extraction returned no data", { urls });
    }

    const answers: Record<string, string> = {};
    goals.forEach((_, index) => {
      const key = goalKey(index);
      const value = data[key];
      answers[key] = typeof value === "string" && value.trim().length > 0 ? value.trim() : NOT_FOUND;
    });

    return { answers, sources: urls };
  }
}

/**
 * Create a Firecrawl extractor
 */
export function createFirecrawlExtractor(options?: FirecrawlExtractorOptions): FirecrawlExtractor {
  return new FirecrawlExtractor(options);
}
