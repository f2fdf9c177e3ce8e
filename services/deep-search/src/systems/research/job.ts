/**
 * Job
 * One sub-query: discover references, extract goal answers, reduce to findings
 */

import { randomUUID } from "crypto";
import { isDeepSearchError, isRetryableError } from "@deepsearch/core";
import { createNoOpObservability } from "../../shared/observability/console.js";
import type { IObservability } from "../../shared/observability/types.js";
import { createQueryConfig, validateQueryConfig } from "./query-config.js";
import { completeAnswers, reduceJobFindings } from "./findings.js";
import { fail, ok } from "./types.js";
import type {
  DiscoveryRecord,
  EngineError,
  EngineFailure,
  EngineOptions,
  EngineResult,
  ExtractionResult,
  JobCollaborators,
  JobOutput,
  JobSnapshot,
  JobState,
  QueryConfig,
  QueryConfigInput,
} from "./types.js";
import type { ResearchSettings } from "./schema.js";

export interface JobOptions extends EngineOptions {
  /** Supplies the discovery count when the config has none */
  settings: Pick<ResearchSettings, "maxResults">;
  round?: number;
}

export class Job {
  readonly id: string;
  readonly config: QueryConfig;

  private state: JobState = "none";
  private error: string | null = null;
  private collaborators: JobCollaborators | null = null;
  private discovery: DiscoveryRecord[] = [];
  private output: JobOutput | null = null;

  private readonly options: JobOptions;
  private readonly observability: IObservability;

  constructor(config: QueryConfigInput, options: JobOptions) {
    this.id = randomUUID();
    this.config = createQueryConfig(config);
    this.options = options;
    this.observability = options.observability ?? createNoOpObservability();
  }

  /**
   * Validate the config and wire the shared collaborators
   */
  initialize(collaborators?: JobCollaborators): EngineResult<void> {
    if (this.state !== "none") {
      return fail(this.stateError("initialize"));
    }

    const invalid = validateQueryConfig(this.config);
    if (invalid) {
      return this.failWith({
        type: "configuration",
        code: "INVALID_QUERY_CONFIG",
        message: invalid,
        retryable: false,
      });
    }

    if (!collaborators?.discoverer || !collaborators.extractor) {
      return this.failWith({
        type: "configuration",
        code: "MISSING_COLLABORATOR",
        message: "Job requires a discoverer and an extractor",
        retryable: false,
      });
    }

    this.collaborators = collaborators;
    this.state = "initialized";
    return ok(undefined);
  }

  /**
   * Run discovery then extraction. Never rejects; failures come back as results.
   */
  async run(): Promise<EngineResult<JobOutput>> {
    if (this.state !== "initialized" || !this.collaborators) {
      return fail(this.stateError("run"));
    }

    const { discoverer, extractor } = this.collaborators;
    const { query, goals } = this.config;
    const count = this.config.maxResultsPerGoal ?? this.options.settings.maxResults;

    this.state = "running";
    this.log("debug", "Job started", { count });

    try {
      const discovery = await discoverer.discover(query, count);
      if (discovery.length === 0) {
        return this.failWith({
          type: "collaborator",
          code: "NO_RESULTS",
          message: "no results found",
          retryable: false,
        });
      }
      this.discovery = discovery;

      const urls = discovery.map((record) => record.url);
      const extracted = await extractor.extract(urls, goals);
      if (Object.keys(extracted.answers).length === 0) {
        return this.failWith({
          type: "collaborator",
          code: "NO_ANSWERS",
          message: "no answers extracted",
          retryable: false,
        });
      }

      const extraction: ExtractionResult = {
        answers: completeAnswers(goals, extracted.answers),
        sources: extracted.sources,
      };

      const output: JobOutput = {
        jobId: this.id,
        query,
        discovery,
        extraction,
        findings: reduceJobFindings(query, goals, extraction.answers),
      };

      this.output = output;
      this.state = "completed";
      this.log("debug", "Job completed", { sources: discovery.length });
      return ok(output);
    } catch (error) {
      return this.failWith({
        type: "collaborator",
        code: isDeepSearchError(error) ? error.code : "JOB_FAILED",
        message: error instanceof Error ? error.message : String(error),
        retryable: isRetryableError(error),
      });
    }
  }

  /**
   * Stored output, only once completed
   */
  getResults(): JobOutput | null {
    return this.state === "completed" ? this.output : null;
  }

  getState(): JobState {
    return this.state;
  }

  getError(): string | null {
    return this.error;
  }

  toJSON(): JobSnapshot {
    return {
      id: this.id,
      state: this.state,
      query: this.config.query,
      goals: [...this.config.goals],
      error: this.error,
      discoveryCount: this.discovery.length,
      findings: this.output?.findings ?? null,
    };
  }

  private failWith(error: EngineError): EngineFailure {
    this.state = "failed";
    this.error = error.message;
    this.log("warn", "Job failed", { code: error.code, error: error.message });
    return fail({ ...error, context: { ...error.context, jobId: this.id, query: this.config.query } });
  }

  private stateError(operation: string): EngineError {
    return {
      type: "state",
      code: "INVALID_STATE",
      message: `Cannot ${operation} job in state "${this.state}"`,
      retryable: false,
      context: { jobId: this.id },
    };
  }

  private log(level: "debug" | "warn", message: string, data?: Record<string, unknown>): void {
    this.observability.log(level, message, {
      correlationId: this.options.correlationId,
      round: this.options.round,
      jobId: this.id,
      query: this.config.query,
      ...data,
    });
  }
}
