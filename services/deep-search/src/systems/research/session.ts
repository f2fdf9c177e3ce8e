/**
 * Session
 * Iterative research controller: derive queries, run a step, feed findings forward
 */

import { randomUUID } from "crypto";
import { isDeepSearchError } from "@deepsearch/core";
import { createNoOpObservability } from "../../shared/observability/console.js";
import type { EventType, IObservability, LogLevel } from "../../shared/observability/types.js";
import { Step } from "./step.js";
import { recordEvent } from "./events.js";
import { createQueryConfig, fallbackQueryConfig } from "./query-config.js";
import {
  defaultSettings,
  parseResearchInput,
  type ResearchInput,
  type ResearchSettings,
} from "./schema.js";
import { fail, ok } from "./types.js";
import type {
  CallContext,
  EngineError,
  EngineFailure,
  EngineOptions,
  EngineResult,
  QueryConfig,
  ResearchResults,
  RoundResult,
  SessionCollaborators,
  SessionSnapshot,
  SessionState,
  SessionStatus,
  StepOutput,
} from "./types.js";

export interface SessionOptions extends EngineOptions {
  /** Settings the input's own settings are merged over; configuration when omitted */
  defaults?: ResearchSettings;
  now?: () => Date;
}

export const SYNTHESIS_FAILURE_PREFIX = "Failed to synthesize research report";

export class Session {
  private state: SessionState = "none";
  private sessionId: string | null = null;
  private error: string | null = null;
  private startedAt: string | null = null;
  private endedAt: string | null = null;

  private topic = "";
  private settings: ResearchSettings | null = null;
  private currentRound = 0;
  private rounds: RoundResult[] = [];
  private findings: string[] = [];
  private results: ResearchResults | null = null;

  private readonly input: ResearchInput;
  private readonly collaborators: SessionCollaborators;
  private readonly options: SessionOptions;
  private readonly observability: IObservability;
  private readonly now: () => Date;

  constructor(input: ResearchInput, collaborators: SessionCollaborators, options: SessionOptions = {}) {
    this.input = input;
    this.collaborators = collaborators;
    this.options = options;
    this.observability = options.observability ?? createNoOpObservability();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validate topic and settings, assign a session id, clear round storage
   */
  initialize(): EngineResult<void> {
    if (this.state !== "none") {
      return fail(this.stateError("initialize"));
    }

    const parsed = parseResearchInput(this.input, this.options.defaults ?? defaultSettings());
    if (!parsed.success) {
      return this.markFailed({
        type: "configuration",
        code: "INVALID_INPUT",
        message: `Invalid research input: ${parsed.message}`,
        retryable: false,
      });
    }

    const { deriver, synthesizer, discoverer, extractor } = this.collaborators;
    if (!deriver || !synthesizer || !discoverer || !extractor) {
      return this.markFailed({
        type: "configuration",
        code: "MISSING_COLLABORATOR",
        message: "Session requires a deriver, a synthesizer, a discoverer and an extractor",
        retryable: false,
      });
    }

    this.topic = parsed.topic;
    this.settings = parsed.settings;
    this.sessionId = createSessionId(this.now());
    this.rounds = [];
    this.findings = [];
    this.results = null;
    this.state = "initialized";

    return ok(undefined);
  }

  /**
   * Run every round, then synthesize the report
   */
  async run(): Promise<EngineResult<ResearchResults>> {
    if (this.state !== "initialized" || !this.settings) {
      return fail(this.stateError("run"));
    }

    const settings = this.settings;
    this.state = "researching";
    this.startedAt = this.now().toISOString();

    await this.emit("session.started", "info", {
      topic: this.topic,
      maxDepth: settings.maxDepth,
      batchSize: settings.batchSize,
    });

    try {
      for (let round = 1; round <= settings.maxDepth; round++) {
        this.currentRound = round;
        await this.emit("round.started", "info", {}, round);

        const batch = await this.deriveBatch(round, settings.batchSize);
        const outcome = await this.runStep(round, batch, settings);

        if (!outcome.success) {
          await this.emit("round.failed", "warn", { error: outcome.error.message }, round);

          if (settings.emptyRoundPolicy === "fail") {
            return this.failWith({
              ...outcome.error,
              message: `Research failed in round ${round}: ${outcome.error.message}`,
            });
          }
          continue;
        }

        this.findings.push(outcome.output.findings);
        await this.emit(
          "round.completed",
          "info",
          { completedJobs: outcome.output.completedJobs, failedJobs: outcome.output.failedJobs },
          round
        );
      }

      this.results = await this.synthesize();
    } catch (error) {
      return this.failWith({
        type: "collaborator",
        code: isDeepSearchError(error) ? error.code : "SESSION_ERROR",
        message: `Research failed: ${error instanceof Error ? error.message : String(error)}`,
        retryable: false,
      });
    }

    this.endedAt = this.now().toISOString();
    this.state = "completed";

    this.observability.metric("session.duration_ms", this.durationMs());
    this.observability.metric("session.rounds", this.rounds.length);
    await this.emit("session.completed", "info", {
      rounds: this.rounds.length,
      findings: this.findings.length,
    });

    return ok(this.results);
  }

  /**
   * Snapshot read, safe from any state
   */
  getStatus(): SessionStatus {
    return {
      sessionId: this.sessionId,
      state: this.state,
      error: this.error,
      hasResults: this.results !== null,
      currentRound: this.currentRound,
      maxDepth: this.settings?.maxDepth ?? 0,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
    };
  }

  getResults(): ResearchResults | null {
    return this.results;
  }

  getRounds(): readonly RoundResult[] {
    return this.rounds;
  }

  getFindings(): readonly string[] {
    return this.findings;
  }

  getState(): SessionState {
    return this.state;
  }

  getError(): string | null {
    return this.error;
  }

  toJSON(): SessionSnapshot {
    return {
      ...this.getStatus(),
      topic: this.topic,
      rounds: this.rounds.map((round) => ({ ...round })),
      findings: [...this.findings],
      results: this.results,
    };
  }

  /**
   * Ask the deriver for the next batch; fall back to the topic alone when it
   * returns nothing or throws
   */
  private async deriveBatch(round: number, batchSize: number): Promise<QueryConfig[]> {
    let reason: string;

    try {
      const derived = await this.collaborators.deriver.derive(
        this.topic,
        [...this.findings],
        batchSize,
        this.callContext(round)
      );
      if (derived.length > 0) {
        return derived.slice(0, batchSize).map((config) => createQueryConfig(config));
      }
      reason = "query deriver returned no queries";
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }

    await this.emit("derive.fallback", "warn", { reason }, round);
    return [fallbackQueryConfig(this.topic)];
  }

  private async runStep(
    round: number,
    batch: QueryConfig[],
    settings: ResearchSettings
  ): Promise<EngineResult<StepOutput>> {
    const step = new Step(
      round,
      batch,
      { discoverer: this.collaborators.discoverer, extractor: this.collaborators.extractor },
      { settings, observability: this.observability, correlationId: this.sessionId ?? undefined }
    );
    const initialized = step.initialize();
    const outcome: EngineResult<StepOutput> = initialized.success
      ? await step.run()
      : fail(initialized.error);

    this.rounds.push({
      round,
      state: step.getState(),
      queries: batch.map((config) => config.query),
      findings: outcome.success ? outcome.output.findings : "",
      jobs: step.toJSON().jobs,
      ...(outcome.success ? {} : { error: outcome.error.message }),
    });

    return outcome;
  }

  /**
   * Synthesize the final report; a failure degrades to a placeholder carrying the raw findings
   */
  private async synthesize(): Promise<ResearchResults> {
    let reason: string;

    try {
      const report = await this.collaborators.synthesizer.synthesize(
        [...this.findings],
        this.topic,
        this.callContext()
      );
      if (report.mainReport.trim().length > 0) {
        return report;
      }
      reason = "synthesizer returned an empty report";
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }

    await this.emit("synthesis.degraded", "warn", { reason });
    return degradedResults(reason, this.findings);
  }

  private markFailed(error: EngineError): EngineFailure {
    this.state = "error";
    this.error = error.message;
    this.endedAt = this.now().toISOString();
    return fail(error);
  }

  private async failWith(error: EngineError): Promise<EngineFailure> {
    const result = this.markFailed(error);
    this.observability.metric("session.duration_ms", this.durationMs());
    await this.emit("session.failed", "error", { error: error.message });
    return result;
  }

  private stateError(operation: string): EngineError {
    return {
      type: "state",
      code: "INVALID_STATE",
      message: `Cannot ${operation} session in state "${this.state}"`,
      retryable: false,
    };
  }

  private durationMs(): number {
    if (!this.startedAt) {
      return 0;
    }
    const end = this.endedAt ? Date.parse(this.endedAt) : this.now().getTime();
    return end - Date.parse(this.startedAt);
  }

  private callContext(round?: number): CallContext {
    return {
      sessionId: this.sessionId ?? undefined,
      correlationId: this.options.correlationId ?? this.sessionId ?? undefined,
      round,
    };
  }

  private emit(
    type: EventType,
    level: LogLevel,
    data: Record<string, unknown>,
    round?: number
  ): Promise<void> {
    return recordEvent(this.observability, {
      type,
      level,
      correlationId: this.options.correlationId,
      sessionId: this.sessionId ?? undefined,
      round,
      data,
    });
  }
}

/**
 * Report used when synthesis fails; the findings survive as key learnings
 */
export function degradedResults(reason: string, findings: readonly string[]): ResearchResults {
  return {
    mainReport: `${SYNTHESIS_FAILURE_PREFIX}: ${reason}`,
    keyLearnings: [...findings],
    areasCovered: [],
    areasToExplore: [],
  };
}

function createSessionId(date: Date): string {
  const stamp = date.toISOString().replace(/[-:.TZ]/g, "");
  return `research-${stamp}-${randomUUID().slice(0, 8)}`;
}
