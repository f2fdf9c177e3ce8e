/**
 * Step
 * One research round: a batch of jobs run concurrently behind a join barrier
 */

import { createNoOpObservability } from "../../shared/observability/console.js";
import type { IObservability } from "../../shared/observability/types.js";
import { Job, type JobOptions } from "./job.js";
import { joinFindings } from "./findings.js";
import { recordEvent } from "./events.js";
import { fail, ok } from "./types.js";
import type {
  EngineError,
  EngineFailure,
  EngineOptions,
  EngineResult,
  JobCollaborators,
  JobSnapshot,
  QueryConfigInput,
  StepOutput,
  StepProgress,
  StepSnapshot,
  StepState,
} from "./types.js";

export interface StepOptions extends EngineOptions {
  settings: JobOptions["settings"];
}

export class Step {
  readonly round: number;

  private state: StepState = "none";
  private error: string | null = null;
  private findings: string | null = null;

  // Map iteration order is insertion order, which is launch order
  private readonly jobs = new Map<string, Job>();

  private readonly configs: readonly QueryConfigInput[];
  private readonly collaborators: JobCollaborators;
  private readonly options: StepOptions;
  private readonly observability: IObservability;

  constructor(
    round: number,
    configs: readonly QueryConfigInput[],
    collaborators: JobCollaborators,
    options: StepOptions
  ) {
    this.round = round;
    this.configs = configs;
    this.collaborators = collaborators;
    this.options = options;
    this.observability = options.observability ?? createNoOpObservability();
  }

  /**
   * Build and initialize one job per config. Any bad config fails the whole step.
   */
  initialize(): EngineResult<void> {
    if (this.state !== "none") {
      return fail(this.stateError("initialize"));
    }

    if (this.configs.length === 0) {
      return this.failWith({
        type: "configuration",
        code: "EMPTY_BATCH",
        message: `Round ${this.round} has no queries to run`,
        retryable: false,
      });
    }

    for (const config of this.configs) {
      const job = new Job(config, {
        settings: this.options.settings,
        observability: this.observability,
        correlationId: this.options.correlationId,
        round: this.round,
      });
      this.jobs.set(job.id, job);

      const initialized = job.initialize(this.collaborators);
      if (!initialized.success) {
        return this.failWith({
          type: "configuration",
          code: initialized.error.code,
          message: `Job initialization failed for query "${job.config.query}": ${initialized.error.message}`,
          retryable: false,
          context: { jobId: job.id },
        });
      }
    }

    this.state = "initialized";
    return ok(undefined);
  }

  /**
   * Run every job concurrently and wait for all of them to finish.
   * At least one completed job makes the step complete.
   */
  async run(): Promise<EngineResult<StepOutput>> {
    if (this.state !== "initialized") {
      return fail(this.stateError("run"));
    }

    this.state = "running";
    const startTime = Date.now();
    const jobs = [...this.jobs.values()];

    this.observability.log("info", `Round ${this.round}: running ${jobs.length} jobs`, {
      correlationId: this.options.correlationId,
      round: this.round,
    });

    // Job.run never rejects, so this waits for every job
    await Promise.all(jobs.map((job) => job.run()));

    for (const job of jobs) {
      const completed = job.getState() === "completed";
      await recordEvent(this.observability, {
        type: completed ? "job.completed" : "job.failed",
        correlationId: this.options.correlationId,
        round: this.round,
        jobId: job.id,
        level: completed ? "debug" : "warn",
        data: completed ? { query: job.config.query } : { query: job.config.query, error: job.getError() },
      });
    }

    const failed = jobs.filter((job) => job.getState() === "failed");
    const completedCount = jobs.length - failed.length;

    this.observability.metric("step.duration_ms", Date.now() - startTime, { round: String(this.round) });
    this.observability.metric("step.completed_jobs", completedCount, { round: String(this.round) });
    this.observability.metric("step.failed_jobs", failed.length, { round: String(this.round) });

    if (completedCount === 0) {
      const details = failed.map((job) => `${job.id}: ${job.getError() ?? "unknown error"}`).join("; ");
      return this.failWith({
        type: "aggregate",
        code: "ALL_JOBS_FAILED",
        message: `All ${jobs.length} jobs failed: ${details}`,
        retryable: false,
      });
    }

    if (failed.length > 0) {
      this.observability.log("warn", `Round ${this.round}: ${failed.length} of ${jobs.length} jobs failed`, {
        correlationId: this.options.correlationId,
        round: this.round,
        failedJobs: failed.map((job) => job.id),
      });
    }

    this.findings = this.aggregateFindings();
    this.state = "completed";

    return ok({
      round: this.round,
      jobs: this.snapshotJobs(),
      findings: this.findings,
      completedJobs: completedCount,
      failedJobs: failed.length,
    });
  }

  /**
   * Completed jobs' findings joined in launch order
   */
  aggregateFindings(): string {
    const findings: string[] = [];
    for (const job of this.jobs.values()) {
      const result = job.getResults();
      if (result) {
        findings.push(result.findings);
      }
    }
    return joinFindings(findings);
  }

  /**
   * Per-job map and findings, only once completed
   */
  getResults(): StepOutput | null {
    if (this.state !== "completed" || this.findings === null) {
      return null;
    }

    const jobs = this.snapshotJobs();
    const failedJobs = Object.values(jobs).filter((job) => job.state === "failed").length;

    return {
      round: this.round,
      jobs,
      findings: this.findings,
      completedJobs: Object.keys(jobs).length - failedJobs,
      failedJobs,
    };
  }

  getJob(jobId: string): Job | undefined {
    return this.jobs.get(jobId);
  }

  getJobs(): Job[] {
    return [...this.jobs.values()];
  }

  getProgress(): StepProgress {
    const jobs = [...this.jobs.values()];
    const completed = jobs.filter((job) => job.getState() === "completed").length;
    const failed = jobs.filter((job) => job.getState() === "failed").length;
    const running = jobs.filter((job) => job.getState() === "running").length;

    return {
      total: jobs.length,
      completed,
      failed,
      running,
      percentComplete: jobs.length === 0 ? 0 : Math.round(((completed + failed) / jobs.length) * 100),
    };
  }

  getState(): StepState {
    return this.state;
  }

  getError(): string | null {
    return this.error;
  }

  toJSON(): StepSnapshot {
    return {
      round: this.round,
      state: this.state,
      error: this.error,
      jobs: this.snapshotJobs(),
      findings: this.findings,
    };
  }

  private snapshotJobs(): Record<string, JobSnapshot> {
    const snapshots: Record<string, JobSnapshot> = {};
    for (const [id, job] of this.jobs) {
      snapshots[id] = job.toJSON();
    }
    return snapshots;
  }

  private failWith(error: EngineError): EngineFailure {
    this.state = "failed";
    this.error = error.message;
    this.observability.log("error", `Round ${this.round} failed`, {
      correlationId: this.options.correlationId,
      round: this.round,
      error: error.message,
    });
    return fail({ ...error, context: { ...error.context, round: this.round } });
  }

  private stateError(operation: string): EngineError {
    return {
      type: "state",
      code: "INVALID_STATE",
      message: `Cannot ${operation} step in state "${this.state}"`,
      retryable: false,
      context: { round: this.round },
    };
  }
}
