/**
 * Research System Types
 * States, results and collaborator contracts for the Session / Step / Job engine
 */

import type { DiscoveryRecord, ExtractionResult } from "@deepsearch/web";
import type { IObservability } from "../../shared/observability/types.js";

export type { DiscoveryRecord, ExtractionResult };

// ============================================
// STATES
// ============================================

/** Job and Step lifecycle; `completed` and `failed` are terminal */
export type RunState = "none" | "initialized" | "running" | "completed" | "failed";

export type JobState = RunState;
export type StepState = RunState;

/** Session lifecycle; `completed` and `error` are terminal */
export type SessionState = "none" | "initialized" | "researching" | "completed" | "error";

// ============================================
// RESULTS
// ============================================

export type EngineErrorType =
  | "configuration"  // Malformed query config or research input
  | "collaborator"   // Discovery / extraction / agent call failed
  | "state"          // Operation called from the wrong state
  | "aggregate";     // Every job in a step failed

export interface EngineError {
  type: EngineErrorType;
  code: string;
  message: string;
  retryable: boolean;
  context?: Record<string, unknown>;
}

export type EngineFailure = { success: false; error: EngineError };

export type EngineResult<T> = { success: true; output: T } | EngineFailure;

export function ok<T>(output: T): EngineResult<T> {
  return { success: true, output };
}

export function fail(error: EngineError): EngineFailure {
  return { success: false, error };
}

// ============================================
// QUERY CONFIG
// ============================================

/**
 * One sub-query and the goals its results must answer
 */
export interface QueryConfig {
  readonly query: string;
  readonly goals: readonly string[];
  readonly context?: string;
  readonly maxDepth?: number;
  readonly maxResultsPerGoal?: number;
}

/**
 * Loosely shaped query config, as produced by a deriver or a caller
 */
export interface QueryConfigInput {
  query: string;
  goals: readonly string[];
  context?: string;
  maxDepth?: number;
  maxResultsPerGoal?: number;
}

// ============================================
// COLLABORATORS
// ============================================

export interface Discoverer {
  discover(query: string, count: number): Promise<DiscoveryRecord[]>;
}

export interface Extractor {
  extract(urls: string[], goals: readonly string[]): Promise<ExtractionResult>;
}

/** Ties a deriver or synthesizer call back to the session and round that made it */
export interface CallContext {
  sessionId?: string;
  correlationId?: string;
  round?: number;
}

export interface QueryDeriver {
  derive(
    topic: string,
    priorFindings: readonly string[],
    batchSize: number,
    context?: CallContext
  ): Promise<QueryConfigInput[]>;
}

export interface ReportSynthesizer {
  synthesize(
    findings: readonly string[],
    topic: string,
    context?: CallContext
  ): Promise<ResearchResults>;
}

/** Collaborators a Job needs, shared across every Job of a Session */
export interface JobCollaborators {
  discoverer: Discoverer;
  extractor: Extractor;
}

export interface SessionCollaborators extends JobCollaborators {
  deriver: QueryDeriver;
  synthesizer: ReportSynthesizer;
}

/** Observability handle threaded through the engine */
export interface EngineOptions {
  observability?: IObservability;
  correlationId?: string;
}

// ============================================
// OUTPUTS
// ============================================

export interface JobOutput {
  jobId: string;
  query: string;
  discovery: DiscoveryRecord[];
  extraction: ExtractionResult;
  findings: string;
}

export interface JobSnapshot {
  id: string;
  state: JobState;
  query: string;
  goals: string[];
  error: string | null;
  discoveryCount: number;
  findings: string | null;
}

export interface StepOutput {
  round: number;
  jobs: Record<string, JobSnapshot>;
  findings: string;
  completedJobs: number;
  failedJobs: number;
}

export interface StepProgress {
  total: number;
  completed: number;
  failed: number;
  running: number;
  percentComplete: number;
}

export interface StepSnapshot {
  round: number;
  state: StepState;
  error: string | null;
  jobs: Record<string, JobSnapshot>;
  findings: string | null;
}

export interface RoundResult {
  round: number;
  state: StepState;
  queries: string[];
  findings: string;
  jobs: Record<string, JobSnapshot>;
  error?: string;
}

/**
 * Final report, produced once at the end of a session
 */
export interface ResearchResults {
  mainReport: string;
  keyLearnings: string[];
  areasCovered: string[];
  areasToExplore: string[];
  additionalNotes?: string;
}

export interface SessionStatus {
  sessionId: string | null;
  state: SessionState;
  error: string | null;
  hasResults: boolean;
  currentRound: number;
  maxDepth: number;
  startedAt: string | null;
  endedAt: string | null;
}

export interface SessionSnapshot extends SessionStatus {
  topic: string;
  rounds: RoundResult[];
  findings: string[];
  results: ResearchResults | null;
}
