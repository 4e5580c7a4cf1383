/**
 * Domain Types
 *
 * Shared type definitions for one generation run: the request, the token
 * usage reported by the provider, the generated documents and the metrics
 * record appended to a session log.
 */

export * from './api';

/**
 * One user submission. Created per request and never mutated.
 */
export interface GenerationRequest {
  readonly company: string;
  readonly jobDescription: string;
  readonly wantCoverLetter: boolean;
}

/**
 * Token counts as reported by the LLM provider
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type DocumentKind = 'resume' | 'cover-letter';

/**
 * A LaTeX document together with its compiled PDF
 */
export interface GeneratedDocument {
  kind: DocumentKind;
  latexSource: string;
  pdf: Buffer;
}

/**
 * Wall-clock time spent in each stage, in seconds
 */
export interface StageTimings {
  resumeGeneration: number;
  coverLetterGeneration?: number;
  compilation: number;
}

/**
 * Output of a successful pipeline run
 */
export interface GenerationResult {
  latexSource: string;
  pdf: Buffer;
  tokensUsed: number;
  usage: TokenUsage;
  elapsedSeconds: number;
  modelName: string;
  stageSeconds: StageTimings;
  coverLetter?: GeneratedDocument;
}

/**
 * How a recorded run ended. Runs that never got a provider response are not recorded.
 */
export type RunStatus = 'succeeded' | 'generation_failed' | 'compilation_failed';

/**
 * One entry of a session's append-only metrics log
 */
export interface MetricsRecord {
  readonly id: string;
  /** ISO 8601 */
  readonly timestamp: string;
  readonly tokensUsed: number;
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly elapsedSeconds: number;
  readonly modelName: string;
  readonly company: string;
  readonly coverLetter: boolean;
  readonly status: RunStatus;
}

/**
 * Aggregates over a metrics log
 */
export interface MetricsSummary {
  runs: number;
  succeededRuns: number;
  totalTokens: number;
  averageElapsedSeconds: number;
}
