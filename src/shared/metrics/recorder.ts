/**
 * Metrics Recorder
 *
 * Turns the outcome of one run into a MetricsRecord and appends it to the
 * session's log. Appending cannot fail.
 */

import { randomUUID } from 'crypto';
import type { GenerationRequest, MetricsRecord, RunStatus, TokenUsage } from '../types';
import type { MetricsLog } from './log';

/**
 * What the pipeline knows about a run when it is recorded
 */
export interface RunMetrics {
  request: GenerationRequest;
  usage: TokenUsage;
  elapsedSeconds: number;
  modelName: string;
  status: RunStatus;
}

export interface MetricsRecorderOptions {
  now?: () => Date;
  newId?: () => string;
}

export class MetricsRecorder {
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(options: MetricsRecorderOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  record(log: MetricsLog, run: RunMetrics): MetricsRecord {
    return log.append(Object.freeze({
      id: this.newId(),
      timestamp: this.now().toISOString(),
      tokensUsed: run.usage.totalTokens,
      promptTokens: run.usage.promptTokens,
      completionTokens: run.usage.completionTokens,
      elapsedSeconds: run.elapsedSeconds,
      modelName: run.modelName,
      company: run.request.company,
      coverLetter: run.request.wantCoverLetter,
      status: run.status
    }));
  }
}

/**
 * Sum token usage across several provider calls
 */
export function addUsage(...usages: TokenUsage[]): TokenUsage {
  return usages.reduce<TokenUsage>(
    (total, usage) => ({
      promptTokens: total.promptTokens + usage.promptTokens,
      completionTokens: total.completionTokens + usage.completionTokens,
      totalTokens: total.totalTokens + usage.totalTokens
    }),
    { promptTokens: 0, completionTokens: 0, totalTokens: 0 }
  );
}
