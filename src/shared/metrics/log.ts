/**
 * Metrics Log
 *
 * Ordered, append-only record of the runs of one session. Records are frozen
 * when appended; there is no way to remove or replace one.
 */

import type { MetricsRecord, MetricsSummary } from '../types';

export class MetricsLog {
  private readonly records: MetricsRecord[] = [];

  append(record: MetricsRecord): MetricsRecord {
    const frozen = Object.isFrozen(record) ? record : Object.freeze({ ...record });
    this.records.push(frozen);
    return frozen;
  }

  /**
   * Snapshot of the log in append order
   */
  entries(): readonly MetricsRecord[] {
    return [...this.records];
  }

  get size(): number {
    return this.records.length;
  }

  latest(): MetricsRecord | undefined {
    return this.records[this.records.length - 1];
  }

  summary(): MetricsSummary {
    const runs = this.records.length;
    let succeededRuns = 0;
    let totalTokens = 0;
    let totalElapsed = 0;
    for (const record of this.records) {
      if (record.status === 'succeeded') succeededRuns++;
      totalTokens += record.tokensUsed;
      totalElapsed += record.elapsedSeconds;
    }
    return {
      runs,
      succeededRuns,
      totalTokens,
      averageElapsedSeconds: runs === 0 ? 0 : totalElapsed / runs
    };
  }
}
