/**
 * Tests for the session metrics log and recorder
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsLog, MetricsRecorder, addUsage } from '../../shared/metrics';
import type { MetricsRecord } from '../../shared/types';

const request = { company: 'Acme', jobDescription: 'Backend engineer', wantCoverLetter: false };

function fixedRecorder(): MetricsRecorder {
  let next = 0;
  return new MetricsRecorder({
    now: () => new Date('2026-01-05T10:00:00.000Z'),
    newId: () => `run-${++next}`
  });
}

describe('MetricsRecorder', () => {
  let log: MetricsLog;
  let recorder: MetricsRecorder;

  beforeEach(() => {
    log = new MetricsLog();
    recorder = fixedRecorder();
  });

  it('should append one record with the provider usage unchanged', () => {
    const record = recorder.record(log, {
      request,
      usage: { promptTokens: 320, completionTokens: 180, totalTokens: 500 },
      elapsedSeconds: 3.25,
      modelName: 'gpt-4o-mini',
      status: 'succeeded'
    });

    expect(record).toEqual({
      id: 'run-1',
      timestamp: '2026-01-05T10:00:00.000Z',
      tokensUsed: 500,
      promptTokens: 320,
      completionTokens: 180,
      elapsedSeconds: 3.25,
      modelName: 'gpt-4o-mini',
      company: 'Acme',
      coverLetter: false,
      status: 'succeeded'
    });
    expect(log.entries()).toEqual([record]);
  });

  it('should take tokensUsed from the reported total', () => {
    // Providers may count tokens that are neither prompt nor completion
    const record = recorder.record(log, {
      request,
      usage: { promptTokens: 10, completionTokens: 10, totalTokens: 25 },
      elapsedSeconds: 1,
      modelName: 'm',
      status: 'generation_failed'
    });

    expect(record.tokensUsed).toBe(25);
  });

  it('should record the cover letter flag', () => {
    const record = recorder.record(log, {
      request: { ...request, wantCoverLetter: true },
      usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
      elapsedSeconds: 1,
      modelName: 'm',
      status: 'compilation_failed'
    });

    expect(record.coverLetter).toBe(true);
    expect(record.status).toBe('compilation_failed');
  });
});

describe('MetricsLog', () => {
  function entry(id: string, overrides: Partial<MetricsRecord> = {}): MetricsRecord {
    return {
      id,
      timestamp: '2026-01-05T10:00:00.000Z',
      tokensUsed: 100,
      promptTokens: 60,
      completionTokens: 40,
      elapsedSeconds: 2,
      modelName: 'gpt-4o-mini',
      company: 'Acme',
      coverLetter: false,
      status: 'succeeded',
      ...overrides
    };
  }

  it('should keep records in append order', () => {
    const log = new MetricsLog();
    log.append(entry('a'));
    log.append(entry('b'));
    log.append(entry('c'));

    expect(log.entries().map(record => record.id)).toEqual(['a', 'b', 'c']);
    expect(log.size).toBe(3);
    expect(log.latest()?.id).toBe('c');
  });

  it('should freeze appended records', () => {
    const log = new MetricsLog();
    const source = entry('a');
    const stored = log.append(source);

    expect(Object.isFrozen(stored)).toBe(true);
    expect(stored).not.toBe(source);
    expect(stored).toEqual(source);
  });

  it('should not expose its internal array', () => {
    const log = new MetricsLog();
    log.append(entry('a'));

    const snapshot = log.entries();
    expect(Object.isFrozen(snapshot)).toBe(false);
    log.append(entry('b'));

    expect(snapshot).toHaveLength(1);
    expect(log.entries()).toHaveLength(2);
  });

  it('should summarize an empty log as zeros', () => {
    expect(new MetricsLog().summary()).toEqual({
      runs: 0,
      succeededRuns: 0,
      totalTokens: 0,
      averageElapsedSeconds: 0
    });
    expect(new MetricsLog().latest()).toBeUndefined();
  });

  it('should summarize tokens, successes and average duration', () => {
    const log = new MetricsLog();
    log.append(entry('a', { tokensUsed: 500, elapsedSeconds: 3 }));
    log.append(entry('b', { tokensUsed: 250, elapsedSeconds: 5, status: 'compilation_failed' }));

    expect(log.summary()).toEqual({
      runs: 2,
      succeededRuns: 1,
      totalTokens: 750,
      averageElapsedSeconds: 4
    });
  });
});

describe('addUsage', () => {
  it('should sum each counter', () => {
    expect(addUsage(
      { promptTokens: 300, completionTokens: 200, totalTokens: 500 },
      { promptTokens: 400, completionTokens: 100, totalTokens: 500 }
    )).toEqual({ promptTokens: 700, completionTokens: 300, totalTokens: 1000 });
  });

  it('should return zeros for no usage', () => {
    expect(addUsage()).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
  });
});
