/**
 * Shared payloads and a routing fetch fake for the web client tests
 */

import { vi } from 'vitest';
import type { MetricsRecord } from '../../shared/types';
import type { GenerateFailure, GenerateSuccess, MetricsResponse, StatusResponse } from '../../shared/types/api';

export const SESSION = 'session-test-0001';

export const RESUME_SOURCE = '\\documentclass{article}\n\\begin{document}\nTailored for Acme\n\\end{document}';

export const RECORD: MetricsRecord = {
  id: 'run-1',
  timestamp: '2026-01-05T10:15:30.000Z',
  tokensUsed: 1500,
  promptTokens: 1000,
  completionTokens: 500,
  elapsedSeconds: 3.5,
  modelName: 'test-model',
  company: 'Acme',
  coverLetter: false,
  status: 'succeeded'
};

export const SUCCESS: GenerateSuccess = {
  success: true,
  result: {
    resume: { kind: 'resume', latexSource: RESUME_SOURCE, pdfBase64: 'JVBERg==' },
    tokensUsed: 1500,
    usage: { promptTokens: 1000, completionTokens: 500, totalTokens: 1500 },
    elapsedSeconds: 3.5,
    modelName: 'test-model',
    stageSeconds: { resumeGeneration: 2.5, compilation: 1 }
  },
  record: RECORD
};

export const COMPILATION_FAILURE: GenerateFailure = {
  success: false,
  stage: 'compilation',
  error: 'The generated LaTeX did not compile.',
  code: 'compile-error',
  suggestedAction: 'Review the compiler log and the LaTeX source below, then regenerate.',
  latexSource: RESUME_SOURCE,
  document: 'resume',
  compilerLog: './resume.tex:3: Undefined control sequence.',
  record: { ...RECORD, status: 'compilation_failed' }
};

export const STATUS: StatusResponse = {
  success: true,
  provider: 'openai',
  model: 'test-model',
  compiler: 'pdflatex',
  limits: { maxCompanyLength: 200, maxJobDescriptionLength: 20000 }
};

export function metricsResponse(records: MetricsRecord[]): MetricsResponse {
  return {
    success: true,
    records,
    summary: {
      runs: records.length,
      succeededRuns: records.filter(record => record.status === 'succeeded').length,
      totalTokens: records.reduce((total, record) => total + record.tokensUsed, 0),
      averageElapsedSeconds: 0
    }
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

export function requestUrl(input: RequestInfo | URL): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * fetch fake answering by path; unknown paths get a JSON 404
 */
export function routingFetch(routes: Record<string, () => Response>) {
  return vi.fn(async (input: RequestInfo | URL, _init?: RequestInit): Promise<Response> => {
    const route = routes[requestUrl(input)];
    return route ? route() : jsonResponse({ error: 'Not found', code: 'not_found' }, 404);
  });
}
