/**
 * Display helpers shared by the result and metrics views.
 */

import type { RunStatus } from '../../shared/types';

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

export function formatTokens(tokens: number): string {
  return tokens.toLocaleString('en-US');
}

/**
 * HH:MM:SS of an ISO timestamp, in UTC so every viewer sees the same value
 */
export function formatTime(iso: string): string {
  return iso.slice(11, 19);
}

const STATUS_LABELS: Record<RunStatus, string> = {
  succeeded: 'Succeeded',
  generation_failed: 'Generation failed',
  compilation_failed: 'Compilation failed'
};

export function formatStatus(status: RunStatus): string {
  return STATUS_LABELS[status];
}

export function pdfDataUrl(base64: string): string {
  return `data:application/pdf;base64,${base64}`;
}

export function texDataUrl(source: string): string {
  return `data:application/x-tex;charset=utf-8,${encodeURIComponent(source)}`;
}

/**
 * Download file name for a generated document
 */
export function documentFileName(company: string, kind: string, extension: 'pdf' | 'tex'): string {
  const slug = company
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `${slug || 'company'}-${kind}.${extension}`;
}
