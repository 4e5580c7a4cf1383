/**
 * API Client for the Resume Tailor web application
 *
 * Features:
 * - Automatic JSON parsing, validated against the shared zod schemas
 * - Session id header on every call (scopes the server-side metrics log)
 * - Errors surfaced as ApiRequestError with the server's message
 */

import type { z } from 'zod';
import {
  ErrorResponseSchema,
  GenerateResponseSchema,
  MetricsResponseSchema,
  StatusResponseSchema
} from '../../shared/validation/schemas';
import {
  SESSION_HEADER,
  type GenerateRequestBody,
  type GenerateResponse,
  type MetricsResponse,
  type StatusResponse
} from '../../shared/types/api';

// ============================================================================
// Configuration
// ============================================================================

const API_BASE_URL = '/api';

const SESSION_STORAGE_KEY = 'resume-tailor.session-id';

/**
 * Session id for this browser tab, created on first use
 */
export function getOrCreateSessionId(storage: Storage | undefined = globalThis.sessionStorage): string {
  const existing = storage?.getItem(SESSION_STORAGE_KEY);
  if (existing) {
    return existing;
  }
  const created = globalThis.crypto.randomUUID();
  storage?.setItem(SESSION_STORAGE_KEY, created);
  return created;
}

// ============================================================================
// Types
// ============================================================================

/**
 * Error thrown for failed requests that carry no generation outcome
 */
export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

export interface ApiClientOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  sessionId?: () => string;
}

/**
 * Statuses whose body is a generation outcome rather than an error
 */
const GENERATE_OUTCOME_STATUSES = new Set([200, 400, 422, 500, 502]);

// ============================================================================
// API Client Class
// ============================================================================

export class ApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sessionId: () => string;

  constructor(options: ApiClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? API_BASE_URL;
    this.fetchImpl = options.fetchImpl ??
      ((input: RequestInfo | URL, init?: RequestInit) => globalThis.fetch(input, init));
    this.sessionId = options.sessionId ?? (() => getOrCreateSessionId());
  }

  /**
   * Base fetch wrapper with session header, schema validation and error handling
   */
  private async request<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: RequestInit = {},
    acceptStatus: (status: number) => boolean = status => status >= 200 && status < 300
  ): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
        ...init,
        headers: {
          'Content-Type': 'application/json',
          [SESSION_HEADER]: this.sessionId(),
        },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ApiRequestError(`Could not reach the server: ${reason}`, 0, 'network');
    }

    const body = await this.readJson(response);

    if (acceptStatus(response.status)) {
      const parsed = schema.safeParse(body);
      if (parsed.success) {
        return parsed.data;
      }
    }

    const error = ErrorResponseSchema.safeParse(body);
    if (error.success) {
      throw new ApiRequestError(error.data.error, response.status, error.data.code);
    }
    throw new ApiRequestError(
      `Unexpected response from server (HTTP ${response.status})`,
      response.status
    );
  }

  private async readJson(response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type');
    if (!contentType?.includes('application/json')) {
      return undefined;
    }
    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ApiRequestError(`Malformed response from server: ${reason}`, response.status);
    }
  }

  /**
   * Run one generation. Resolves with the outcome for successes and for
   * validation, provider and compilation failures.
   */
  generate(body: GenerateRequestBody): Promise<GenerateResponse> {
    return this.request(
      '/generate',
      GenerateResponseSchema,
      { method: 'POST', body: JSON.stringify(body) },
      status => GENERATE_OUTCOME_STATUSES.has(status)
    );
  }

  getMetrics(): Promise<MetricsResponse> {
    return this.request('/metrics', MetricsResponseSchema);
  }

  getStatus(): Promise<StatusResponse> {
    return this.request('/status', StatusResponseSchema);
  }
}

/**
 * Default API client instance
 */
export const api = new ApiClient();

export default api;
