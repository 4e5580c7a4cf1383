/**
 * API payload types, inferred from the schemas the web client validates against.
 */

import type { z } from 'zod';
import type {
  DocumentPayloadSchema,
  GenerateFailureSchema,
  GenerateResponseSchema,
  GenerateSuccessSchema,
  GenerationResultPayloadSchema,
  MetricsResponseSchema,
  StatusResponseSchema
} from '../validation/schemas';

export type DocumentPayload = z.infer<typeof DocumentPayloadSchema>;
export type GenerationResultPayload = z.infer<typeof GenerationResultPayloadSchema>;
export type GenerateSuccess = z.infer<typeof GenerateSuccessSchema>;
export type GenerateFailure = z.infer<typeof GenerateFailureSchema>;
export type GenerateResponse = z.infer<typeof GenerateResponseSchema>;
export type MetricsResponse = z.infer<typeof MetricsResponseSchema>;
export type StatusResponse = z.infer<typeof StatusResponseSchema>;

/**
 * Body of POST /api/generate
 */
export interface GenerateRequestBody {
  company: string;
  jobDescription: string;
  wantCoverLetter: boolean;
}

/**
 * Header carrying the browser session id that scopes the metrics log
 */
export const SESSION_HEADER = 'x-session-id';
