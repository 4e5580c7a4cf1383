/**
 * Validation Schemas
 *
 * Zod schemas for the generation request and for the JSON payloads the
 * HTTP API returns to the web client.
 */

import { z } from 'zod';

/**
 * Length caps applied to a generation request
 */
export interface RequestLimits {
  maxCompanyLength: number;
  maxJobDescriptionLength: number;
}

export const DEFAULT_REQUEST_LIMITS: RequestLimits = {
  maxCompanyLength: 200,
  maxJobDescriptionLength: 20000
};

/**
 * Required text field: present, a string, not blank, within the cap.
 * Values are kept verbatim (no trimming) so prompts embed exactly what was typed.
 */
function requiredText(label: string, maxLength: number) {
  return z
    .string({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be text`
    })
    .max(maxLength, `${label} must be at most ${maxLength} characters`)
    .refine(value => value.trim().length > 0, `${label} is required`);
}

/**
 * Generation request schema for the given limits
 */
export function createGenerationRequestSchema(limits: RequestLimits = DEFAULT_REQUEST_LIMITS) {
  return z.object({
    company: requiredText('Company name', limits.maxCompanyLength),
    jobDescription: requiredText('Job description', limits.maxJobDescriptionLength),
    wantCoverLetter: z.boolean({ invalid_type_error: 'wantCoverLetter must be a boolean' }).default(false)
  });
}

// =============================================================================
// API payloads
// =============================================================================

export const RunStatusSchema = z.enum(['succeeded', 'generation_failed', 'compilation_failed']);

export const MetricsRecordSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  tokensUsed: z.number(),
  promptTokens: z.number(),
  completionTokens: z.number(),
  elapsedSeconds: z.number(),
  modelName: z.string(),
  company: z.string(),
  coverLetter: z.boolean(),
  status: RunStatusSchema
});

export const MetricsSummarySchema = z.object({
  runs: z.number(),
  succeededRuns: z.number(),
  totalTokens: z.number(),
  averageElapsedSeconds: z.number()
});

export const TokenUsageSchema = z.object({
  promptTokens: z.number(),
  completionTokens: z.number(),
  totalTokens: z.number()
});

export const DocumentPayloadSchema = z.object({
  kind: z.enum(['resume', 'cover-letter']),
  latexSource: z.string(),
  pdfBase64: z.string()
});

export const GenerationResultPayloadSchema = z.object({
  resume: DocumentPayloadSchema,
  coverLetter: DocumentPayloadSchema.optional(),
  tokensUsed: z.number(),
  usage: TokenUsageSchema,
  elapsedSeconds: z.number(),
  modelName: z.string(),
  stageSeconds: z.object({
    resumeGeneration: z.number(),
    coverLetterGeneration: z.number().optional(),
    compilation: z.number()
  })
});

export const FieldErrorSchema = z.object({
  field: z.string(),
  message: z.string()
});

export const GenerateSuccessSchema = z.object({
  success: z.literal(true),
  result: GenerationResultPayloadSchema,
  record: MetricsRecordSchema
});

export const GenerateFailureSchema = z.object({
  success: z.literal(false),
  stage: z.enum(['validation', 'generation', 'compilation']),
  error: z.string(),
  code: z.string(),
  suggestedAction: z.string().optional(),
  details: z.array(FieldErrorSchema).optional(),
  latexSource: z.string().optional(),
  coverLetterSource: z.string().optional(),
  document: z.enum(['resume', 'cover-letter']).optional(),
  compilerLog: z.string().optional(),
  record: MetricsRecordSchema.optional()
});

export const GenerateResponseSchema = z.discriminatedUnion('success', [
  GenerateSuccessSchema,
  GenerateFailureSchema
]);

export const MetricsResponseSchema = z.object({
  success: z.literal(true),
  records: z.array(MetricsRecordSchema),
  summary: MetricsSummarySchema
});

export const StatusResponseSchema = z.object({
  success: z.literal(true),
  provider: z.enum(['anthropic', 'openai']),
  model: z.string(),
  compiler: z.string(),
  limits: z.object({
    maxCompanyLength: z.number(),
    maxJobDescriptionLength: z.number()
  })
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
  message: z.string().optional()
});
