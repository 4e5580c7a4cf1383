/**
 * Generate route - runs one resume (and optional cover letter) generation
 * for the calling session.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { AppError } from '../../shared/errors';
import type { PipelineOutcome } from '../../shared/pipeline';
import type { GeneratedDocument, GenerationResult } from '../../shared/types';
import type {
  DocumentPayload,
  GenerateFailure,
  GenerateSuccess,
  GenerationResultPayload
} from '../../shared/types/api';
import { FieldErrorSchema } from '../../shared/validation/schemas';
import { ApiError, asyncHandler, statusForCategory } from '../middleware/errorHandler';
import { getSessionId, requireSession } from '../middleware/session';
import type { Services } from '../services';

const FieldErrorsSchema = z.array(FieldErrorSchema);

function toDocumentPayload(document: GeneratedDocument): DocumentPayload {
  return {
    kind: document.kind,
    latexSource: document.latexSource,
    pdfBase64: document.pdf.toString('base64')
  };
}

export function toResultPayload(result: GenerationResult): GenerationResultPayload {
  return {
    resume: toDocumentPayload({ kind: 'resume', latexSource: result.latexSource, pdf: result.pdf }),
    coverLetter: result.coverLetter ? toDocumentPayload(result.coverLetter) : undefined,
    tokensUsed: result.tokensUsed,
    usage: result.usage,
    elapsedSeconds: result.elapsedSeconds,
    modelName: result.modelName,
    stageSeconds: result.stageSeconds
  };
}

function fieldErrors(error: AppError) {
  const parsed = FieldErrorsSchema.safeParse(error.context?.errors);
  return parsed.success ? parsed.data : undefined;
}

/**
 * HTTP status and body for a pipeline outcome
 */
export function toHttpResponse(outcome: PipelineOutcome): { status: number; body: GenerateSuccess | GenerateFailure } {
  if (outcome.status === 'succeeded') {
    return {
      status: 200,
      body: { success: true, result: toResultPayload(outcome.result), record: outcome.record }
    };
  }

  const { error } = outcome;
  return {
    status: statusForCategory(error.category),
    body: {
      success: false,
      stage: outcome.stage,
      error: error.userMessage,
      code: error.code ?? 'unexpected',
      suggestedAction: error.suggestedAction,
      details: fieldErrors(error),
      latexSource: outcome.latexSource,
      coverLetterSource: outcome.coverLetterSource,
      document: outcome.document,
      compilerLog: outcome.compilerLog,
      record: outcome.record
    }
  };
}

export function createGenerateRouter(services: Services): Router {
  const router = Router();

  /**
   * POST /api/generate
   * Body: { company, jobDescription, wantCoverLetter }
   */
  router.post('/', requireSession, asyncHandler(async (req: Request, res: Response) => {
    const sessionId = getSessionId(req);
    const log = services.sessions.tryAcquire(sessionId);
    if (!log) {
      throw new ApiError(409, 'A generation is already running for this session', 'run_in_progress');
    }

    let outcome: PipelineOutcome;
    try {
      outcome = await services.pipeline.run(req.body, log);
    } finally {
      services.sessions.release(sessionId);
    }

    const { status, body } = toHttpResponse(outcome);
    res.status(status).json(body);
  }));

  return router;
}
