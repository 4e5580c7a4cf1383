/**
 * Pipeline Types
 */

import type { AppError } from '../errors';
import type { DocumentKind, GenerationResult, MetricsRecord } from '../types';
import type { CompileOutcome } from '../latex';

export type PipelineStage = 'validation' | 'generation' | 'compilation';

export type PipelineOutcome =
  | {
      status: 'succeeded';
      result: GenerationResult;
      record: MetricsRecord;
    }
  | {
      status: 'failed';
      stage: PipelineStage;
      error: AppError;
      /** Set once the resume has been generated */
      latexSource?: string;
      coverLetterSource?: string;
      /** Which document failed to compile */
      document?: DocumentKind;
      compilerLog?: string;
      /** Present when the run got at least one provider response */
      record?: MetricsRecord;
    };

/**
 * Anything that compiles LaTeX; implemented by LatexCompiler
 */
export interface DocumentCompiler {
  compile(source: string, jobName: string): Promise<CompileOutcome>;
}

export interface GenerationTemperatures {
  resume: number;
  coverLetter: number;
}

export const DEFAULT_TEMPERATURES: GenerationTemperatures = {
  resume: 0.25,
  coverLetter: 0.3
};
