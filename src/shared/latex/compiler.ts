/**
 * LaTeX Compiler
 *
 * Compiles one LaTeX document to PDF with an external compiler (pdflatex by
 * default). Every compilation gets its own temporary directory, removed on
 * every exit path. Failures come back as values carrying the compiler log
 * verbatim; compile() only rejects when the temp directory itself fails.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Logger } from 'pino';
import { createSilentLogger, type CompilationErrorCode } from '../errors';
import { SpawnProcessRunner, type ProcessRunner } from './processRunner';
import { withTempDir } from './tempDir';

export interface LatexCompilerOptions {
  command: string;
  timeoutMs: number;
  /** Compiler logs longer than this keep only their tail */
  maxLogChars?: number;
  runner?: ProcessRunner;
  logger?: Logger;
}

export type CompileOutcome =
  | { ok: true; pdf: Buffer; log: string }
  | { ok: false; reason: CompilationErrorCode; log: string; exitCode: number | null };

export const DEFAULT_MAX_LOG_CHARS = 50_000;

const JOB_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Keep the tail of a long log; pdflatex reports the fatal error last
 */
export function capLog(log: string, maxChars: number): string {
  if (log.length <= maxChars) {
    return log;
  }
  return log.slice(log.length - maxChars);
}

async function readIfExists(filePath: string): Promise<Buffer | undefined> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

export class LatexCompiler {
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly maxLogChars: number;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;

  constructor(options: LatexCompilerOptions) {
    this.command = options.command;
    this.timeoutMs = options.timeoutMs;
    this.maxLogChars = options.maxLogChars ?? DEFAULT_MAX_LOG_CHARS;
    this.runner = options.runner ?? new SpawnProcessRunner();
    this.logger = options.logger ?? createSilentLogger();
  }

  getCommand(): string {
    return this.command;
  }

  async compile(source: string, jobName = 'document'): Promise<CompileOutcome> {
    if (!JOB_NAME_PATTERN.test(jobName)) {
      throw new Error(`Invalid LaTeX job name: ${jobName}`);
    }

    const start = Date.now();
    const outcome = await withTempDir('latex-', async dir => {
      const texFile = `${jobName}.tex`;
      await fs.writeFile(path.join(dir, texFile), source, 'utf-8');

      const run = await this.runner.run(
        this.command,
        [
          '-interaction=nonstopmode',
          '-halt-on-error',
          '-file-line-error',
          `-output-directory=${dir}`,
          texFile
        ],
        { cwd: dir, timeoutMs: this.timeoutMs }
      );

      if (run.kind === 'spawn-failed') {
        const reason: CompilationErrorCode =
          run.code === 'ENOENT' || run.code === 'EACCES' ? 'compiler-not-found' : 'compile-error';
        return this.failure(reason, `${this.command}: ${run.message}`, null);
      }

      const log = capLog(run.stdout + run.stderr, this.maxLogChars);
      if (run.timedOut) {
        return this.failure('timeout', log, run.exitCode);
      }
      // A partial PDF after a non-zero exit is never returned
      if (run.exitCode !== 0) {
        return this.failure('compile-error', log, run.exitCode);
      }

      const pdf = await readIfExists(path.join(dir, `${jobName}.pdf`));
      if (!pdf || pdf.length === 0) {
        return this.failure('no-output', log, run.exitCode);
      }

      const success: CompileOutcome = { ok: true, pdf, log };
      return success;
    });

    this.logger.info(
      {
        jobName,
        ok: outcome.ok,
        reason: outcome.ok ? undefined : outcome.reason,
        durationMs: Date.now() - start
      },
      'LaTeX compilation finished'
    );
    return outcome;
  }

  private failure(reason: CompilationErrorCode, log: string, exitCode: number | null): CompileOutcome {
    return { ok: false, reason, log, exitCode };
  }
}
