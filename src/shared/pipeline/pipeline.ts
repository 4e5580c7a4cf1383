/**
 * Generation Pipeline
 *
 * Runs one generation request to completion against one session's metrics log:
 * validate → compose → generate resume (→ repair once) → cover letter →
 * compile → save artifacts → record metrics.
 *
 * run() never rejects. Every failure comes back as a PipelineOutcome, and a
 * run that received at least one provider response is recorded exactly once.
 */

import type { Logger } from 'pino';
import { ErrorHandler, createSilentLogger } from '../errors';
import {
  LatexOutputParser,
  billedEmptyReply,
  composeCoverLetterPrompt,
  composeRepairPrompt,
  composeResumePrompt,
  COVER_LETTER_SYSTEM_PROMPT,
  RESUME_SYSTEM_PROMPT,
  type LLMResponse,
  type ResumeTemplates,
  type TextGenerator
} from '../llm';
import { MetricsLog, MetricsRecorder, addUsage } from '../metrics';
import type {
  DocumentKind,
  GeneratedDocument,
  GenerationRequest,
  GenerationResult,
  MetricsRecord,
  RunStatus,
  TokenUsage
} from '../types';
import { GenerationRequestValidator } from '../validation';
import type { ArtifactStore } from './artifactStore';
import {
  DEFAULT_TEMPERATURES,
  type DocumentCompiler,
  type GenerationTemperatures,
  type PipelineOutcome,
  type PipelineStage
} from './types';

export interface GenerationPipelineDeps {
  llm: TextGenerator;
  compiler: DocumentCompiler;
  templates: ResumeTemplates;
  validator?: GenerationRequestValidator;
  recorder?: MetricsRecorder;
  parser?: LatexOutputParser;
  artifacts?: ArtifactStore;
  temperatures?: GenerationTemperatures;
  logger?: Logger;
  /** Milliseconds clock used for elapsed times */
  clock?: () => number;
}

const ZERO_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

/**
 * Mutable bookkeeping of one run
 */
class RunState {
  stage: PipelineStage = 'generation';
  usages: TokenUsage[] = [];
  responses = 0;
  modelName = '';
  resumeSource?: string;
  coverLetterSource?: string;

  constructor(readonly startedAt: number) {}

  get usage(): TokenUsage {
    return addUsage(...this.usages);
  }
}

export class GenerationPipeline {
  private readonly llm: TextGenerator;
  private readonly compiler: DocumentCompiler;
  private readonly templates: ResumeTemplates;
  private readonly validator: GenerationRequestValidator;
  private readonly recorder: MetricsRecorder;
  private readonly parser: LatexOutputParser;
  private readonly artifacts?: ArtifactStore;
  private readonly temperatures: GenerationTemperatures;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(deps: GenerationPipelineDeps) {
    this.llm = deps.llm;
    this.compiler = deps.compiler;
    this.templates = deps.templates;
    this.validator = deps.validator ?? new GenerationRequestValidator();
    this.recorder = deps.recorder ?? new MetricsRecorder();
    this.parser = deps.parser ?? new LatexOutputParser();
    this.artifacts = deps.artifacts;
    this.temperatures = deps.temperatures ?? DEFAULT_TEMPERATURES;
    this.logger = deps.logger ?? createSilentLogger();
    this.clock = deps.clock ?? Date.now;
  }

  getValidator(): GenerationRequestValidator {
    return this.validator;
  }

  async run(input: unknown, log: MetricsLog): Promise<PipelineOutcome> {
    let request: GenerationRequest;
    try {
      request = this.validator.parse(input);
    } catch (error) {
      const appError = ErrorHandler.toAppError(error);
      ErrorHandler.logError(appError, this.logger);
      return { status: 'failed', stage: 'validation', error: appError };
    }

    const state = new RunState(this.clock());
    this.logger.info(
      {
        company: request.company,
        jobDescriptionLength: request.jobDescription.length,
        wantCoverLetter: request.wantCoverLetter
      },
      'Generation started'
    );

    try {
      return await this.execute(request, state, log);
    } catch (error) {
      const appError = ErrorHandler.toAppError(error, { stage: state.stage });
      ErrorHandler.logError(appError, this.logger);
      const record = state.responses > 0
        ? this.recordRun(log, request, state, state.stage === 'compilation' ? 'compilation_failed' : 'generation_failed')
        : undefined;
      return {
        status: 'failed',
        stage: state.stage,
        error: appError,
        latexSource: state.resumeSource,
        coverLetterSource: state.coverLetterSource,
        record
      };
    }
  }

  private async execute(request: GenerationRequest, state: RunState, log: MetricsLog): Promise<PipelineOutcome> {
    // 1. Resume
    let stageStart = this.clock();
    const resumeSource = await this.generateDocument(
      state,
      'resume',
      composeResumePrompt(request, this.templates),
      RESUME_SYSTEM_PROMPT,
      this.temperatures.resume
    );
    state.resumeSource = resumeSource;
    const resumeGeneration = this.secondsSince(stageStart);

    // 2. Cover letter, written from the tailored resume
    let coverLetterGeneration: number | undefined;
    if (request.wantCoverLetter) {
      stageStart = this.clock();
      state.coverLetterSource = await this.generateDocument(
        state,
        'cover-letter',
        composeCoverLetterPrompt(request, this.templates, resumeSource),
        COVER_LETTER_SYSTEM_PROMPT,
        this.temperatures.coverLetter
      );
      coverLetterGeneration = this.secondsSince(stageStart);
    }

    // 3. Compile
    state.stage = 'compilation';
    stageStart = this.clock();
    const documents: GeneratedDocument[] = [];
    const sources: Array<[DocumentKind, string | undefined]> = [
      ['resume', resumeSource],
      ['cover-letter', state.coverLetterSource]
    ];
    for (const [kind, source] of sources) {
      if (source === undefined) continue;

      const outcome = await this.compiler.compile(source, kind);
      if (!outcome.ok) {
        const error = ErrorHandler.createCompilationError(outcome.reason, outcome.log, {
          document: kind,
          exitCode: outcome.exitCode
        });
        ErrorHandler.logError(error, this.logger);
        return {
          status: 'failed',
          stage: 'compilation',
          error,
          latexSource: resumeSource,
          coverLetterSource: state.coverLetterSource,
          document: kind,
          compilerLog: outcome.log,
          record: this.recordRun(log, request, state, 'compilation_failed')
        };
      }
      documents.push({ kind, latexSource: source, pdf: outcome.pdf });
    }
    const compilation = this.secondsSince(stageStart);

    // 4. Optional copies on disk
    await this.saveArtifacts(request, documents);

    const resume = documents.find(document => document.kind === 'resume');
    const coverLetter = documents.find(document => document.kind === 'cover-letter');
    if (!resume) {
      throw new Error('Resume was not compiled');
    }
    const record = this.recordRun(log, request, state, 'succeeded');

    const result: GenerationResult = {
      latexSource: resume.latexSource,
      pdf: resume.pdf,
      tokensUsed: record.tokensUsed,
      usage: state.usage,
      elapsedSeconds: record.elapsedSeconds,
      modelName: record.modelName,
      stageSeconds: { resumeGeneration, coverLetterGeneration, compilation },
      coverLetter
    };

    this.logger.info(
      { company: request.company, tokensUsed: result.tokensUsed, elapsedSeconds: result.elapsedSeconds },
      'Generation succeeded'
    );
    return { status: 'succeeded', result, record };
  }

  /**
   * One model call for a document, plus one repair call when the reply holds no document
   */
  private async generateDocument(
    state: RunState,
    kind: DocumentKind,
    prompt: string,
    systemPrompt: string,
    temperature: number
  ): Promise<string> {
    const reply = await this.callModel(state, prompt, systemPrompt, temperature);
    const parsed = this.parser.tryParse(reply);
    if (parsed !== undefined) {
      return parsed;
    }

    this.logger.warn({ document: kind, replyLength: reply.length }, 'Reply held no LaTeX document, asking for a repair');
    const repaired = await this.callModel(state, composeRepairPrompt(reply), systemPrompt, temperature);
    return this.parser.parse(repaired);
  }

  private async callModel(
    state: RunState,
    prompt: string,
    systemPrompt: string,
    temperature: number
  ): Promise<string> {
    let response: LLMResponse;
    try {
      response = await this.llm.complete({
        messages: [{ role: 'user', content: prompt }],
        systemPrompt,
        temperature
      });
    } catch (error) {
      // An empty reply was still billed
      const billed = billedEmptyReply(error);
      if (billed) {
        state.responses++;
        state.usages.push(billed.usage);
        state.modelName = billed.model;
      }
      throw error;
    }
    state.responses++;
    state.usages.push(response.usage ?? ZERO_USAGE);
    state.modelName = response.model;
    return response.content;
  }

  private async saveArtifacts(request: GenerationRequest, documents: GeneratedDocument[]): Promise<void> {
    if (!this.artifacts) return;
    try {
      const written = await this.artifacts.save(request.company, documents);
      this.logger.info({ files: written }, 'Artifacts saved');
    } catch (error) {
      // The PDFs are still returned to the user
      ErrorHandler.logError(error instanceof Error ? error : new Error(String(error)), this.logger);
    }
  }

  private recordRun(
    log: MetricsLog,
    request: GenerationRequest,
    state: RunState,
    status: RunStatus
  ): MetricsRecord {
    return this.recorder.record(log, {
      request,
      usage: state.usage,
      elapsedSeconds: this.secondsSince(state.startedAt),
      modelName: state.modelName,
      status
    });
  }

  private secondsSince(start: number): number {
    return (this.clock() - start) / 1000;
  }
}
