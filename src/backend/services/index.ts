/**
 * Services index - wires the shared modules into the objects the Express
 * routes use. Everything is created once at startup from the validated config.
 */

import { LLMClient, type ResumeTemplates, type TextGenerator } from '../../shared/llm';
import { LatexCompiler } from '../../shared/latex';
import { MetricsRecorder } from '../../shared/metrics';
import { ArtifactStore, GenerationPipeline, type DocumentCompiler } from '../../shared/pipeline';
import { GenerationRequestValidator } from '../../shared/validation';
import { toLLMConfig, type Config } from '../config';
import { loggers } from '../logger';
import { SessionRegistry } from './sessionRegistry';
import { loadTemplates } from './templates';

export { SessionRegistry } from './sessionRegistry';
export { loadTemplates } from './templates';

export interface Services {
  config: Config;
  pipeline: GenerationPipeline;
  sessions: SessionRegistry;
}

/**
 * Replacements for the external collaborators, used by tests
 */
export interface ServiceOverrides {
  llm?: TextGenerator;
  compiler?: DocumentCompiler;
  templates?: ResumeTemplates;
}

export function createServices(config: Config, overrides: ServiceOverrides = {}): Services {
  const llm = overrides.llm ?? new LLMClient(toLLMConfig(config), { logger: loggers.llm });
  const compiler = overrides.compiler ?? new LatexCompiler({
    command: config.latex.command,
    timeoutMs: config.latex.timeoutMs,
    logger: loggers.latex
  });

  const pipeline = new GenerationPipeline({
    llm,
    compiler,
    templates: overrides.templates ?? loadTemplates(config.templates),
    validator: new GenerationRequestValidator(config.limits),
    recorder: new MetricsRecorder(),
    artifacts: config.artifactsDir ? new ArtifactStore(config.artifactsDir) : undefined,
    logger: loggers.pipeline
  });

  return {
    config,
    pipeline,
    sessions: new SessionRegistry()
  };
}
