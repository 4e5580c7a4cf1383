/**
 * Environment Configuration
 *
 * Loads and validates environment variables, providing a typed configuration object.
 * Every problem is collected and reported at once through a ConfigurationError,
 * which the server turns into a fatal log line at startup.
 *
 * Usage:
 *   const config = loadConfig();
 *   console.log(config.server.port);
 */

import 'dotenv/config';
import * as path from 'path';
import { DEFAULT_LLM_CONFIG, type LLMConfig, type LLMProvider } from '../shared/llm/types';
import { DEFAULT_REQUEST_LIMITS, type RequestLimits } from '../shared/validation/schemas';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';

export type Env = Record<string, string | undefined>;

export interface ServerConfig {
  port: number;
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  /** Built web client; served when the directory exists */
  staticDir: string;
}

export interface LLMSettings {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  maxAttempts: number;
}

export interface LatexConfig {
  command: string;
  timeoutMs: number;
}

export interface TemplatesConfig {
  baseResumePath: string;
  /** null when PROFILE_PATH is set to an empty value */
  profilePath: string | null;
}

export interface CorsConfig {
  origins: string[];
}

export interface Config {
  server: ServerConfig;
  llm: LLMSettings;
  latex: LatexConfig;
  templates: TemplatesConfig;
  /** Output directory for generated .tex/.pdf copies; null disables saving */
  artifactsDir: string | null;
  limits: RequestLimits;
  cors: CorsConfig;
}

// =============================================================================
// Validation Helpers
// =============================================================================

export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(
      'Configuration validation failed:\n' +
      problems.map(p => `  - ${p}`).join('\n')
    );
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * Reads variables from one environment map, collecting problems instead of throwing
 */
class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  /**
   * Get an environment variable, empty string when unset
   */
  get(key: string): string {
    return this.env[key]?.trim() ?? '';
  }

  /**
   * Get an environment variable with a default value
   */
  withDefault(key: string, defaultValue: string): string {
    return this.get(key) || defaultValue;
  }

  /**
   * Get a positive integer environment variable
   */
  positiveInt(key: string, defaultValue: number): number {
    const value = this.get(key);
    if (!value) return defaultValue;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      this.problems.push(`Invalid numeric value for ${key}: "${value}". Expected a positive integer.`);
      return defaultValue;
    }
    return parsed;
  }
}

/**
 * Parse CORS origins from comma-separated string
 */
export function parseCorsOrigins(value: string): string[] {
  if (!value) return [];
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

/**
 * Validate node environment
 */
export function parseNodeEnv(value: string | undefined): NodeEnv {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development'; // default
}

function parseLLMProvider(value: string): LLMProvider | undefined {
  if (value === 'openai' || value === 'anthropic') return value;
  return undefined;
}

// =============================================================================
// Configuration Loader
// =============================================================================

export function loadConfig(env: Env = process.env): Config {
  const reader = new EnvReader(env);
  const nodeEnv = parseNodeEnv(reader.get('NODE_ENV'));

  // Load LLM keys
  const anthropicApiKey = reader.get('ANTHROPIC_API_KEY');
  const openaiApiKey = reader.get('OPENAI_API_KEY');
  const hasAnthropicKey = !!anthropicApiKey;
  const hasOpenaiKey = !!openaiApiKey;

  // Determine LLM provider - default to openai unless only an Anthropic key exists
  const providerSetting = reader.get('LLM_PROVIDER');
  let provider: LLMProvider = hasAnthropicKey && !hasOpenaiKey ? 'anthropic' : 'openai';
  if (providerSetting) {
    const parsed = parseLLMProvider(providerSetting);
    if (parsed) {
      provider = parsed;
    } else {
      reader.problems.push(`Invalid LLM_PROVIDER: "${providerSetting}". Expected "openai" or "anthropic".`);
    }
  }

  const apiKey = provider === 'anthropic' ? anthropicApiKey : openaiApiKey;
  if (!apiKey) {
    reader.problems.push(
      `Missing required environment variable: ${provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY'}. ` +
      'Please set it in your .env file or environment.'
    );
  }

  const baseResumePath = reader.withDefault('BASE_RESUME_PATH', './data/base-resume.tex');
  const profileSetting = env.PROFILE_PATH;
  const artifactsDir = reader.get('ARTIFACTS_DIR');

  const config: Config = {
    server: {
      port: reader.positiveInt('PORT', 3001),
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',
      staticDir: path.resolve(reader.withDefault('STATIC_DIR', './dist/frontend')),
    },

    llm: {
      provider,
      apiKey,
      model: reader.withDefault('LLM_MODEL', DEFAULT_LLM_CONFIG[provider].model),
      maxTokens: reader.positiveInt('LLM_MAX_TOKENS', DEFAULT_LLM_CONFIG[provider].maxTokens),
      timeoutMs: reader.positiveInt('LLM_TIMEOUT_MS', DEFAULT_LLM_CONFIG[provider].timeout),
      maxAttempts: reader.positiveInt('LLM_MAX_ATTEMPTS', DEFAULT_LLM_CONFIG[provider].maxAttempts),
    },

    latex: {
      command: reader.withDefault('LATEX_COMMAND', 'pdflatex'),
      timeoutMs: reader.positiveInt('LATEX_TIMEOUT_MS', 60000),
    },

    templates: {
      baseResumePath: path.resolve(baseResumePath),
      profilePath: profileSetting !== undefined && profileSetting.trim() === ''
        ? null
        : path.resolve(reader.withDefault('PROFILE_PATH', './data/profile.json')),
    },

    artifactsDir: artifactsDir ? path.resolve(artifactsDir) : null,

    limits: {
      maxCompanyLength: reader.positiveInt('MAX_COMPANY_LENGTH', DEFAULT_REQUEST_LIMITS.maxCompanyLength),
      maxJobDescriptionLength: reader.positiveInt(
        'MAX_JOB_DESCRIPTION_LENGTH',
        DEFAULT_REQUEST_LIMITS.maxJobDescriptionLength
      ),
    },

    cors: {
      origins: parseCorsOrigins(
        reader.withDefault('CORS_ORIGINS', 'http://localhost:5173,http://localhost:3001')
      ),
    },
  };

  if (reader.problems.length > 0) {
    throw new ConfigurationError(reader.problems);
  }

  return config;
}

/**
 * LLM client configuration derived from the server configuration
 */
export function toLLMConfig(config: Config): LLMConfig {
  return {
    ...DEFAULT_LLM_CONFIG[config.llm.provider],
    provider: config.llm.provider,
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
    timeout: config.llm.timeoutMs,
    maxAttempts: config.llm.maxAttempts,
  };
}
