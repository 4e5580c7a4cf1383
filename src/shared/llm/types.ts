/**
 * LLM Types
 *
 * Type definitions for LLM configuration and responses.
 * Supports both Anthropic and OpenAI providers.
 */

import type { TokenUsage } from '../types';

/**
 * Supported LLM providers
 */
export type LLMProvider = 'anthropic' | 'openai';

/**
 * LLM configuration
 */
export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeout: number; // milliseconds
  maxAttempts: number; // including the first call
  retryDelayMs: number;
}

/**
 * Default configurations for each provider
 */
export const DEFAULT_LLM_CONFIG: Record<LLMProvider, Omit<LLMConfig, 'apiKey'>> = {
  anthropic: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    temperature: 0.25,
    maxTokens: 4096,
    timeout: 120000,
    maxAttempts: 2,
    retryDelayMs: 1000
  },
  openai: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    temperature: 0.25,
    maxTokens: 4096,
    timeout: 120000,
    maxAttempts: 2,
    retryDelayMs: 1000
  }
};

/**
 * Message role for chat-based LLM interactions
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Message structure for LLM interactions
 */
export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * LLM request parameters
 */
export interface LLMRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  model?: string; // Override the default model for this request
}

/**
 * Fully resolved request handed to a provider
 */
export interface ProviderRequest {
  messages: LLMMessage[];
  systemPrompt: string;
  temperature: number;
  maxTokens: number;
  model: string;
}

/**
 * What a provider returns for one call
 */
export interface ProviderResponse {
  content: string;
  model: string;
  usage?: TokenUsage;
  finishReason?: string;
}

/**
 * LLM response structure
 */
export interface LLMResponse extends ProviderResponse {
  latencyMs: number;
  attempts: number;
}

/**
 * One provider SDK behind a common call shape
 */
export interface ChatProvider {
  readonly name: LLMProvider;
  send(request: ProviderRequest): Promise<ProviderResponse>;
}

/**
 * Anything that turns a prompt into text; implemented by LLMClient and by test fakes
 */
export interface TextGenerator {
  complete(request: LLMRequest): Promise<LLMResponse>;
}
