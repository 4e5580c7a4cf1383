/**
 * LLM Client
 *
 * Unified client for Anthropic and OpenAI LLM providers.
 * Resolves per-request defaults, retries transient failures and measures latency.
 */

import type { Logger } from 'pino';
import { AppError, ErrorHandler, createSilentLogger } from '../errors';
import { createChatProvider, toProviderError } from './providers';
import type {
  ChatProvider,
  LLMConfig,
  LLMRequest,
  LLMResponse,
  ProviderRequest,
  TextGenerator
} from './types';

export interface LLMClientDeps {
  /** Defaults to the SDK adapter for config.provider */
  provider?: ChatProvider;
  logger?: Logger;
}

/**
 * Unified LLM client supporting both Anthropic and OpenAI
 */
export class LLMClient implements TextGenerator {
  private readonly config: LLMConfig;
  private readonly provider: ChatProvider;
  private readonly logger: Logger;

  constructor(config: LLMConfig, deps: LLMClientDeps = {}) {
    this.config = { ...config };
    this.provider = deps.provider ?? createChatProvider(config);
    this.logger = deps.logger ?? createSilentLogger();
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const userMessage = request.messages.find(m => m.role === 'user');
    if (!userMessage || userMessage.content.trim().length === 0) {
      throw ErrorHandler.createValidationError(
        'The prompt is empty.',
        'Request must include a non-empty user message'
      );
    }

    const resolved: ProviderRequest = {
      messages: request.messages,
      systemPrompt: request.systemPrompt ?? '',
      temperature: request.temperature ?? this.config.temperature,
      maxTokens: request.maxTokens ?? this.config.maxTokens,
      model: request.model ?? this.config.model
    };

    const start = Date.now();
    let attempts = 0;
    this.logger.debug(
      {
        provider: this.provider.name,
        model: resolved.model,
        temperature: resolved.temperature,
        maxTokens: resolved.maxTokens,
        messages: resolved.messages.length
      },
      'LLM request start'
    );

    try {
      const response = await ErrorHandler.retry(
        async () => {
          attempts++;
          try {
            return await this.provider.send(resolved);
          } catch (error) {
            throw toProviderError(error, this.provider.name);
          }
        },
        {
          maxAttempts: this.config.maxAttempts,
          delayMs: this.config.retryDelayMs,
          shouldRetry: error => ErrorHandler.isRetryable(error),
          onRetry: (error, attempt) => {
            this.logger.warn(
              { attempt, code: error instanceof AppError ? error.code : undefined, err: error },
              'LLM request failed, retrying'
            );
          }
        }
      );

      const latencyMs = Date.now() - start;
      this.logger.info(
        {
          model: response.model,
          finishReason: response.finishReason ?? 'unknown',
          latencyMs,
          attempts,
          totalTokens: response.usage?.totalTokens
        },
        'LLM request end'
      );

      return { ...response, latencyMs, attempts };
    } catch (error) {
      const appError = toProviderError(error, this.provider.name);
      this.logger.error(
        { code: appError.code, attempts, latencyMs: Date.now() - start, details: appError.technicalDetails },
        'LLM request failed'
      );
      throw appError;
    }
  }
}
