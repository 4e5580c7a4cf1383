/**
 * LLM Providers
 *
 * Thin adapters over the Anthropic and OpenAI SDKs. Each adapter maps the
 * SDK's reply onto ProviderResponse and its failures onto provider AppErrors.
 * SDK-level retries are disabled; LLMClient owns the retry policy.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { AppError, ErrorHandler, type ProviderErrorCode } from '../errors';
import type { TokenUsage } from '../types';
import { TokenUsageSchema } from '../validation';
import type {
  ChatProvider,
  LLMConfig,
  LLMMessage,
  ProviderRequest,
  ProviderResponse
} from './types';

/**
 * The part of the OpenAI SDK the adapter uses
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
      ): PromiseLike<OpenAI.Chat.ChatCompletion>;
    };
  };
}

/**
 * The part of the Anthropic SDK the adapter uses
 */
export interface AnthropicMessagesClient {
  messages: {
    create(body: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<Anthropic.Message>;
  };
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE'
]);

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Decide which provider failure an SDK or transport error represents
 */
export function classifyProviderError(error: unknown): ProviderErrorCode {
  // Timeout errors extend the connection errors, so check them first
  if (
    error instanceof OpenAI.APIConnectionTimeoutError ||
    error instanceof Anthropic.APIConnectionTimeoutError
  ) {
    return 'timeout';
  }
  if (error instanceof OpenAI.APIConnectionError || error instanceof Anthropic.APIConnectionError) {
    return 'network';
  }

  const status = readStatus(error);
  if (status === 401 || status === 403) {
    return 'authentication';
  }
  if (status === 429) {
    return 'rate_limit';
  }
  if (status === 408) {
    return 'timeout';
  }

  const code = readErrorCode(error);
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return 'network';
  }

  return 'provider';
}

/**
 * Convert anything a provider call threw into a provider AppError
 */
export function toProviderError(error: unknown, provider: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const code = classifyProviderError(error);
  const details = error instanceof Error ? error.message : String(error);
  return ErrorHandler.createProviderError(code, details, {
    provider,
    status: readStatus(error)
  });
}

/**
 * Tokens and model of a reply that was billed but carried no text
 */
export interface BilledEmptyReply {
  usage: TokenUsage;
  model: string;
}

function emptyReplyError(
  provider: string,
  details: string,
  reply: BilledEmptyReply & { finishReason?: string | null }
): AppError {
  return ErrorHandler.createProviderError('empty_response', details, {
    provider,
    finishReason: reply.finishReason,
    model: reply.model,
    usage: reply.usage
  });
}

/**
 * Usage and model carried by an empty_response error, if the provider billed one
 */
export function billedEmptyReply(error: unknown): BilledEmptyReply | undefined {
  if (!(error instanceof AppError) || error.code !== 'empty_response' || !error.context) {
    return undefined;
  }
  const usage = TokenUsageSchema.safeParse(error.context.usage);
  const model = error.context.model;
  if (!usage.success || typeof model !== 'string') {
    return undefined;
  }
  return { usage: usage.data, model };
}

function toOpenAIMessage(message: LLMMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

/**
 * OpenAI chat completions adapter
 */
export class OpenAIChatProvider implements ChatProvider {
  readonly name = 'openai' as const;
  private readonly client: OpenAIChatClient;

  constructor(config: Pick<LLMConfig, 'apiKey' | 'timeout'>, client?: OpenAIChatClient) {
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeout,
      maxRetries: 0
    });
  }

  async send(request: ProviderRequest): Promise<ProviderResponse> {
    // Build messages array with system prompt if provided
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({
        role: 'system',
        content: request.systemPrompt
      });
    }

    for (const message of request.messages) {
      messages.push(toOpenAIMessage(message));
    }

    const response = await this.client.chat.completions.create({
      model: request.model,
      messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens
    });

    const usage: TokenUsage | undefined = response.usage ? {
      promptTokens: response.usage.prompt_tokens,
      completionTokens: response.usage.completion_tokens,
      totalTokens: response.usage.total_tokens
    } : undefined;

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw emptyReplyError(this.name, 'No content in OpenAI response', {
        model: response.model,
        usage: usage ?? { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        finishReason: choice?.finish_reason
      });
    }

    return {
      content: choice.message.content,
      model: response.model,
      usage,
      finishReason: choice.finish_reason || undefined
    };
  }
}

/**
 * Anthropic messages adapter
 */
export class AnthropicChatProvider implements ChatProvider {
  readonly name = 'anthropic' as const;
  private readonly client: AnthropicMessagesClient;

  constructor(config: Pick<LLMConfig, 'apiKey' | 'timeout'>, client?: AnthropicMessagesClient) {
    this.client = client ?? new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeout,
      maxRetries: 0
    });
  }

  async send(request: ProviderRequest): Promise<ProviderResponse> {
    const messages: Anthropic.MessageParam[] = [];
    for (const message of request.messages) {
      // Anthropic takes the system prompt separately
      if (message.role !== 'system') {
        messages.push({ role: message.role, content: message.content });
      }
    }

    const response = await this.client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      system: request.systemPrompt || undefined,
      messages
    });

    const usage: TokenUsage = {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens
    };

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
    if (!text) {
      throw emptyReplyError(this.name, 'No text content in Anthropic response', {
        model: response.model,
        usage,
        finishReason: response.stop_reason
      });
    }

    return {
      content: text,
      model: response.model,
      usage,
      finishReason: response.stop_reason || undefined
    };
  }
}

/**
 * Build the adapter for the configured provider
 */
export function createChatProvider(config: Pick<LLMConfig, 'provider' | 'apiKey' | 'timeout'>): ChatProvider {
  if (config.provider === 'anthropic') {
    return new AnthropicChatProvider(config);
  }
  return new OpenAIChatProvider(config);
}
