/**
 * Tests for Shared LLM Client
 *
 * Validates the unified LLM client and the OpenAI and Anthropic adapters
 * against in-process fakes of the SDK clients.
 */

import { describe, it, expect, vi } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { AppError, ErrorCategory } from '../shared/errors';
import {
  AnthropicChatProvider,
  DEFAULT_LLM_CONFIG,
  LLMClient,
  OpenAIChatProvider,
  billedEmptyReply,
  classifyProviderError,
  createChatProvider,
  toProviderError,
  type AnthropicMessagesClient,
  type ChatProvider,
  type LLMConfig,
  type OpenAIChatClient,
  type ProviderRequest,
  type ProviderResponse
} from '../shared/llm';

const config: LLMConfig = {
  ...DEFAULT_LLM_CONFIG.openai,
  apiKey: 'test-secret',
  retryDelayMs: 0
};

const REPLY: ProviderResponse = {
  content: '```latex\n\\documentclass{article}\\begin{document}\\end{document}\n```',
  model: 'gpt-4o-mini-2024-07-18',
  usage: { promptTokens: 300, completionTokens: 200, totalTokens: 500 },
  finishReason: 'stop'
};

function fakeProvider(send: (request: ProviderRequest) => Promise<ProviderResponse>) {
  const spy = vi.fn(send);
  const provider: ChatProvider = { name: 'openai', send: spy };
  return { provider, send: spy };
}

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function withStatus(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('LLMClient', () => {
  it('should resolve request defaults from the config', async () => {
    const { provider, send } = fakeProvider(async () => REPLY);
    const client = new LLMClient(config, { provider });

    await client.complete({ messages: [{ role: 'user', content: 'Tailor this.' }] });

    expect(send).toHaveBeenCalledWith({
      messages: [{ role: 'user', content: 'Tailor this.' }],
      systemPrompt: '',
      temperature: 0.25,
      maxTokens: 4096,
      model: 'gpt-4o-mini'
    });
  });

  it('should pass per-request overrides through', async () => {
    const { provider, send } = fakeProvider(async () => REPLY);
    const client = new LLMClient(config, { provider });

    await client.complete({
      messages: [{ role: 'user', content: 'Write a letter.' }],
      systemPrompt: 'You write letters.',
      temperature: 0.3,
      maxTokens: 1000,
      model: 'gpt-4o'
    });

    expect(send.mock.calls[0]?.[0]).toMatchObject({
      systemPrompt: 'You write letters.',
      temperature: 0.3,
      maxTokens: 1000,
      model: 'gpt-4o'
    });
  });

  it('should report token usage exactly as the provider returned it', async () => {
    const { provider } = fakeProvider(async () => REPLY);
    const client = new LLMClient(config, { provider });

    const response = await client.complete({ messages: [{ role: 'user', content: 'Tailor this.' }] });

    expect(response.content).toBe(REPLY.content);
    expect(response.model).toBe('gpt-4o-mini-2024-07-18');
    expect(response.usage).toEqual({ promptTokens: 300, completionTokens: 200, totalTokens: 500 });
    expect(response.attempts).toBe(1);
    expect(response.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('should reject an empty prompt without calling the provider', async () => {
    const { provider, send } = fakeProvider(async () => REPLY);
    const client = new LLMClient(config, { provider });

    const error = await captureRejection(client.complete({ messages: [{ role: 'user', content: '  ' }] }));

    expect(error).toBeInstanceOf(AppError);
    if (!(error instanceof AppError)) return;
    expect(error.category).toBe(ErrorCategory.VALIDATION);
    expect(send).not.toHaveBeenCalled();
  });

  it('should retry a network failure once and succeed', async () => {
    const { provider, send } = fakeProvider(async () => REPLY);
    send.mockRejectedValueOnce(withCode('socket hang up', 'ECONNRESET'));
    const client = new LLMClient(config, { provider });

    const response = await client.complete({ messages: [{ role: 'user', content: 'Tailor this.' }] });

    expect(send).toHaveBeenCalledTimes(2);
    expect(response.attempts).toBe(2);
  });

  it('should give up after the configured number of attempts', async () => {
    const { provider, send } = fakeProvider(async () => {
      throw withCode('connect ECONNREFUSED', 'ECONNREFUSED');
    });
    const client = new LLMClient(config, { provider });

    const error = await captureRejection(client.complete({ messages: [{ role: 'user', content: 'x' }] }));

    expect(send).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(AppError);
    if (!(error instanceof AppError)) return;
    expect(error.category).toBe(ErrorCategory.PROVIDER);
    expect(error.code).toBe('network');
    expect(error.context).toEqual({ provider: 'openai', status: undefined });
  });

  it('should not retry an authentication failure', async () => {
    const { provider, send } = fakeProvider(async () => {
      throw withStatus('Incorrect API key provided', 401);
    });
    const client = new LLMClient(config, { provider });

    const error = await captureRejection(client.complete({ messages: [{ role: 'user', content: 'x' }] }));

    expect(send).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(AppError);
    if (!(error instanceof AppError)) return;
    expect(error.code).toBe('authentication');
    expect(error.userMessage).toBe('The language model provider rejected the API key.');
  });

  it('should not retry a rate limit', async () => {
    const { provider, send } = fakeProvider(async () => {
      throw withStatus('Rate limit reached', 429);
    });
    const client = new LLMClient(config, { provider });

    await expect(client.complete({ messages: [{ role: 'user', content: 'x' }] })).rejects.toMatchObject({
      code: 'rate_limit'
    });
    expect(send).toHaveBeenCalledTimes(1);
  });
});

describe('classifyProviderError', () => {
  it('should recognise SDK connection errors', () => {
    expect(classifyProviderError(new OpenAI.APIConnectionTimeoutError())).toBe('timeout');
    expect(classifyProviderError(new OpenAI.APIConnectionError({ message: 'Connection error.' }))).toBe('network');
  });

  it('should map HTTP statuses', () => {
    expect(classifyProviderError(withStatus('Unauthorized', 401))).toBe('authentication');
    expect(classifyProviderError(withStatus('Forbidden', 403))).toBe('authentication');
    expect(classifyProviderError(withStatus('Too Many Requests', 429))).toBe('rate_limit');
    expect(classifyProviderError(withStatus('Request Timeout', 408))).toBe('timeout');
    expect(classifyProviderError(withStatus('Internal Server Error', 500))).toBe('provider');
  });

  it('should map transport error codes', () => {
    expect(classifyProviderError(withCode('getaddrinfo ENOTFOUND', 'ENOTFOUND'))).toBe('network');
    expect(classifyProviderError(withCode('other', 'ESOMETHING'))).toBe('provider');
    expect(classifyProviderError('a string')).toBe('provider');
  });

  it('should keep AppErrors unchanged', () => {
    const original = withStatus('Unauthorized', 401);
    const appError = toProviderError(original, 'anthropic');
    expect(toProviderError(appError, 'openai')).toBe(appError);
    expect(appError.context).toEqual({ provider: 'anthropic', status: 401 });
    expect(appError.technicalDetails).toBe('Unauthorized');
  });
});

const REQUEST: ProviderRequest = {
  messages: [{ role: 'user', content: 'Tailor this.' }],
  systemPrompt: 'You write resumes.',
  temperature: 0.25,
  maxTokens: 4096,
  model: 'test-model'
};

describe('OpenAIChatProvider', () => {
  function openAIClient(completion: OpenAI.Chat.ChatCompletion) {
    const create = vi.fn(async (_body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming) => completion);
    const client: OpenAIChatClient = { chat: { completions: { create } } };
    return { client, create };
  }

  function completion(content: string | null): OpenAI.Chat.ChatCompletion {
    return {
      id: 'chatcmpl-test',
      object: 'chat.completion',
      created: 0,
      model: 'test-model-2024',
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content, refusal: null },
          finish_reason: 'stop',
          logprobs: null
        }
      ],
      usage: { prompt_tokens: 300, completion_tokens: 200, total_tokens: 500 }
    };
  }

  it('should send the system prompt first and map the reply', async () => {
    const { client, create } = openAIClient(completion('\\documentclass{article}'));
    const provider = new OpenAIChatProvider({ apiKey: 'test-secret', timeout: 1000 }, client);

    const response = await provider.send(REQUEST);

    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'You write resumes.' },
        { role: 'user', content: 'Tailor this.' }
      ],
      temperature: 0.25,
      max_tokens: 4096
    });
    expect(response).toEqual({
      content: '\\documentclass{article}',
      model: 'test-model-2024',
      usage: { promptTokens: 300, completionTokens: 200, totalTokens: 500 },
      finishReason: 'stop'
    });
  });

  it('should leave the system message out when there is no system prompt', async () => {
    const { client, create } = openAIClient(completion('ok'));
    const provider = new OpenAIChatProvider({ apiKey: 'test-secret', timeout: 1000 }, client);

    await provider.send({ ...REQUEST, systemPrompt: '' });

    expect(create.mock.calls[0]?.[0].messages).toEqual([{ role: 'user', content: 'Tailor this.' }]);
  });

  it('should reject an empty reply with the tokens it was billed', async () => {
    const { client } = openAIClient(completion(null));
    const provider = new OpenAIChatProvider({ apiKey: 'test-secret', timeout: 1000 }, client);

    const error = await captureRejection(provider.send(REQUEST));

    expect(error).toMatchObject({ code: 'empty_response' });
    expect(billedEmptyReply(error)).toEqual({
      usage: { promptTokens: 300, completionTokens: 200, totalTokens: 500 },
      model: 'test-model-2024'
    });
  });
});

describe('AnthropicChatProvider', () => {
  function anthropicClient(message: Anthropic.Message) {
    const create = vi.fn(async (_body: Anthropic.MessageCreateParamsNonStreaming) => message);
    const client: AnthropicMessagesClient = { messages: { create } };
    return { client, create };
  }

  function message(content: Anthropic.ContentBlock[]): Anthropic.Message {
    return {
      id: 'msg-test',
      type: 'message',
      role: 'assistant',
      model: 'test-model-2024',
      content,
      stop_reason: 'end_turn',
      stop_sequence: null,
      usage: { input_tokens: 320, output_tokens: 180 }
    };
  }

  it('should pass the system prompt separately and join text blocks', async () => {
    const { client, create } = anthropicClient(
      message([
        { type: 'text', text: 'Part one, ' },
        { type: 'text', text: 'part two' }
      ])
    );
    const provider = new AnthropicChatProvider({ apiKey: 'test-secret', timeout: 1000 }, client);

    const response = await provider.send({
      ...REQUEST,
      messages: [{ role: 'system', content: 'ignored' }, ...REQUEST.messages]
    });

    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 4096,
      temperature: 0.25,
      system: 'You write resumes.',
      messages: [{ role: 'user', content: 'Tailor this.' }]
    });
    expect(response).toEqual({
      content: 'Part one, part two',
      model: 'test-model-2024',
      usage: { promptTokens: 320, completionTokens: 180, totalTokens: 500 },
      finishReason: 'end_turn'
    });
  });

  it('should reject a reply without text with the tokens it was billed', async () => {
    const { client } = anthropicClient(message([]));
    const provider = new AnthropicChatProvider({ apiKey: 'test-secret', timeout: 1000 }, client);

    const error = await captureRejection(provider.send(REQUEST));

    expect(error).toMatchObject({ code: 'empty_response' });
    expect(billedEmptyReply(error)).toEqual({
      usage: { promptTokens: 320, completionTokens: 180, totalTokens: 500 },
      model: 'test-model-2024'
    });
  });
});

describe('billedEmptyReply', () => {
  it('should ignore errors that carry no billed reply', () => {
    expect(billedEmptyReply(new Error('boom'))).toBeUndefined();
    expect(billedEmptyReply(toProviderError(withStatus('Unauthorized', 401), 'openai'))).toBeUndefined();
  });
});

describe('createChatProvider', () => {
  it('should build the adapter for the configured provider', () => {
    expect(createChatProvider({ provider: 'anthropic', apiKey: 'test-secret', timeout: 1000 }))
      .toBeInstanceOf(AnthropicChatProvider);
    expect(createChatProvider({ provider: 'openai', apiKey: 'test-secret', timeout: 1000 }))
      .toBeInstanceOf(OpenAIChatProvider);
  });
});
