/**
 * LLM Module
 *
 * Unified LLM client, prompts and output parsing for Anthropic and OpenAI.
 */

export * from './types';
export * from './client';
export * from './providers';
export * from './prompts';
export * from './outputParser';
