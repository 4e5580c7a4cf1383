/**
 * Validation Module
 *
 * Zod-based validation of generation requests and API payloads.
 */

export * from './validator';
export * from './schemas';
export * from './types';
