/**
 * Errors Module
 *
 * Standardized error handling and logging utilities.
 * Provides consistent error types and handling across the pipeline and API.
 */

export * from './handler';
export * from './types';
export * from './logger';
