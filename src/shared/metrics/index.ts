/**
 * Metrics Module
 *
 * Session-scoped, in-memory run history.
 */

export * from './log';
export * from './recorder';
