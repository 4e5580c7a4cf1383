/**
 * Pipeline Module
 */

export * from './pipeline';
export * from './artifactStore';
export * from './types';
