/**
 * LaTeX Module
 *
 * External compiler invocation in scoped temporary directories.
 */

export * from './compiler';
export * from './processRunner';
export * from './tempDir';
