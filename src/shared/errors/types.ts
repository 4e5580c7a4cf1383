/**
 * Error Types
 *
 * Type definitions for error codes and error structures shared by the
 * generation pipeline and the HTTP layer.
 */

/**
 * Error categories for different types of failures
 */
export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  PROVIDER = 'PROVIDER',
  PARSING = 'PARSING',
  COMPILATION = 'COMPILATION',
  UNEXPECTED = 'UNEXPECTED'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Why a call to the LLM provider failed
 */
export type ProviderErrorCode =
  | 'authentication'
  | 'rate_limit'
  | 'network'
  | 'timeout'
  | 'empty_response'
  | 'provider';

/**
 * Why a LaTeX compilation failed
 */
export type CompilationErrorCode =
  | 'compiler-not-found'
  | 'compile-error'
  | 'timeout'
  | 'no-output';

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  technicalDetails: string;
  code?: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  recoverable: boolean;
  suggestedAction?: string;
}

/**
 * Custom error class with additional context
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly code?: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly suggestedAction?: string;

  constructor(info: ErrorInfo) {
    super(info.userMessage);
    this.name = 'AppError';
    this.category = info.category;
    this.severity = info.severity;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.code = info.code;
    this.timestamp = info.timestamp;
    this.context = info.context;
    this.recoverable = info.recoverable;
    this.suggestedAction = info.suggestedAction;
  }
}
