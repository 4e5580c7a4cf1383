/**
 * Error Handler
 *
 * Standardized error handling utilities for consistent error management
 * across the generation pipeline and the HTTP layer.
 */

import type { Logger } from 'pino';
import {
  AppError,
  CompilationErrorCode,
  ErrorCategory,
  ErrorSeverity,
  ProviderErrorCode
} from './types';
import { logAppError } from './logger';

const PROVIDER_MESSAGES: Record<ProviderErrorCode, { message: string; action: string }> = {
  authentication: {
    message: 'The language model provider rejected the API key.',
    action: 'Check the API key configured on the server and restart it.'
  },
  rate_limit: {
    message: 'The language model provider is rate limiting requests.',
    action: 'Wait a minute before generating again.'
  },
  network: {
    message: 'Could not reach the language model provider.',
    action: 'Please check the server\'s internet connection and try again.'
  },
  timeout: {
    message: 'The language model provider did not answer in time.',
    action: 'Try again, or shorten the job description.'
  },
  empty_response: {
    message: 'The language model returned an empty response.',
    action: 'Try generating again.'
  },
  provider: {
    message: 'The language model provider returned an error.',
    action: 'Try again later. If the problem persists, check the server logs.'
  }
};

const COMPILATION_MESSAGES: Record<CompilationErrorCode, { message: string; action: string }> = {
  'compiler-not-found': {
    message: 'The LaTeX compiler could not be started.',
    action: 'Install a TeX distribution or set LATEX_COMMAND to the compiler path.'
  },
  'compile-error': {
    message: 'The generated LaTeX did not compile.',
    action: 'Review the compiler log and the LaTeX source below, then regenerate.'
  },
  timeout: {
    message: 'The LaTeX compiler did not finish in time.',
    action: 'Review the LaTeX source below, then regenerate.'
  },
  'no-output': {
    message: 'The LaTeX compiler finished without producing a PDF.',
    action: 'Review the compiler log and the LaTeX source below, then regenerate.'
  }
};

const TRANSIENT_PROVIDER_CODES: ReadonlySet<string> = new Set<ProviderErrorCode>(['network', 'timeout']);

/**
 * Error handler class for managing errors throughout the application
 */
export class ErrorHandler {
  /**
   * Create a validation error
   */
  static createValidationError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      userMessage: message,
      technicalDetails,
      code: 'validation',
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: 'Please correct the highlighted fields and try again.'
    });
  }

  /**
   * Create an error for a failed call to the LLM provider
   */
  static createProviderError(
    code: ProviderErrorCode,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    const { message, action } = PROVIDER_MESSAGES[code];
    return new AppError({
      category: ErrorCategory.PROVIDER,
      severity: code === 'authentication' ? ErrorSeverity.CRITICAL : ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      code,
      timestamp: new Date(),
      context,
      recoverable: TRANSIENT_PROVIDER_CODES.has(code),
      suggestedAction: action
    });
  }

  /**
   * Create a parsing error for model output that is not a LaTeX document
   */
  static createParsingError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.PARSING,
      severity: ErrorSeverity.MEDIUM,
      userMessage: message,
      technicalDetails,
      code: 'unparsable_output',
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: 'Try generating again.'
    });
  }

  /**
   * Create a compilation error carrying the compiler log
   */
  static createCompilationError(
    code: CompilationErrorCode,
    compilerLog: string,
    context?: Record<string, unknown>
  ): AppError {
    const { message, action } = COMPILATION_MESSAGES[code];
    return new AppError({
      category: ErrorCategory.COMPILATION,
      severity: code === 'compiler-not-found' ? ErrorSeverity.CRITICAL : ErrorSeverity.MEDIUM,
      userMessage: message,
      technicalDetails: compilerLog,
      code,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: action
    });
  }

  /**
   * Create an unexpected error
   */
  static createUnexpectedError(
    error: unknown,
    context?: Record<string, unknown>
  ): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: 'An unexpected error occurred. Please try again.',
      technicalDetails: message,
      code: 'unexpected',
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'If the problem persists, please check the server logs.'
    });
  }

  /**
   * Wrap anything thrown into an AppError, keeping AppErrors as they are
   */
  static toAppError(error: unknown, context?: Record<string, unknown>): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return this.createUnexpectedError(error, context);
  }

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error, logger: Logger): void {
    logAppError(logger, error);
  }

  /**
   * Retry logic for transient failures
   */
  static async retry<T>(
    operation: () => Promise<T>,
    options: {
      maxAttempts?: number;
      delayMs?: number;
      backoffMultiplier?: number;
      shouldRetry?: (error: Error) => boolean;
      onRetry?: (error: Error, attempt: number) => void;
    } = {}
  ): Promise<T> {
    const {
      maxAttempts = 3,
      delayMs = 1000,
      backoffMultiplier = 2,
      shouldRetry = () => true,
      onRetry
    } = options;

    let currentDelay = delayMs;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        // Don't retry if we've exhausted attempts or if error is not retryable
        if (attempt >= maxAttempts || !shouldRetry(lastError)) {
          throw lastError;
        }

        onRetry?.(lastError, attempt);

        // Wait before retrying
        await new Promise(resolve => setTimeout(resolve, currentDelay));
        currentDelay *= backoffMultiplier;
      }
    }
  }

  /**
   * Determine if an error is retryable
   */
  static isRetryable(error: Error | AppError): boolean {
    if (error instanceof AppError) {
      return error.category === ErrorCategory.PROVIDER &&
        error.code !== undefined &&
        TRANSIENT_PROVIDER_CODES.has(error.code);
    }

    // Check for common retryable error patterns
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('econnreset') ||
      message.includes('network')
    );
  }
}
