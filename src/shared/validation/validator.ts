/**
 * Validator Utilities
 *
 * Validates generation requests with Zod before any external call is made.
 */

import { z } from 'zod';
import { ErrorHandler } from '../errors';
import type { GenerationRequest } from '../types';
import { ValidationResult, ValidationError } from './types';
import {
  createGenerationRequestSchema,
  DEFAULT_REQUEST_LIMITS,
  RequestLimits
} from './schemas';

/**
 * Map Zod issues to field errors
 */
export function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.') || 'request',
    message: err.message
  }));
}

/**
 * Generation Request Validator
 * Checks required fields, types and length caps of a submitted request
 */
export class GenerationRequestValidator {
  private readonly schema: ReturnType<typeof createGenerationRequestSchema>;

  constructor(private readonly limits: RequestLimits = DEFAULT_REQUEST_LIMITS) {
    this.schema = createGenerationRequestSchema(limits);
  }

  /**
   * Validates a request body
   * @returns Validation result with specific errors for each invalid field
   */
  validate(input: unknown): ValidationResult {
    const result = this.schema.safeParse(input);

    if (result.success) {
      return {
        isValid: true,
        errors: []
      };
    }

    return {
      isValid: false,
      errors: toValidationErrors(result.error)
    };
  }

  /**
   * Parses a request body into an immutable GenerationRequest.
   * Throws a validation AppError listing every invalid field.
   */
  parse(input: unknown): GenerationRequest {
    const result = this.schema.safeParse(input);

    if (!result.success) {
      const errors = toValidationErrors(result.error);
      throw ErrorHandler.createValidationError(
        errors[0]?.message ?? 'Invalid request',
        errors.map(e => `${e.field}: ${e.message}`).join('; '),
        { errors }
      );
    }

    return Object.freeze({
      company: result.data.company,
      jobDescription: result.data.jobDescription,
      wantCoverLetter: result.data.wantCoverLetter
    });
  }

  getLimits(): RequestLimits {
    return { ...this.limits };
  }
}
