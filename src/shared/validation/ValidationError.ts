/**
 * ValidationError - Validation-specific error class.
 *
 * Extends OrchestrationError with field-level details.
 */

import { OrchestrationError } from '../errors/OrchestrationError.js';
import { ValidationFieldError } from './ValidationSchema.js';

/**
 * Validation error with field-level details.
 */
export class ValidationError extends OrchestrationError {
    readonly fieldErrors: ValidationFieldError[];

    constructor(message: string, fieldErrors: ValidationFieldError[] = []) {
        super('VALIDATION_ERROR', message, {
            fields: fieldErrors.map(e => ({
                field: e.field,
                message: e.message,
            })),
        });
        this.name = 'ValidationError';
        this.fieldErrors = fieldErrors;

        Object.setPrototypeOf(this, ValidationError.prototype);
    }

    /**
     * Create a validation error for a value that could not be parsed.
     */
    static unparseable(field: string, raw: string, expected: string): ValidationError {
        return new ValidationError(
            `Invalid value for ${field}: expected ${expected}, got "${raw}"`,
            [{ field, message: `Expected ${expected}`, value: raw }]
        );
    }

    /**
     * Create a validation error from multiple field errors.
     */
    static fromFieldErrors(fieldErrors: ValidationFieldError[]): ValidationError {
        if (fieldErrors.length === 0) {
            return new ValidationError('Validation failed');
        }
        if (fieldErrors.length === 1) {
            return new ValidationError(fieldErrors[0].message, fieldErrors);
        }
        return new ValidationError(
            `Validation failed: ${fieldErrors.map(e => e.message).join('; ')}`,
            fieldErrors
        );
    }
}
