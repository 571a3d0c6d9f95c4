/**
 * ConfigValidator - Schema validation helper functions.
 *
 * Validates configuration objects against schemas.
 */

import {
    ValidationSchema,
    FieldRule,
    ValidationResult,
    ValidationFieldError,
    SchemaOptions,
} from './ValidationSchema.js';
import { ValidationError } from './ValidationError.js';

/**
 * Default maximum string length.
 */
const MAX_STRING_LENGTH = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a value against a schema.
 */
export function validate(
    data: unknown,
    schema: ValidationSchema,
    options: SchemaOptions = {}
): ValidationResult {
    const { rejectUnknown = true } = options;

    if (!isRecord(data)) {
        return {
            valid: false,
            errors: [{ field: '$root', message: 'Configuration must be an object', value: data }],
        };
    }

    const errors = validateProperties('', data, schema, rejectUnknown);
    return {
        valid: errors.length === 0,
        errors,
    };
}

function validateProperties(
    prefix: string,
    data: Record<string, unknown>,
    schema: ValidationSchema,
    rejectUnknown: boolean
): ValidationFieldError[] {
    const errors: ValidationFieldError[] = [];

    if (rejectUnknown) {
        for (const key of Object.keys(data)) {
            if (!(key in schema)) {
                errors.push({ field: `${prefix}${key}`, message: `Unknown field: ${prefix}${key}` });
            }
        }
    }

    for (const [fieldName, rule] of Object.entries(schema)) {
        errors.push(...validateField(`${prefix}${fieldName}`, data[fieldName], rule, rejectUnknown));
    }

    return errors;
}

/**
 * Validate a single field against a rule.
 */
function validateField(
    fieldName: string,
    value: unknown,
    rule: FieldRule,
    rejectUnknown: boolean
): ValidationFieldError[] {
    if (value === undefined || value === null) {
        return rule.required
            ? [{ field: fieldName, message: rule.message ?? `${fieldName} is required` }]
            : [];
    }

    const errors: ValidationFieldError[] = [];

    if (typeof value === 'string' && rule.type === 'string') {
        errors.push(...validateString(fieldName, value, rule));
    } else if (typeof value === 'number' && rule.type === 'number') {
        errors.push(...validateNumber(fieldName, value, rule));
    } else if (typeof value === 'boolean' && rule.type === 'boolean') {
        // no range checks for booleans
    } else if (isRecord(value) && rule.type === 'object') {
        errors.push(...validateObject(fieldName, value, rule, rejectUnknown));
    } else {
        const actualType = Array.isArray(value) ? 'array' : typeof value;
        return [{
            field: fieldName,
            message: rule.message ?? `${fieldName} must be a ${rule.type}, got ${actualType}`,
            value,
        }];
    }

    if (rule.enum && (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean')
        && !rule.enum.includes(value)) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be one of [${rule.enum.join(', ')}]`,
            value,
        });
    }

    return errors;
}

/**
 * Validate string field.
 */
function validateString(fieldName: string, value: string, rule: FieldRule): ValidationFieldError[] {
    const errors: ValidationFieldError[] = [];
    const maxLen = rule.max ?? MAX_STRING_LENGTH;

    if (rule.min !== undefined && value.length < rule.min) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be at least ${rule.min} characters`,
            value,
        });
    }

    if (value.length > maxLen) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be at most ${maxLen} characters`,
            value: `(${value.length} chars)`,
        });
    }

    return errors;
}

/**
 * Validate number field.
 */
function validateNumber(fieldName: string, value: number, rule: FieldRule): ValidationFieldError[] {
    if (!Number.isFinite(value)) {
        return [{
            field: fieldName,
            message: rule.message ?? `${fieldName} must be a finite number`,
            value,
        }];
    }

    const errors: ValidationFieldError[] = [];

    if (rule.integer && !Number.isInteger(value)) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be an integer`,
            value,
        });
    }

    if (rule.min !== undefined && value < rule.min) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be at least ${rule.min}`,
            value,
        });
    }

    if (rule.max !== undefined && value > rule.max) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be at most ${rule.max}`,
            value,
        });
    }

    return errors;
}

/**
 * Validate object field.
 */
function validateObject(
    fieldName: string,
    value: Record<string, unknown>,
    rule: FieldRule,
    rejectUnknown: boolean
): ValidationFieldError[] {
    if (rule.properties) {
        return validateProperties(`${fieldName}.`, value, rule.properties, rejectUnknown);
    }

    const errors: ValidationFieldError[] = [];
    if (rule.values) {
        for (const [key, nested] of Object.entries(value)) {
            errors.push(...validateField(`${fieldName}.${key}`, nested, rule.values, rejectUnknown));
        }
    }
    return errors;
}

/**
 * Validate configuration and throw ValidationError if invalid.
 */
export function validateOrThrow(
    data: unknown,
    schema: ValidationSchema,
    options: SchemaOptions = {}
): void {
    const result = validate(data, schema, options);
    if (!result.valid) {
        throw ValidationError.fromFieldErrors(result.errors);
    }
}
