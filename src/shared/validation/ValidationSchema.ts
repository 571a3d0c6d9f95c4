/**
 * ValidationSchema - Schema definition types.
 *
 * Describes the shape and ranges of configuration objects before they are
 * handed to the orchestration services.
 */

/**
 * Supported field types.
 */
export type FieldType = 'string' | 'number' | 'boolean' | 'object';

/**
 * Field validation rule.
 */
export interface FieldRule {
    type: FieldType;
    required?: boolean;
    /** Minimum value for numbers or minimum length for strings */
    min?: number;
    /** Maximum value for numbers or maximum length for strings */
    max?: number;
    /** Numbers must be whole */
    integer?: boolean;
    /** Allowed values (enum) */
    enum?: readonly (string | number | boolean)[];
    /** For object types: nested schema */
    properties?: ValidationSchema;
    /** For object types without a fixed shape: rule applied to every value */
    values?: FieldRule;
    /** Custom error message */
    message?: string;
}

/**
 * Validation schema definition.
 */
export interface ValidationSchema {
    [field: string]: FieldRule;
}

export interface SchemaOptions {
    /** Whether to reject fields not named by the schema (default: true) */
    rejectUnknown?: boolean;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationFieldError[];
}

/**
 * Validation error for a specific field.
 */
export interface ValidationFieldError {
    field: string;
    message: string;
    value?: unknown;
}

export function stringField(options: Partial<Omit<FieldRule, 'type'>> = {}): FieldRule {
    return { type: 'string', ...options };
}

export function numberField(options: Partial<Omit<FieldRule, 'type'>> = {}): FieldRule {
    return { type: 'number', ...options };
}

export function integerField(options: Partial<Omit<FieldRule, 'type' | 'integer'>> = {}): FieldRule {
    return { type: 'number', integer: true, ...options };
}

export function booleanField(options: Partial<Omit<FieldRule, 'type'>> = {}): FieldRule {
    return { type: 'boolean', ...options };
}

/**
 * Create a record field rule: an object whose every value matches `values`.
 */
export function recordField(values: FieldRule, options: Partial<Omit<FieldRule, 'type' | 'values'>> = {}): FieldRule {
    return { type: 'object', values, ...options };
}
