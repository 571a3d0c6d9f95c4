/**
 * Validation module exports.
 */

export * from './ValidationSchema.js';
export * from './ValidationError.js';
export * from './ConfigValidator.js';
export * from './schemas/ConfigSchemas.js';
