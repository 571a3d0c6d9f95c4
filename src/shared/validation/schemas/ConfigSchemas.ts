/**
 * ConfigSchemas - Validation schemas for orchestrator configuration.
 */

import {
    ValidationSchema,
    integerField,
    stringField,
    booleanField,
    recordField,
} from '../ValidationSchema.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Schema for OrchestratorConfig.
 */
export const OrchestratorConfigSchema: ValidationSchema = {
    cycleIntervalMs: integerField({ required: true, min: 50, max: 60_000 }),
    agentTimeoutMs: integerField({ required: true, min: 10, max: 30_000 }),
    logLevel: stringField({ required: true, enum: LOG_LEVELS }),
    signalRetentionMs: integerField({ required: true, min: 1_000 }),
    recentWindowMs: integerField({ required: true, min: 1_000 }),
    emergencyCorroboration: integerField({ required: true, min: 1, max: 10 }),
    handlerFailureThreshold: integerField({ required: true, min: 1, max: 100 }),
    handlerRecoveryMs: integerField({ required: true, min: 0 }),
    features: recordField(booleanField(), { required: true }),
};
