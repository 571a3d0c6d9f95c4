/**
 * OrchestratorConfig.test.ts - Configuration loading, validation and flags.
 */

import { describe, it, expect } from 'vitest';
import {
    DEFAULT_ORCHESTRATOR_CONFIG,
    OrchestratorConfigFactory,
} from '../../../infrastructure/config/OrchestratorConfig.js';
import { FeatureFlags, flagKey } from '../../../infrastructure/config/FeatureFlags.js';
import { validate } from '../../../shared/validation/ConfigValidator.js';
import { ValidationError } from '../../../shared/validation/ValidationError.js';
import { OrchestratorConfigSchema } from '../../../shared/validation/schemas/ConfigSchemas.js';

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected the call to throw');
}

describe('OrchestratorConfigFactory', () => {
    it('should fill in every default', () => {
        expect(OrchestratorConfigFactory.create()).toEqual(DEFAULT_ORCHESTRATOR_CONFIG);
    });

    it('should keep overrides and merge feature flags', () => {
        const config = OrchestratorConfigFactory.create({ agentTimeoutMs: 400, features: { TELEMETRY: false } });

        expect(config.agentTimeoutMs).toBe(400);
        expect(config.cycleIntervalMs).toBe(500);
        expect(config.features).toEqual({ TELEMETRY: false });
    });

    it('should reject a value out of range', () => {
        const error = captureError(() => OrchestratorConfigFactory.create({ agentTimeoutMs: 5 }));

        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
            expect(error.message).toBe('agentTimeoutMs must be at least 10');
            expect(error.code).toBe('VALIDATION_ERROR');
            expect(error.fieldErrors).toEqual([
                { field: 'agentTimeoutMs', message: 'agentTimeoutMs must be at least 10', value: 5 },
            ]);
        }
    });

    it('should list every broken field', () => {
        expect(() => OrchestratorConfigFactory.create({ cycleIntervalMs: 10, emergencyCorroboration: 11 })).toThrow(
            'Validation failed: cycleIntervalMs must be at least 50; emergencyCorroboration must be at most 10'
        );
    });

    it('should reject a fractional count', () => {
        expect(() => OrchestratorConfigFactory.create({ handlerFailureThreshold: 2.5 })).toThrow(
            'handlerFailureThreshold must be an integer'
        );
    });

    it('should reject a recent window longer than retention', () => {
        expect(() => OrchestratorConfigFactory.create({ recentWindowMs: 400_000 })).toThrow(
            'recentWindowMs must not exceed signalRetentionMs'
        );
    });

    it('should reject an agent timeout that does not fit in the cycle interval', () => {
        expect(() => OrchestratorConfigFactory.create({ agentTimeoutMs: 500 })).toThrow(
            'agentTimeoutMs must be shorter than cycleIntervalMs'
        );
        expect(OrchestratorConfigFactory.create({ agentTimeoutMs: 499 }).agentTimeoutMs).toBe(499);
    });

    describe('createFromEnv', () => {
        it('should read variables and fall back to defaults for blank ones', () => {
            const config = OrchestratorConfigFactory.createFromEnv({
                ORCH_AGENT_TIMEOUT_MS: '400',
                ORCH_CYCLE_INTERVAL_MS: '  ',
                ORCH_LOG_LEVEL: ' WARN ',
                ORCH_FEATURE_AGENT_GPUAGENT: 'false',
                ORCH_FEATURE_TELEMETRY: 'maybe',
                PATH: '/usr/bin',
            });

            expect(config.agentTimeoutMs).toBe(400);
            expect(config.cycleIntervalMs).toBe(500);
            expect(config.logLevel).toBe('warn');
            expect(config.features).toEqual({ AGENT_GPUAGENT: false });
        });

        it('should name the variable that is not a number', () => {
            expect(() => OrchestratorConfigFactory.createFromEnv({ ORCH_CYCLE_INTERVAL_MS: 'fast' })).toThrow(
                'Invalid value for ORCH_CYCLE_INTERVAL_MS: expected an integer, got "fast"'
            );
        });

        it('should reject an unknown log level', () => {
            expect(() => OrchestratorConfigFactory.createFromEnv({ ORCH_LOG_LEVEL: 'verbose' })).toThrow(
                'Invalid value for ORCH_LOG_LEVEL: expected debug | info | warn | error, got "verbose"'
            );
        });

        it('should range-check values read from the environment', () => {
            expect(() => OrchestratorConfigFactory.createFromEnv({ ORCH_EMERGENCY_CORROBORATION: '0' })).toThrow(
                'emergencyCorroboration must be at least 1'
            );
        });
    });
});

describe('OrchestratorConfigSchema', () => {
    it('should reject unknown fields and non-boolean flags', () => {
        const result = validate(
            { ...DEFAULT_ORCHESTRATOR_CONFIG, features: { TELEMETRY: 'yes' }, pollRate: 5 },
            OrchestratorConfigSchema
        );

        expect(result.valid).toBe(false);
        expect(result.errors.map(e => e.message)).toEqual([
            'Unknown field: pollRate',
            'features.TELEMETRY must be a boolean, got string',
        ]);
    });

    it('should reject a log level outside the list', () => {
        const result = validate({ ...DEFAULT_ORCHESTRATOR_CONFIG, logLevel: 'trace' }, OrchestratorConfigSchema);

        expect(result.errors).toEqual([
            { field: 'logLevel', message: 'logLevel must be one of [debug, info, warn, error]', value: 'trace' },
        ]);
    });

    it('should reject a configuration that is not an object', () => {
        expect(validate('cycle=500', OrchestratorConfigSchema).errors[0].message).toBe('Configuration must be an object');
    });
});

describe('FeatureFlags', () => {
    it('should normalize names to their environment form', () => {
        expect(flagKey('thermal-agent')).toBe('THERMAL_AGENT');
        expect(flagKey('AGENT_GpuAgent')).toBe('AGENT_GPUAGENT');
    });

    it('should only accept true and false from the environment', () => {
        expect(FeatureFlags.parseEnv({
            ORCH_FEATURE_A: 'TRUE',
            ORCH_FEATURE_B: ' false ',
            ORCH_FEATURE_C: '1',
            OTHER_D: 'true',
        })).toEqual({ A: true, B: false });
    });

    it('should enable agents and telemetry unless switched off', () => {
        const flags = FeatureFlags.fromEnv({ ORCH_FEATURE_AGENT_THERMALAGENT: 'false' });

        expect(flags.isAgentEnabled('ThermalAgent')).toBe(false);
        expect(flags.isAgentEnabled('GpuAgent')).toBe(true);
        expect(flags.telemetryEnabled).toBe(true);
        expect(new FeatureFlags({ telemetry: false }).telemetryEnabled).toBe(false);
    });

    it('should fall back to the given default for unset flags', () => {
        const flags = new FeatureFlags({ EXPERIMENTAL: true });

        expect(flags.isEnabled('experimental', false)).toBe(true);
        expect(flags.isEnabled('OTHER', false)).toBe(false);
        expect(flags.describe()).toEqual({ EXPERIMENTAL: true });
    });
});
