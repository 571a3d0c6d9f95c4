/**
 * OrchestratorConfig - Runtime settings for the optimization cycle.
 *
 * Environment variables:
 * - ORCH_CYCLE_INTERVAL_MS: Period of the external cycle driver (default: 500)
 * - ORCH_AGENT_TIMEOUT_MS: Time an agent gets to propose (default: 250)
 * - ORCH_LOG_LEVEL: debug | info | warn | error (default: info)
 * - ORCH_SIGNAL_RETENTION_MS: Coordination signal lifetime (default: 300000)
 * - ORCH_RECENT_WINDOW_MS: Window for mode derivation (default: 120000)
 * - ORCH_EMERGENCY_CORROBORATION: Distinct agents needed for emergency (default: 2)
 * - ORCH_HANDLER_FAILURE_THRESHOLD: Handler failures before its circuit opens (default: 3)
 * - ORCH_HANDLER_RECOVERY_MS: Time before an open circuit is retried (default: 30000)
 * - ORCH_FEATURE_<NAME>: Feature flags, see FeatureFlags
 */

import { LogLevel } from '../observability/Logger.js';
import { EnvSource, FeatureFlags } from './FeatureFlags.js';
import { validateOrThrow } from '../../shared/validation/ConfigValidator.js';
import { ValidationError } from '../../shared/validation/ValidationError.js';
import { LOG_LEVELS, OrchestratorConfigSchema } from '../../shared/validation/schemas/ConfigSchemas.js';

export interface OrchestratorConfig {
    cycleIntervalMs: number;
    agentTimeoutMs: number;
    logLevel: LogLevel;
    signalRetentionMs: number;
    recentWindowMs: number;
    emergencyCorroboration: number;
    handlerFailureThreshold: number;
    handlerRecoveryMs: number;
    features: Record<string, boolean>;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: Readonly<OrchestratorConfig> = {
    cycleIntervalMs: 500,
    agentTimeoutMs: 250,
    logLevel: 'info',
    signalRetentionMs: 300000,
    recentWindowMs: 120000,
    emergencyCorroboration: 2,
    handlerFailureThreshold: 3,
    handlerRecoveryMs: 30000,
    features: {},
};

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

function readInt(env: EnvSource, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const parsed = Number(raw);
    if (!Number.isInteger(parsed)) {
        throw ValidationError.unparseable(name, raw, 'an integer');
    }
    return parsed;
}

function readLogLevel(env: EnvSource, fallback: LogLevel): LogLevel {
    const raw = env.ORCH_LOG_LEVEL;
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const level = raw.trim().toLowerCase();
    if (!isLogLevel(level)) {
        throw ValidationError.unparseable('ORCH_LOG_LEVEL', raw, LOG_LEVELS.join(' | '));
    }
    return level;
}

export class OrchestratorConfigFactory {
    /**
     * Fill in defaults and check ranges.
     *
     * @throws ValidationError when a value is out of range
     */
    static create(overrides: Partial<OrchestratorConfig> = {}): OrchestratorConfig {
        const config: OrchestratorConfig = {
            ...DEFAULT_ORCHESTRATOR_CONFIG,
            ...overrides,
            features: { ...DEFAULT_ORCHESTRATOR_CONFIG.features, ...overrides.features },
        };

        validateOrThrow(config, OrchestratorConfigSchema);

        if (config.recentWindowMs > config.signalRetentionMs) {
            throw ValidationError.fromFieldErrors([{
                field: 'recentWindowMs',
                message: 'recentWindowMs must not exceed signalRetentionMs',
                value: config.recentWindowMs,
            }]);
        }

        if (config.agentTimeoutMs >= config.cycleIntervalMs) {
            throw ValidationError.fromFieldErrors([{
                field: 'agentTimeoutMs',
                message: 'agentTimeoutMs must be shorter than cycleIntervalMs',
                value: config.agentTimeoutMs,
            }]);
        }

        return config;
    }

    /**
     * @throws ValidationError when a variable cannot be parsed or is out of range
     */
    static createFromEnv(env: EnvSource = process.env): OrchestratorConfig {
        const d = DEFAULT_ORCHESTRATOR_CONFIG;
        return OrchestratorConfigFactory.create({
            cycleIntervalMs: readInt(env, 'ORCH_CYCLE_INTERVAL_MS', d.cycleIntervalMs),
            agentTimeoutMs: readInt(env, 'ORCH_AGENT_TIMEOUT_MS', d.agentTimeoutMs),
            logLevel: readLogLevel(env, d.logLevel),
            signalRetentionMs: readInt(env, 'ORCH_SIGNAL_RETENTION_MS', d.signalRetentionMs),
            recentWindowMs: readInt(env, 'ORCH_RECENT_WINDOW_MS', d.recentWindowMs),
            emergencyCorroboration: readInt(env, 'ORCH_EMERGENCY_CORROBORATION', d.emergencyCorroboration),
            handlerFailureThreshold: readInt(env, 'ORCH_HANDLER_FAILURE_THRESHOLD', d.handlerFailureThreshold),
            handlerRecoveryMs: readInt(env, 'ORCH_HANDLER_RECOVERY_MS', d.handlerRecoveryMs),
            features: FeatureFlags.parseEnv(env),
        });
    }
}
