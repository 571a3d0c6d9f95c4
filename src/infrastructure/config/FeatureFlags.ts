/**
 * FeatureFlags - Runtime switches for agents and optional subsystems.
 *
 * Set through environment variables of the form ORCH_FEATURE_<NAME>=true|false.
 * A value that is neither true nor false is ignored and the default applies.
 * Agents are switched by ORCH_FEATURE_AGENT_<AGENTNAME>, enabled by default.
 */

export const FEATURE_ENV_PREFIX = 'ORCH_FEATURE_';

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Normalize a flag or agent name to its environment form, e.g.
 * "thermal-agent" becomes "THERMAL_AGENT".
 */
export function flagKey(name: string): string {
    return name.toUpperCase().replace(/[^A-Z0-9]+/g, '_');
}

function parseBoolean(raw: string): boolean | undefined {
    switch (raw.trim().toLowerCase()) {
        case 'true':
            return true;
        case 'false':
            return false;
        default:
            return undefined;
    }
}

export class FeatureFlags {
    private readonly flags: ReadonlyMap<string, boolean>;

    constructor(flags: Readonly<Record<string, boolean>> = {}) {
        this.flags = new Map(Object.entries(flags).map(([name, value]) => [flagKey(name), value]));
    }

    /**
     * Collect every ORCH_FEATURE_* variable with a boolean value.
     */
    static parseEnv(env: EnvSource): Record<string, boolean> {
        const flags: Record<string, boolean> = {};
        for (const [key, raw] of Object.entries(env)) {
            if (!key.startsWith(FEATURE_ENV_PREFIX) || raw === undefined) {
                continue;
            }
            const value = parseBoolean(raw);
            if (value !== undefined) {
                flags[key.slice(FEATURE_ENV_PREFIX.length)] = value;
            }
        }
        return flags;
    }

    static fromEnv(env: EnvSource): FeatureFlags {
        return new FeatureFlags(FeatureFlags.parseEnv(env));
    }

    isEnabled(name: string, defaultValue: boolean): boolean {
        return this.flags.get(flagKey(name)) ?? defaultValue;
    }

    isAgentEnabled(agentName: string): boolean {
        return this.isEnabled(`AGENT_${agentName}`, true);
    }

    /** Tracing of cycles; on by default. */
    get telemetryEnabled(): boolean {
        return this.isEnabled('TELEMETRY', true);
    }

    /**
     * Every explicitly set flag, for diagnostics.
     */
    describe(): Record<string, boolean> {
        return Object.fromEntries(this.flags);
    }
}
