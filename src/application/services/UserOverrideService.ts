/**
 * UserOverrideService - Tracks resources the user has taken manual control of.
 *
 * While an override is active, no agent action may change that resource.
 * Expired overrides are dropped on the next lookup.
 */

import { IObservabilityContext } from '../ports/IObservabilityContext.js';
import {
    IUserOverride,
    SCENARIO_OVERRIDE_MINUTES,
    UserScenario,
    isOverrideActive,
} from '../../domain/entities/UserOverride.js';
import { ResourceValue, ResourceValues } from '../../domain/value-objects/ResourceValue.js';

const MINUTE_MS = 60 * 1000;

export class UserOverrideService {
    private overrides: Map<string, IUserOverride> = new Map();

    constructor(
        private readonly observability?: IObservabilityContext,
        private readonly clock: () => Date = () => new Date()
    ) {}

    /**
     * Lock a target for an explicit duration. Replaces any existing override.
     */
    setOverride(target: string, value: ResourceValue, durationMs: number): IUserOverride {
        return this.store(target, value, durationMs);
    }

    /**
     * Lock a target for as long as the scenario usually lasts.
     */
    setScenarioOverride(target: string, value: ResourceValue, scenario: UserScenario): IUserOverride {
        return this.store(target, value, SCENARIO_OVERRIDE_MINUTES[scenario] * MINUTE_MS, scenario);
    }

    isOverrideActive(target: string): boolean {
        const override = this.overrides.get(target);
        if (!override) {
            return false;
        }
        if (isOverrideActive(override, this.clock())) {
            return true;
        }
        this.overrides.delete(target);
        return false;
    }

    clearOverride(target: string): boolean {
        const removed = this.overrides.delete(target);
        if (removed) {
            this.observability?.logger.info('User override cleared', { target });
        }
        return removed;
    }

    clearAll(): void {
        const count = this.overrides.size;
        this.overrides.clear();
        this.observability?.logger.info('All user overrides cleared', { count });
    }

    activeOverrides(): IUserOverride[] {
        const now = this.clock();
        return Array.from(this.overrides.values()).filter(o => isOverrideActive(o, now));
    }

    private store(target: string, value: ResourceValue, durationMs: number, scenario?: UserScenario): IUserOverride {
        const createdAt = this.clock();
        const override: IUserOverride = {
            target,
            value,
            createdAt,
            expiresAt: new Date(createdAt.getTime() + durationMs),
            scenario,
        };
        this.overrides.set(target, override);

        this.observability?.logger.info('User override set', {
            target,
            value: ResourceValues.describe(value),
            durationMinutes: Math.round(durationMs / MINUTE_MS),
            scenario,
        });
        return override;
    }
}
