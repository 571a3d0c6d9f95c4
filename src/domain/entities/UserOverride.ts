/**
 * UserOverride - A manual change the user made that agents must respect.
 */

import { ResourceValue } from '../value-objects/ResourceValue.js';

export type UserScenario = 'video' | 'gaming' | 'development' | 'office' | 'general';

/** How long an override holds, by what the user was doing. */
export const SCENARIO_OVERRIDE_MINUTES: Readonly<Record<UserScenario, number>> = {
    video: 120,
    gaming: 90,
    development: 60,
    office: 15,
    general: 30,
};

export interface IUserOverride {
    readonly target: string;
    readonly value: ResourceValue;
    readonly createdAt: Date;
    readonly expiresAt: Date;
    readonly scenario?: UserScenario;
}

export function isOverrideActive(override: IUserOverride, now: Date): boolean {
    return now.getTime() < override.expiresAt.getTime();
}
