/**
 * UserOverrideService.test.ts - Manual control locks.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { UserOverrideService } from '../UserOverrideService.js';
import { ResourceValues } from '../../../domain/value-objects/ResourceValue.js';
import { ResourceTargets } from '../../../domain/value-objects/ResourceTargets.js';
import { createClock, TEST_NOW } from './fixtures.js';

describe('UserOverrideService', () => {
    let clock: ReturnType<typeof createClock>;
    let service: UserOverrideService;

    beforeEach(() => {
        clock = createClock();
        service = new UserOverrideService(undefined, clock.now);
    });

    it('should lock a target until the duration elapses', () => {
        service.setOverride(ResourceTargets.FAN_PROFILE, ResourceValues.fanProfile('quiet'), 60_000);

        clock.advance(59_999);
        expect(service.isOverrideActive(ResourceTargets.FAN_PROFILE)).toBe(true);

        clock.advance(1);
        expect(service.isOverrideActive(ResourceTargets.FAN_PROFILE)).toBe(false);
    });

    it('should report untouched targets as free', () => {
        expect(service.isOverrideActive(ResourceTargets.POWER_MODE)).toBe(false);
    });

    it('should derive the duration from the scenario', () => {
        const override = service.setScenarioOverride(
            ResourceTargets.DISPLAY_BRIGHTNESS,
            ResourceValues.level(70),
            'gaming'
        );

        expect(override.createdAt).toEqual(TEST_NOW);
        expect(override.expiresAt).toEqual(new Date(TEST_NOW.getTime() + 90 * 60 * 1000));
        expect(override.scenario).toBe('gaming');
    });

    it('should replace an earlier override on the same target', () => {
        service.setOverride(ResourceTargets.POWER_MODE, ResourceValues.powerMode('quiet'), 1_000);
        service.setOverride(ResourceTargets.POWER_MODE, ResourceValues.powerMode('performance'), 10_000);

        clock.advance(5_000);
        expect(service.isOverrideActive(ResourceTargets.POWER_MODE)).toBe(true);
        expect(service.activeOverrides().map(o => o.value)).toEqual([ResourceValues.powerMode('performance')]);
    });

    it('should list only unexpired overrides', () => {
        service.setOverride(ResourceTargets.FAN_PROFILE, ResourceValues.fanProfile('quiet'), 1_000);
        service.setOverride(ResourceTargets.KEYBOARD_BRIGHTNESS, ResourceValues.level(0), 60_000);

        clock.advance(2_000);
        expect(service.activeOverrides().map(o => o.target)).toEqual([ResourceTargets.KEYBOARD_BRIGHTNESS]);
    });

    it('should clear one override or all of them', () => {
        service.setOverride(ResourceTargets.FAN_PROFILE, ResourceValues.fanProfile('quiet'), 60_000);
        service.setOverride(ResourceTargets.POWER_MODE, ResourceValues.powerMode('quiet'), 60_000);

        expect(service.clearOverride(ResourceTargets.FAN_PROFILE)).toBe(true);
        expect(service.clearOverride(ResourceTargets.FAN_PROFILE)).toBe(false);
        expect(service.isOverrideActive(ResourceTargets.POWER_MODE)).toBe(true);

        service.clearAll();
        expect(service.activeOverrides()).toEqual([]);
    });
});
