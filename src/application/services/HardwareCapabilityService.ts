/**
 * HardwareCapabilityService - Detects which control paths this machine has.
 *
 * Probing happens once; the result is cached until reset(). Concurrent
 * callers during the first probe share the same in-flight detection.
 */

import { IObservabilityContext } from '../ports/IObservabilityContext.js';
import { ICapabilityProbe } from '../ports/ICapabilityProbe.js';
import {
    HARDWARE_CAPABILITIES,
    HardwareCapabilities,
    HardwareCapability,
    noCapabilities,
} from '../../domain/value-objects/HardwareCapability.js';
import { errorMessage } from '../../shared/errors/ErrorNormalizer.js';

export class HardwareCapabilityService {
    private cached: HardwareCapabilities | null = null;
    private detecting: Promise<HardwareCapabilities> | null = null;
    private generation = 0;

    constructor(
        private readonly probe: ICapabilityProbe,
        private readonly observability?: IObservabilityContext
    ) {}

    async getCapabilities(): Promise<HardwareCapabilities> {
        if (this.cached) {
            return this.cached;
        }
        if (!this.detecting) {
            const generation = this.generation;
            this.detecting = this.detect().then(result => {
                // A reset() during detection discards this result.
                if (generation === this.generation) {
                    this.cached = result;
                    this.detecting = null;
                }
                return result;
            });
        }
        return this.detecting;
    }

    /**
     * True when every listed capability is available.
     */
    async supportsAll(required: readonly HardwareCapability[]): Promise<boolean> {
        if (required.length === 0) {
            return true;
        }
        const capabilities = await this.getCapabilities();
        return required.every(c => capabilities[c]);
    }

    /**
     * Forget the cached result; the next call probes again.
     */
    reset(): void {
        this.cached = null;
        this.detecting = null;
        this.generation++;
        this.observability?.logger.debug('Hardware capability cache reset');
    }

    private async detect(): Promise<HardwareCapabilities> {
        const results: Record<HardwareCapability, boolean> = { ...noCapabilities() };

        for (const capability of HARDWARE_CAPABILITIES) {
            results[capability] = await this.probeOne(capability);
        }

        this.observability?.logger.info('Hardware capabilities detected', {
            available: HARDWARE_CAPABILITIES.filter(c => results[c]),
            unavailable: HARDWARE_CAPABILITIES.filter(c => !results[c]),
        });
        return Object.freeze(results);
    }

    private async probeOne(capability: HardwareCapability): Promise<boolean> {
        try {
            return await this.probe.probe(capability);
        } catch (error) {
            this.observability?.logger.warn('Capability probe failed, treating as unavailable', {
                capability,
                error: errorMessage(error),
            });
            return false;
        }
    }
}
