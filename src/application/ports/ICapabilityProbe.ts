import { HardwareCapability } from '../../domain/value-objects/HardwareCapability.js';

/**
 * Tests whether a control path works on this machine, typically with a
 * harmless read. Resolving false and rejecting both mean unavailable.
 */
export interface ICapabilityProbe {
    probe(capability: HardwareCapability): Promise<boolean>;
}
