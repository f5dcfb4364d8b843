// src/models/Facility.ts

import { CapabilityFlags, GeoLocation, ResourceQuantities } from './Patient';

/**
 * Facility echelon level
 *
 * Numbering is inverted relative to NATO roles:
 * level 3 hosts Role 1, level 2 hosts Role 2, level 1 hosts Role 3
 */
export enum FacilityLevel {
    DEFINITIVE_CARE = 1,        // Role 3 - definitive surgical care
    ADVANCED_TRAUMA = 2,        // Role 2 - damage control
    INITIAL_STABILIZATION = 3   // Role 1 - golden hour stabilization
}

/**
 * Facility model - candidate destination
 *
 * Read-only during a decision. Capacity is only changed by dispatch bookkeeping
 * (events/transferDispatchHandler) between decisions.
 */
export interface Facility {
    id: string;
    name: string;
    level: FacilityLevel;
    location?: GeoLocation | null;
    capabilities?: CapabilityFlags | null;
    resources?: ResourceQuantities | null;
    acceptedPatients: string[];
}
