// src/models/Patient.ts

/**
 * SALT triage categories, ordered from terminal to untriaged
 */
export enum PatientAcuity {
    DEAD = 'Dead',            // Terminates processing
    EXPECTANT = 'Expectant',  // Unlikely to survive given resource constraints
    IMMEDIATE = 'Immediate',  // Life-threatening, likely to survive with care
    DELAYED = 'Delayed',      // Serious but stable
    MINIMAL = 'Minimal',      // Minor injuries only
    UNDEFINED = 'Undefined'   // Not yet triaged
}

export interface GeoLocation {
    latitude?: number | null;
    longitude?: number | null;
}

/**
 * Capability name → required/available flag
 * Keys come from the capability catalog in OptimizationRules
 */
export type CapabilityFlags = Partial<Record<string, boolean>>;

/**
 * Resource name → quantity
 * Keys come from the resource catalog in OptimizationRules
 */
export type ResourceQuantities = Partial<Record<string, number>>;

/**
 * Patient model - triaged casualty record handed over by the triage pipeline
 *
 * Data only. The engine never mutates a patient.
 *
 * Invariant: acuity DEAD (or deceased = true) is never assigned a destination
 * Missing location blocks every transfer; missing predictedDeathAt means a long survival window
 */
export interface Patient {
    id: string;
    name?: string;
    age?: number;
    acuity: PatientAcuity;
    location?: GeoLocation | null;
    predictedDeathAt?: string | null;  // ISO-8601 instant
    deceased?: boolean;
    requiredCapabilities?: CapabilityFlags | null;
    requiredResources?: ResourceQuantities | null;
}
