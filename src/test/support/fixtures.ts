// src/test/support/fixtures.ts

import { GeoLocation, Patient, PatientAcuity } from '../../models/Patient';
import { Facility, FacilityLevel } from '../../models/Facility';
import { DEFAULT_OPTIMIZATION_RULES, OptimizationRules } from '../../config/optimizationRules';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

const EARTH_RADIUS_KM = 6371;
const GROUND_SPEED_KMH = 50;

/**
 * Point on the equator that is `minutes` of ground travel east of 0,0
 * (negative = west). Haversine along the equator is exact in longitude,
 * so ETAs between these points are the differences of their minutes.
 */
export function east(minutes: number): GeoLocation {
    const km = (minutes / 60) * GROUND_SPEED_KMH;
    return { latitude: 0, longitude: ((km / EARTH_RADIUS_KM) * 180) / Math.PI };
}

export function minutesFromNow(minutes: number): string {
    return new Date(NOW.getTime() + minutes * 60000).toISOString();
}

/**
 * Small tables so expected costs can be worked out by hand:
 * three capabilities, two resources, no acuity-level affinity
 */
export function testRules(overrides: Partial<OptimizationRules> = {}): OptimizationRules {
    return {
        ...DEFAULT_OPTIMIZATION_RULES,
        capabilityCatalog: ['trauma_center', 'burn', 'pediatric'],
        resourceCatalog: ['ordinary_icu', 'ward'],
        scarcityPenalties: { trauma_center: 0, burn: 500, pediatric: 500 },
        acuityLevelScores: {},
        ...overrides
    };
}

export function makePatient(id: string, overrides: Partial<Patient> = {}): Patient {
    return {
        id,
        acuity: PatientAcuity.IMMEDIATE,
        location: east(0),
        ...overrides
    };
}

export function makeFacility(id: string, overrides: Partial<Facility> = {}): Facility {
    return {
        id,
        name: `Facility ${id}`,
        level: FacilityLevel.DEFINITIVE_CARE,
        location: east(10),
        acceptedPatients: [],
        ...overrides
    };
}
