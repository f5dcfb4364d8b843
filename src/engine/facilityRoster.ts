// src/engine/facilityRoster.ts

import { readFileSync } from 'fs';
import { Facility } from '../models/Facility';
import { FacilityRosterSchema, formatZodError } from '../validation/schemas';

/**
 * Index facilities by id; a later duplicate replaces an earlier one
 */
export function toRoster(facilities: Facility[]): Map<string, Facility> {
    return new Map(facilities.map(facility => [facility.id, facility]));
}

/**
 * Load and validate the facility roster JSON document
 *
 * @param path JSON file holding an array of facilities
 * @returns Roster keyed by facility id
 */
export function loadFacilityRoster(path: string): Map<string, Facility> {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const parsed = FacilityRosterSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Invalid facility roster ${path}: ${formatZodError(parsed.error)}`);
    }

    console.log(`[FacilityRoster] Loaded ${parsed.data.length} facilities from ${path}`);
    return toRoster(parsed.data);
}
