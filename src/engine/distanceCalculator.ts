// src/engine/distanceCalculator.ts

import { GeoLocation } from '../models/Patient';
import { TransportMode } from '../models/Incident';
import { OptimizationRules } from '../config/optimizationRules';

const EARTH_RADIUS_KM = 6371;

export interface Coordinates {
    latitude: number;
    longitude: number;
}

function toRadians(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

/**
 * Narrow an optional location to usable coordinates
 *
 * @returns Coordinates or null when either component is missing
 */
export function toCoordinates(location: GeoLocation | null | undefined): Coordinates | null {
    if (!location) {
        return null;
    }
    const { latitude, longitude } = location;
    if (typeof latitude !== 'number' || typeof longitude !== 'number') {
        return null;
    }
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
        return null;
    }
    return { latitude, longitude };
}

/**
 * Great-circle distance (haversine)
 *
 * @returns Distance in kilometres
 */
export function haversineKm(from: Coordinates, to: Coordinates): number {
    const deltaLat = toRadians(to.latitude - from.latitude);
    const deltaLon = toRadians(to.longitude - from.longitude);

    const a =
        Math.sin(deltaLat / 2) ** 2 +
        Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(deltaLon / 2) ** 2;
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

    return EARTH_RADIUS_KM * c;
}

/**
 * Distance between two optional locations
 *
 * @returns Kilometres, or Infinity when either endpoint lacks coordinates
 */
export function distanceKm(
    from: GeoLocation | null | undefined,
    to: GeoLocation | null | undefined
): number {
    const origin = toCoordinates(from);
    const destination = toCoordinates(to);
    if (!origin || !destination) {
        return Infinity;
    }
    return haversineKm(origin, destination);
}

/**
 * Travel time estimate for a transport mode
 *
 * Pure function. Infinity propagates as "infeasible", never as zero.
 *
 * @param from Origin (patient or previous facility)
 * @param to Destination facility location
 * @param mode Ground (ambulance) or air (helicopter)
 * @param rules Transport speeds
 * @returns ETA in minutes
 */
export function calculateEtaMinutes(
    from: GeoLocation | null | undefined,
    to: GeoLocation | null | undefined,
    mode: TransportMode,
    rules: OptimizationRules
): number {
    const km = distanceKm(from, to);
    if (!Number.isFinite(km)) {
        return Infinity;
    }

    const speedKmh = rules.transportSpeedsKmh[mode];
    if (!(speedKmh > 0)) {
        return Infinity;
    }

    return (km / speedKmh) * 60;
}
