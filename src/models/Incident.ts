// src/models/Incident.ts

/**
 * Incident modes
 * - MCI / PHE: single-destination capacitated assignment
 * - MEDEVAC: staged Role 1 → Role 2 → Role 3 evacuation chain
 */
export enum IncidentType {
    MASS_CASUALTY_INCIDENT = 'MCI',
    MEDICAL_EVACUATION = 'MEDEVAC',
    PUBLIC_HEALTH_EMERGENCY = 'PHE'
}

export enum TransportMode {
    GROUND = 'GROUND',  // Ambulance
    AIR = 'AIR'         // Helicopter
}
