// src/models/Decision.ts

import { IncidentType } from './Incident';
import { FacilityLevel } from './Facility';

export enum DecisionAction {
    TRANSFER = 'Transfer',
    FORFEIT = 'Forfeit'
}

/**
 * Machine-readable reason attached to every terminal outcome
 * Downstream systems branch on this, never on the prose
 */
export enum ReasoningCode {
    PATIENT_DECEASED = 'PATIENT_DECEASED',
    NO_LOCATION = 'NO_LOCATION',
    DEAD_ON_ARRIVAL_ALL_FACILITIES = 'DEAD_ON_ARRIVAL_ALL_FACILITIES',
    NO_FACILITIES_AVAILABLE = 'NO_FACILITIES_AVAILABLE',
    TRANSFER_OPTIMAL = 'TRANSFER_OPTIMAL',
    TRANSFER_FALLBACK = 'TRANSFER_FALLBACK',
    NO_VIABLE_CHAIN = 'NO_VIABLE_CHAIN',
    DEAD_ON_ARRIVAL = 'DEAD_ON_ARRIVAL',
    EVACUATION_CHAIN_OPTIMAL = 'EVACUATION_CHAIN_OPTIMAL'
}

export enum DecisionMode {
    SINGLE_DESTINATION = 'SINGLE_DESTINATION',
    EVACUATION_CHAIN = 'EVACUATION_CHAIN'
}

export interface FacilityChoice {
    facilityId: string;
    facilityName: string;
    etaMinutes: number;
}

export type EvacuationRole = 'Role 1' | 'Role 2' | 'Role 3';

export interface ChainLeg {
    role: EvacuationRole;
    level: FacilityLevel;
    facilityId: string;
    facilityName: string;
    etaMinutes: number;
    cumulativeMinutes: number;
    timelineCompliance: boolean;  // cumulativeMinutes <= stage deadline
}

export interface TimelineCompliance {
    role1Compliant: boolean;
    role2Compliant: boolean;
    survivalCompliant: boolean;
}

interface DecisionBase {
    patientId: string;
    incidentType: IncidentType;
    reasoningCode: ReasoningCode;
    reasoning: string;
    decidedAt: string;
}

export interface ForfeitDecision extends DecisionBase {
    action: DecisionAction.FORFEIT;
    destination: null;
    evacuationChain: ChainLeg[];  // Non-empty only for DEAD_ON_ARRIVAL (diagnostic)
    totalTimeMinutes?: number;
    survivalWindowMinutes?: number;
}

export interface SingleDestinationTransfer extends DecisionBase {
    action: DecisionAction.TRANSFER;
    mode: DecisionMode.SINGLE_DESTINATION;
    destination: FacilityChoice;
    alternatives: FacilityChoice[];
    solverStatus: string;
    fallbackReason?: string;
}

export interface EvacuationChainTransfer extends DecisionBase {
    action: DecisionAction.TRANSFER;
    mode: DecisionMode.EVACUATION_CHAIN;
    destination: null;
    evacuationChain: ChainLeg[];
    totalTimeMinutes: number;
    survivalWindowMinutes: number;
    timelineCompliance: TimelineCompliance;
}

export type TransferDecision = ForfeitDecision | SingleDestinationTransfer | EvacuationChainTransfer;
