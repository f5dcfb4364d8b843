// src/models/TransferRecord.ts

import { IncidentType } from './Incident';
import { Patient } from './Patient';
import { TransferDecision } from './Decision';

/**
 * Transfer lifecycle states
 *
 * Valid transitions:
 * - UNASSIGNED (terminal, decision was Forfeit)
 * - AWAITING_TRANSFER → IN_TRANSFER (dispatch)
 * - IN_TRANSFER → ARRIVED (arrival at destination)
 */
export enum TransferStatus {
    UNASSIGNED = 'Unassigned',
    AWAITING_TRANSFER = 'Awaiting Transfer',
    IN_TRANSFER = 'In-Transfer',
    ARRIVED = 'Arrived'
}

/**
 * Service-side record of one patient's decision
 *
 * The decision itself is never mutated after it is returned by the engine;
 * only the lifecycle fields change.
 */
export interface TransferRecord {
    patient: Patient;
    incidentType: IncidentType;
    decision: TransferDecision;
    status: TransferStatus;
    assignedFacilityId: string | null;
    dispatchedAt: Date | null;
    arrivedAt: Date | null;
}
