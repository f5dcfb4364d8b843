// src/events/transferDispatchHandler.ts

import { Patient } from '../models/Patient';
import { Facility } from '../models/Facility';
import { IncidentType } from '../models/Incident';
import { DecisionAction, DecisionMode, TransferDecision } from '../models/Decision';
import { TransferRecord, TransferStatus } from '../models/TransferRecord';

/**
 * Facility a decision sends the patient to
 * Single mode: the destination; chain mode: the final leg
 */
export function finalFacilityId(decision: TransferDecision): string | null {
    if (decision.action === DecisionAction.FORFEIT) {
        return null;
    }
    if (decision.mode === DecisionMode.SINGLE_DESTINATION) {
        return decision.destination.facilityId;
    }
    const lastLeg = decision.evacuationChain[decision.evacuationChain.length - 1];
    return lastLeg ? lastLeg.facilityId : null;
}

/**
 * Open the lifecycle record for a fresh decision
 *
 * Transfer → AWAITING_TRANSFER, Forfeit → UNASSIGNED (terminal)
 */
export function openTransferRecord(
    patient: Patient,
    incidentType: IncidentType,
    decision: TransferDecision
): TransferRecord {
    const facilityId = finalFacilityId(decision);
    return {
        patient,
        incidentType,
        decision,
        status: facilityId ? TransferStatus.AWAITING_TRANSFER : TransferStatus.UNASSIGNED,
        assignedFacilityId: facilityId,
        dispatchedAt: null,
        arrivedAt: null
    };
}

/**
 * Handle transfer dispatch event
 *
 * State transition: AWAITING_TRANSFER → IN_TRANSFER
 *
 * Side effects:
 * 1. Consume the patient's required resources at the receiving facility (floored at 0)
 * 2. Register the patient in the facility's acceptedPatients
 *
 * This is the only place facility capacity changes; decisions in flight
 * keep the snapshot they were made with.
 *
 * @returns Receiving facility after the update
 */
export function handleTransferDispatch(
    record: TransferRecord,
    roster: Map<string, Facility>,
    now: Date = new Date()
): Facility {
    // Validate current state
    if (record.status !== TransferStatus.AWAITING_TRANSFER) {
        throw new Error(`Cannot dispatch patient ${record.patient.id} with status ${record.status}`);
    }

    if (!record.assignedFacilityId) {
        throw new Error(`Patient ${record.patient.id} awaiting transfer but has no assigned facility`);
    }

    const facility = roster.get(record.assignedFacilityId);
    if (!facility) {
        throw new Error(`Facility ${record.assignedFacilityId} is no longer in the roster`);
    }

    // Consume resources
    const required = record.patient.requiredResources ?? {};
    const available = facility.resources;
    if (available) {
        for (const [resource, quantity] of Object.entries(required)) {
            const current = available[resource];
            if (quantity === undefined || quantity <= 0 || current === undefined) {
                continue;
            }
            available[resource] = Math.max(0, current - quantity);
        }
    }

    if (!facility.acceptedPatients.includes(record.patient.id)) {
        facility.acceptedPatients.push(record.patient.id);
    }

    // Update record state
    record.status = TransferStatus.IN_TRANSFER;
    record.dispatchedAt = now;

    console.log(`[TransferDispatch] Patient ${record.patient.id} dispatched to ${facility.id}`);
    return facility;
}

/**
 * Handle patient arrival event
 *
 * State transition: IN_TRANSFER → ARRIVED
 */
export function handlePatientArrival(record: TransferRecord, now: Date = new Date()): void {
    if (record.status !== TransferStatus.IN_TRANSFER) {
        throw new Error(`Cannot record arrival for patient ${record.patient.id} with status ${record.status}`);
    }

    record.status = TransferStatus.ARRIVED;
    record.arrivedAt = now;
}
