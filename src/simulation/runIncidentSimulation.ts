// src/simulation/runIncidentSimulation.ts

import { join } from 'path';
import { Patient, PatientAcuity } from '../models/Patient';
import { IncidentType } from '../models/Incident';
import { DecisionAction, DecisionMode, TransferDecision } from '../models/Decision';
import { TransferRecord } from '../models/TransferRecord';
import { resolveRules } from '../config/optimizationRules';
import { loadFacilityRoster } from '../engine/facilityRoster';
import { TransferDecisionEngine } from '../engine/transferDecisionEngine';
import { createHighsBackend } from '../engine/solvers/highsBackend';
import { TemplateReasoningGenerator } from '../reasoning/reasoningGenerator';
import {
    handlePatientArrival,
    handleTransferDispatch,
    openTransferRecord
} from '../events/transferDispatchHandler';

/**
 * Incident simulation
 *
 * Demonstrates:
 * - Pooled MCI assignment with shared ICU capacity
 * - Forfeit paths (deceased, no location, expired window)
 * - MEDEVAC Role 1 → 2 → 3 chain
 * - Dispatch bookkeeping shrinking capacity for the next batch
 */

// Logging helpers
function log(message: string): void {
    console.log(`[${new Date().toISOString()}] ${message}`);
}

function logSection(title: string): void {
    console.log('\n' + '='.repeat(80));
    console.log(title);
    console.log('='.repeat(80) + '\n');
}

function logDecision(decision: TransferDecision): void {
    if (decision.action === DecisionAction.FORFEIT) {
        console.log(`  ✗ ${decision.patientId}: Forfeit (${decision.reasoningCode})`);
        console.log(`    ${decision.reasoning}`);
        return;
    }

    if (decision.mode === DecisionMode.SINGLE_DESTINATION) {
        console.log(
            `  ✓ ${decision.patientId}: ${decision.destination.facilityName} ` +
                `(ETA ${decision.destination.etaMinutes.toFixed(1)} min, ${decision.reasoningCode}, solver ${decision.solverStatus})`
        );
        for (const alternative of decision.alternatives) {
            console.log(`    alt: ${alternative.facilityName} (ETA ${alternative.etaMinutes.toFixed(1)} min)`);
        }
        return;
    }

    console.log(`  ✓ ${decision.patientId}: evacuation chain, ${decision.totalTimeMinutes.toFixed(1)} min total`);
    for (const leg of decision.evacuationChain) {
        const flag = leg.timelineCompliance ? 'on time' : 'LATE';
        console.log(
            `    ${leg.role} → ${leg.facilityName} (+${leg.etaMinutes.toFixed(1)} = ${leg.cumulativeMinutes.toFixed(1)} min, ${flag})`
        );
    }
}

function minutesFromNow(now: Date, minutes: number): string {
    return new Date(now.getTime() + minutes * 60000).toISOString();
}

async function runSimulation(): Promise<void> {
    logSection('INCIDENT SIMULATION - START');

    const now = new Date();
    const rules = resolveRules();
    const roster = loadFacilityRoster(join(__dirname, '..', '..', 'data', 'facilities.json'));
    const backend = await createHighsBackend({ timeLimitSeconds: rules.solverTimeLimitSeconds });
    const engine = new TransferDecisionEngine(roster, {
        rules,
        backend,
        reasoningGenerator: new TemplateReasoningGenerator(),
        clock: () => now
    });
    const records = new Map<string, TransferRecord>();

    // ========== STEP 1: MCI batch ==========
    logSection('STEP 1: Mass casualty batch (shared capacity)');

    const scene = { latitude: 43.6426, longitude: -79.3871 };
    const casualties: Patient[] = [
        {
            id: 'MCI-001',
            name: 'Casualty 1',
            age: 34,
            acuity: PatientAcuity.IMMEDIATE,
            location: scene,
            predictedDeathAt: minutesFromNow(now, 90),
            requiredCapabilities: { trauma_center: true, neurosurgical: true },
            requiredResources: { ordinary_icu: 1, operating_room: 1, prbc_unit: 4 }
        },
        {
            id: 'MCI-002',
            name: 'Casualty 2',
            age: 8,
            acuity: PatientAcuity.IMMEDIATE,
            location: scene,
            predictedDeathAt: minutesFromNow(now, 120),
            requiredCapabilities: { burn: true, pediatric: true },
            requiredResources: { ordinary_icu: 1, ventilator: 1 }
        },
        {
            id: 'MCI-003',
            name: 'Casualty 3',
            age: 51,
            acuity: PatientAcuity.DELAYED,
            location: scene,
            requiredCapabilities: { orthopedic: true },
            requiredResources: { ward: 1 }
        },
        {
            id: 'MCI-004',
            name: 'Casualty 4',
            age: 27,
            acuity: PatientAcuity.MINIMAL,
            location: scene,
            requiredResources: { ward: 1 }
        },
        { id: 'MCI-005', acuity: PatientAcuity.DEAD, location: scene },
        { id: 'MCI-006', acuity: PatientAcuity.DELAYED, location: null }
    ];

    const decisions = await engine.decideBatch(casualties, IncidentType.MASS_CASUALTY_INCIDENT);
    decisions.forEach((decision, i) => {
        logDecision(decision);
        records.set(casualties[i].id, openTransferRecord(casualties[i], IncidentType.MASS_CASUALTY_INCIDENT, decision));
    });

    // ========== STEP 2: Dispatch and arrival ==========
    logSection('STEP 2: Dispatching awaiting transfers');

    for (const record of records.values()) {
        if (!record.assignedFacilityId) {
            log(`${record.patient.id} not dispatched (${record.status})`);
            continue;
        }
        const facility = handleTransferDispatch(record, roster, now);
        log(`${record.patient.id} → ${facility.name}, ICU beds left: ${facility.resources?.ordinary_icu ?? 'n/a'}`);
        handlePatientArrival(record, now);
    }

    // ========== STEP 3: MEDEVAC chain ==========
    logSection('STEP 3: MEDEVAC evacuation chain');

    const evacuee: Patient = {
        id: 'EVAC-001',
        name: 'Evacuee 1',
        age: 42,
        acuity: PatientAcuity.IMMEDIATE,
        location: { latitude: 43.6205, longitude: -79.5132 },
        predictedDeathAt: minutesFromNow(now, 240),
        requiredCapabilities: { trauma_center: true },
        requiredResources: { operating_room: 1 }
    };
    logDecision(await engine.decide(evacuee, IncidentType.MEDICAL_EVACUATION));

    const expired: Patient = {
        id: 'EVAC-002',
        acuity: PatientAcuity.IMMEDIATE,
        location: evacuee.location,
        predictedDeathAt: minutesFromNow(now, -5)
    };
    logDecision(await engine.decide(expired, IncidentType.MEDICAL_EVACUATION));

    logSection('INCIDENT SIMULATION - COMPLETE');
}

runSimulation().catch((error: unknown) => {
    console.error('Simulation failed:', error instanceof Error ? error.message : error);
    process.exit(1);
});
