// src/test/transferDecisionEngine.test.ts

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PatientAcuity } from '../models/Patient';
import { Facility, FacilityLevel } from '../models/Facility';
import { IncidentType } from '../models/Incident';
import { DecisionAction, DecisionMode, ReasoningCode } from '../models/Decision';
import { TransferDecisionEngine } from '../engine/transferDecisionEngine';
import { toRoster } from '../engine/facilityRoster';
import { SolverBackend, SolverStatus } from '../engine/solvers/integerProgram';
import {
    ReasoningContext,
    ReasoningGenerator,
    TemplateReasoningGenerator
} from '../reasoning/reasoningGenerator';
import { ExhaustiveBackend, FixedStatusBackend } from './support/exhaustiveBackend';
import { NOW, east, makeFacility, makePatient, minutesFromNow, testRules } from './support/fixtures';

function createEngine(
    facilities: Facility[],
    backend: SolverBackend | null = new ExhaustiveBackend(),
    reasoningGenerator: ReasoningGenerator = new TemplateReasoningGenerator()
): TransferDecisionEngine {
    return new TransferDecisionEngine(toRoster(facilities), {
        rules: testRules(),
        backend,
        reasoningGenerator,
        clock: () => NOW
    });
}

describe('TransferDecisionEngine', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('survival gate', () => {
        it.each([IncidentType.MASS_CASUALTY_INCIDENT, IncidentType.MEDICAL_EVACUATION])(
            'forfeits dead and expired patients in %s mode even with an empty roster',
            async incidentType => {
                const backend = new ExhaustiveBackend();
                const engine = createEngine([], backend);

                const decisions = await engine.decideBatch(
                    [
                        makePatient('dead', { acuity: PatientAcuity.DEAD }),
                        makePatient('flagged', { deceased: true }),
                        makePatient('expired', { predictedDeathAt: minutesFromNow(0) })
                    ],
                    incidentType
                );

                expect(decisions.map(d => [d.patientId, d.action, d.reasoningCode, d.reasoning])).toEqual([
                    ['dead', DecisionAction.FORFEIT, ReasoningCode.PATIENT_DECEASED, 'Patient has deceased or survival window expired'],
                    ['flagged', DecisionAction.FORFEIT, ReasoningCode.PATIENT_DECEASED, 'Patient has deceased or survival window expired'],
                    ['expired', DecisionAction.FORFEIT, ReasoningCode.PATIENT_DECEASED, 'Patient has deceased or survival window expired']
                ]);
                expect(backend.programs).toHaveLength(0);
            }
        );
    });

    describe('single destination', () => {
        const facility = makeFacility('F1', {
            location: east(20),
            capabilities: { trauma_center: true },
            resources: { ordinary_icu: 4 }
        });

        it('packages an optimal transfer with templated reasoning', async () => {
            const engine = createEngine([facility]);
            const decision = await engine.decide(
                makePatient('P1', { predictedDeathAt: minutesFromNow(90), requiredCapabilities: { trauma_center: true } })
            );

            expect(decision).toMatchObject({
                action: DecisionAction.TRANSFER,
                mode: DecisionMode.SINGLE_DESTINATION,
                patientId: 'P1',
                incidentType: IncidentType.MASS_CASUALTY_INCIDENT,
                reasoningCode: ReasoningCode.TRANSFER_OPTIMAL,
                reasoning: 'Optimal facility selected using constraint optimization (ETA: 20.0 min)',
                decidedAt: '2026-03-01T12:00:00.000Z',
                alternatives: [],
                solverStatus: SolverStatus.OPTIMAL
            });
            expect(decision.destination).toMatchObject({ facilityId: 'F1', facilityName: 'Facility F1' });
            expect(decision).not.toHaveProperty('fallbackReason');
        });

        it('explains forfeits by reasoning code', async () => {
            const engine = createEngine([facility]);
            const [lost, late] = await engine.decideBatch(
                [
                    makePatient('lost', { location: null }),
                    makePatient('late', { predictedDeathAt: minutesFromNow(15) })
                ],
                IncidentType.PUBLIC_HEALTH_EMERGENCY
            );

            expect(lost.reasoningCode).toBe(ReasoningCode.NO_LOCATION);
            expect(lost.reasoning).toBe('Patient location unknown');
            expect(late.reasoningCode).toBe(ReasoningCode.DEAD_ON_ARRIVAL_ALL_FACILITIES);
            expect(late.reasoning).toBe('Patient cannot be transferred (DEAD_ON_ARRIVAL_ALL_FACILITIES)');
        });

        it('records the fallback reason when the solver fails', async () => {
            vi.spyOn(console, 'warn').mockImplementation(() => undefined);
            const engine = createEngine([facility], new FixedStatusBackend(SolverStatus.NOT_SOLVED));

            const decision = await engine.decide(makePatient('P1'));

            expect(decision).toMatchObject({
                action: DecisionAction.TRANSFER,
                reasoningCode: ReasoningCode.TRANSFER_FALLBACK,
                solverStatus: SolverStatus.NOT_SOLVED,
                fallbackReason: 'Solver returned NOT_SOLVED'
            });
        });

        it('shares capacity across a batch', async () => {
            const engine = createEngine([
                makeFacility('F1', { location: east(10), resources: { ordinary_icu: 1 } }),
                makeFacility('F2', { location: east(40), resources: { ordinary_icu: 5 } })
            ]);

            const decisions = await engine.decideBatch([
                makePatient('P1', { requiredResources: { ordinary_icu: 1 } }),
                makePatient('P2', { acuity: PatientAcuity.DELAYED, requiredResources: { ordinary_icu: 1 } })
            ]);

            expect(decisions.map(d => (d.action === DecisionAction.TRANSFER ? d.destination?.facilityId : null))).toEqual([
                'F1',
                'F2'
            ]);
        });
    });

    describe('reasoning enrichment', () => {
        const facility = makeFacility('F1', { location: east(20) });

        it('uses the generator text and hands it the decision context', async () => {
            const generate = vi.fn(async (_context: ReasoningContext) => 'Closest definitive care.');
            const engine = createEngine([facility], new ExhaustiveBackend(), { generate });

            const decision = await engine.decide(makePatient('P1'));

            expect(decision.reasoning).toBe('Closest definitive care.');
            expect(generate).toHaveBeenCalledTimes(1);
            const context = generate.mock.calls[0][0];
            expect(context.destination.id).toBe('F1');
            expect(context.solverStatus).toBe(SolverStatus.OPTIMAL);
            expect(context.distanceKm).toBeCloseTo(16.6667, 3);
        });

        it('keeps the decision and falls back to the template when the generator rejects', async () => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
            const engine = createEngine([facility], new ExhaustiveBackend(), {
                generate: async () => {
                    throw new Error('upstream 503');
                }
            });

            const decision = await engine.decide(makePatient('P1'));

            expect(decision.action).toBe(DecisionAction.TRANSFER);
            expect(decision.reasoningCode).toBe(ReasoningCode.TRANSFER_OPTIMAL);
            expect(decision.reasoning).toBe('Optimal facility selected using constraint optimization (ETA: 20.0 min)');
            expect(warn).toHaveBeenCalledWith('[TransferDecisionEngine] Reasoning failed for P1: upstream 503');
        });
    });

    describe('MEDEVAC', () => {
        const chainRoster = [
            makeFacility('R1', { level: FacilityLevel.INITIAL_STABILIZATION, location: east(20) }),
            makeFacility('R2', { level: FacilityLevel.ADVANCED_TRAUMA, location: east(50) }),
            makeFacility('R3', { level: FacilityLevel.DEFINITIVE_CARE, location: east(90) })
        ];

        it('builds a chain transfer', async () => {
            const engine = createEngine(chainRoster);
            const decision = await engine.decide(
                makePatient('P1', { predictedDeathAt: minutesFromNow(240) }),
                IncidentType.MEDICAL_EVACUATION
            );

            expect(decision).toMatchObject({
                action: DecisionAction.TRANSFER,
                mode: DecisionMode.EVACUATION_CHAIN,
                reasoningCode: ReasoningCode.EVACUATION_CHAIN_OPTIMAL,
                reasoning: 'NATO-compliant evacuation chain constructed (3 facilities, total time: 90.0 min)',
                destination: null,
                survivalWindowMinutes: 240,
                timelineCompliance: { role1Compliant: true, role2Compliant: true, survivalCompliant: true }
            });
        });

        it('forfeits with the chain when the survival window is too short', async () => {
            const engine = createEngine([
                makeFacility('R1', { level: FacilityLevel.INITIAL_STABILIZATION, location: east(45) }),
                makeFacility('R2', { level: FacilityLevel.ADVANCED_TRAUMA, location: east(115) })
            ]);

            const decision = await engine.decide(
                makePatient('P1', { predictedDeathAt: minutesFromNow(100) }),
                IncidentType.MEDICAL_EVACUATION
            );

            expect(decision.action).toBe(DecisionAction.FORFEIT);
            expect(decision.reasoningCode).toBe(ReasoningCode.DEAD_ON_ARRIVAL);
            expect(decision.reasoning).toBe(
                'Patient will not survive evacuation chain (requires 115.0 min, survival window: 100.0 min)'
            );
            if (decision.action === DecisionAction.FORFEIT) {
                expect(decision.evacuationChain.map(leg => leg.facilityId)).toEqual(['R1', 'R2']);
                expect(decision.survivalWindowMinutes).toBe(100);
            }
        });

        it('forfeits with NO_VIABLE_CHAIN when no echelon is reachable', async () => {
            const engine = createEngine([
                makeFacility('R1', { level: FacilityLevel.INITIAL_STABILIZATION, location: east(70) })
            ]);

            const decision = await engine.decide(
                makePatient('P1', { predictedDeathAt: minutesFromNow(50) }),
                IncidentType.MEDICAL_EVACUATION
            );

            expect(decision).toMatchObject({
                action: DecisionAction.FORFEIT,
                reasoningCode: ReasoningCode.NO_VIABLE_CHAIN,
                reasoning: 'Unable to construct viable evacuation chain within survival window',
                evacuationChain: []
            });
        });
    });
});
