// src/engine/transferDecisionEngine.ts

import { Patient } from '../models/Patient';
import { Facility } from '../models/Facility';
import { IncidentType, TransportMode } from '../models/Incident';
import {
    ChainLeg,
    DecisionAction,
    DecisionMode,
    ForfeitDecision,
    ReasoningCode,
    TransferDecision
} from '../models/Decision';
import { OptimizationRules } from '../config/optimizationRules';
import { ReasoningContext, ReasoningGenerator, templateReasoning } from '../reasoning/reasoningGenerator';
import { distanceKm } from './distanceCalculator';
import { isDeceased, survivalSlackMinutes } from './costModel';
import { AssignmentOptimizer, PatientAssignment } from './assignmentOptimizer';
import { EvacuationChainBuilder } from './evacuationChainBuilder';
import { SolverBackend, SolverStatus } from './solvers/integerProgram';

export interface TransferDecisionEngineOptions {
    rules: OptimizationRules;
    backend: SolverBackend | null;
    reasoningGenerator: ReasoningGenerator;
    mode?: TransportMode;
    clock?: () => Date;
}

const DECEASED_REASONING = 'Patient has deceased or survival window expired';
const NO_LOCATION_REASONING = 'Patient location unknown';
const NO_VIABLE_CHAIN_REASONING = 'Unable to construct viable evacuation chain within survival window';

/**
 * Transfer decision orchestrator
 *
 * evaluate → Transfer | Forfeit, nothing in between.
 *
 * Steps:
 * 1. Survival gate: deceased or slack <= 0 → Forfeit PATIENT_DECEASED
 *    (neither the optimizer nor the chain builder is consulted)
 * 2. MEDEVAC → evacuation chain; MCI / PHE → capacitated assignment
 * 3. Every Transfer is passed to the reasoning generator; its failure only
 *    changes the prose
 *
 * The roster map is read fresh on every call and never mutated here.
 */
export class TransferDecisionEngine {
    private roster: Map<string, Facility>;
    private rules: OptimizationRules;
    private backend: SolverBackend | null;
    private reasoningGenerator: ReasoningGenerator;
    private mode: TransportMode;
    private clock: () => Date;

    constructor(roster: Map<string, Facility>, options: TransferDecisionEngineOptions) {
        this.roster = roster;
        this.rules = options.rules;
        this.backend = options.backend;
        this.reasoningGenerator = options.reasoningGenerator;
        this.mode = options.mode ?? TransportMode.GROUND;
        this.clock = options.clock ?? (() => new Date());
    }

    async decide(
        patient: Patient,
        incidentType: IncidentType = IncidentType.MASS_CASUALTY_INCIDENT
    ): Promise<TransferDecision> {
        const [decision] = await this.decideBatch([patient], incidentType);
        return decision;
    }

    /**
     * Decide for several patients at once
     *
     * Single-destination patients share one capacitated solve, so they compete
     * for the same beds. MEDEVAC chains are built one patient at a time.
     *
     * @returns Decisions in input order
     */
    async decideBatch(
        patients: Patient[],
        incidentType: IncidentType = IncidentType.MASS_CASUALTY_INCIDENT
    ): Promise<TransferDecision[]> {
        const now = this.clock();
        const facilities = Array.from(this.roster.values());

        if (incidentType === IncidentType.MEDICAL_EVACUATION) {
            const decisions: TransferDecision[] = [];
            for (const patient of patients) {
                decisions.push(await this.decideChain(patient, facilities, now));
            }
            return decisions;
        }

        return this.decideSingleDestination(patients, incidentType, facilities, now);
    }

    private async decideSingleDestination(
        patients: Patient[],
        incidentType: IncidentType,
        facilities: Facility[],
        now: Date
    ): Promise<TransferDecision[]> {
        const viable = patients.filter(patient => this.survives(patient, now));
        const optimizer = new AssignmentOptimizer(facilities, {
            rules: this.rules,
            backend: this.backend,
            now,
            mode: this.mode
        });
        const assignments = optimizer.solve(viable);

        const decisions: TransferDecision[] = [];
        for (const patient of patients) {
            if (!this.survives(patient, now)) {
                decisions.push(this.forfeit(patient, incidentType, ReasoningCode.PATIENT_DECEASED, DECEASED_REASONING, now));
                continue;
            }

            const assignment = assignments.get(patient.id);
            decisions.push(await this.packageAssignment(patient, incidentType, assignment, facilities, now));
        }
        return decisions;
    }

    private async packageAssignment(
        patient: Patient,
        incidentType: IncidentType,
        assignment: PatientAssignment | undefined,
        facilities: Facility[],
        now: Date
    ): Promise<TransferDecision> {
        const facility = assignment?.destination
            ? facilities.find(f => f.id === assignment.destination?.facilityId)
            : undefined;

        if (!assignment || assignment.action === DecisionAction.FORFEIT || !assignment.destination || !facility) {
            const code = assignment?.reasoningCode ?? ReasoningCode.NO_FACILITIES_AVAILABLE;
            return this.forfeit(patient, incidentType, code, this.forfeitReasoning(code), now);
        }

        const solverStatus = assignment.solverStatus ?? SolverStatus.UNAVAILABLE;
        const reasoning = await this.explain({
            patient,
            incidentType,
            mode: DecisionMode.SINGLE_DESTINATION,
            destination: facility,
            etaMinutes: assignment.destination.etaMinutes,
            distanceKm: distanceKm(patient.location, facility.location),
            alternatives: assignment.alternatives,
            solverStatus
        });

        return {
            action: DecisionAction.TRANSFER,
            mode: DecisionMode.SINGLE_DESTINATION,
            patientId: patient.id,
            incidentType,
            reasoningCode: assignment.reasoningCode,
            reasoning,
            decidedAt: now.toISOString(),
            destination: assignment.destination,
            alternatives: assignment.alternatives,
            solverStatus,
            ...(assignment.fallbackReason ? { fallbackReason: assignment.fallbackReason } : {})
        };
    }

    private async decideChain(patient: Patient, facilities: Facility[], now: Date): Promise<TransferDecision> {
        const incidentType = IncidentType.MEDICAL_EVACUATION;
        const slack = survivalSlackMinutes(patient, now, this.rules);
        if (isDeceased(patient) || slack <= 0) {
            return this.forfeit(patient, incidentType, ReasoningCode.PATIENT_DECEASED, DECEASED_REASONING, now);
        }

        const builder = new EvacuationChainBuilder(facilities, this.rules, this.mode);
        const outcome = builder.build(patient, slack);

        if (outcome.kind === 'forfeit') {
            if (outcome.reasoningCode !== ReasoningCode.DEAD_ON_ARRIVAL) {
                return this.forfeit(
                    patient,
                    incidentType,
                    outcome.reasoningCode,
                    this.forfeitReasoning(outcome.reasoningCode),
                    now
                );
            }
            return {
                ...this.forfeit(
                    patient,
                    incidentType,
                    outcome.reasoningCode,
                    `Patient will not survive evacuation chain (requires ${outcome.totalTimeMinutes.toFixed(1)} min, survival window: ${slack.toFixed(1)} min)`,
                    now
                ),
                evacuationChain: outcome.chain,
                totalTimeMinutes: outcome.totalTimeMinutes,
                survivalWindowMinutes: slack
            };
        }

        const finalLeg = outcome.chain[outcome.chain.length - 1];
        const destination = facilities.find(f => f.id === finalLeg.facilityId);
        if (!destination) {
            throw new Error(`Evacuation chain references unknown facility ${finalLeg.facilityId}`);
        }
        const reasoning = await this.explain({
            patient,
            incidentType,
            mode: DecisionMode.EVACUATION_CHAIN,
            destination,
            etaMinutes: outcome.totalTimeMinutes,
            distanceKm: this.routeDistanceKm(patient, outcome.chain, facilities),
            alternatives: [],
            solverStatus: 'GREEDY_CHAIN',
            chainLength: outcome.chain.length
        });

        return {
            action: DecisionAction.TRANSFER,
            mode: DecisionMode.EVACUATION_CHAIN,
            patientId: patient.id,
            incidentType,
            reasoningCode: outcome.reasoningCode,
            reasoning,
            decidedAt: now.toISOString(),
            destination: null,
            evacuationChain: outcome.chain,
            totalTimeMinutes: outcome.totalTimeMinutes,
            survivalWindowMinutes: slack,
            timelineCompliance: outcome.compliance
        };
    }

    /**
     * Reasoning is advisory: a rejected generator degrades to the template
     */
    private async explain(context: ReasoningContext): Promise<string> {
        try {
            return await this.reasoningGenerator.generate(context);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[TransferDecisionEngine] Reasoning failed for ${context.patient.id}: ${message}`);
            return templateReasoning(context);
        }
    }

    private survives(patient: Patient, now: Date): boolean {
        return !isDeceased(patient) && survivalSlackMinutes(patient, now, this.rules) > 0;
    }

    private forfeitReasoning(code: ReasoningCode): string {
        switch (code) {
            case ReasoningCode.PATIENT_DECEASED:
                return DECEASED_REASONING;
            case ReasoningCode.NO_LOCATION:
                return NO_LOCATION_REASONING;
            case ReasoningCode.NO_VIABLE_CHAIN:
                return NO_VIABLE_CHAIN_REASONING;
            default:
                return `Patient cannot be transferred (${code})`;
        }
    }

    private forfeit(
        patient: Patient,
        incidentType: IncidentType,
        reasoningCode: ReasoningCode,
        reasoning: string,
        now: Date
    ): ForfeitDecision {
        return {
            action: DecisionAction.FORFEIT,
            patientId: patient.id,
            incidentType,
            reasoningCode,
            reasoning,
            decidedAt: now.toISOString(),
            destination: null,
            evacuationChain: []
        };
    }

    private routeDistanceKm(patient: Patient, chain: ChainLeg[], facilities: Facility[]): number {
        let total = 0;
        let position = patient.location;
        for (const leg of chain) {
            const facility = facilities.find(f => f.id === leg.facilityId);
            if (!facility) {
                continue;
            }
            total += distanceKm(position, facility.location);
            position = facility.location;
        }
        return total;
    }
}
