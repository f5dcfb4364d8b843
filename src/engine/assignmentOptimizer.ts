// src/engine/assignmentOptimizer.ts

import { Patient } from '../models/Patient';
import { Facility } from '../models/Facility';
import { TransportMode } from '../models/Incident';
import { DecisionAction, FacilityChoice, ReasoningCode } from '../models/Decision';
import { OptimizationRules } from '../config/optimizationRules';
import { calculateEtaMinutes, toCoordinates } from './distanceCalculator';
import {
    evaluateCapabilities,
    getAcuityWeight,
    isDeceased,
    scorePairing,
    survivalSlackMinutes
} from './costModel';
import {
    IntegerProgram,
    LinearConstraint,
    SolveResult,
    SolverBackend,
    SolverStatus,
    emptyResult,
    isSolved
} from './solvers/integerProgram';

/**
 * Per-patient outcome of one optimizer run
 */
export interface PatientAssignment {
    patientId: string;
    action: DecisionAction;
    reasoningCode: ReasoningCode;
    destination: FacilityChoice | null;
    alternatives: FacilityChoice[];
    solverStatus: SolverStatus | null;  // null when resolved by pre-filtering
    fallbackReason?: string;
}

export interface AssignmentOptimizerOptions {
    rules: OptimizationRules;
    backend: SolverBackend | null;  // null = solver unavailable, greedy only
    now: Date;
    mode?: TransportMode;
}

/**
 * patient id → facility ids forced to 0
 */
export type ExclusionMap = Map<string, Set<string>>;

interface PairVariable {
    name: string;
    patientIndex: number;
    facilityIndex: number;
}

interface BuiltProgram {
    program: IntegerProgram;
    pairs: PairVariable[];
}

function forfeit(patientId: string, reasoningCode: ReasoningCode): PatientAssignment {
    return {
        patientId,
        action: DecisionAction.FORFEIT,
        reasoningCode,
        destination: null,
        alternatives: [],
        solverStatus: null
    };
}

/**
 * Capacitated patient-to-facility assignment (MCI / PHE mode)
 *
 * Binary x[p,f] per reachable pair, minimising Σ cost(p,f)·x[p,f] subject to:
 * 1. Σ_f x[p,f] = 1 for every active patient
 * 2. x[p,f] = 0 for excluded pairs (alternative generation)
 * 3. Σ_p required(p,r)·x[p,f] <= capacity(f,r) for every facility and tracked resource
 *
 * Capacity is shared across the whole batch. Facilities are never mutated.
 */
export class AssignmentOptimizer {
    private facilities: Facility[];
    private rules: OptimizationRules;
    private backend: SolverBackend | null;
    private now: Date;
    private mode: TransportMode;

    constructor(facilities: Facility[], options: AssignmentOptimizerOptions) {
        this.facilities = facilities;
        this.rules = options.rules;
        this.backend = options.backend;
        this.now = options.now;
        this.mode = options.mode ?? TransportMode.GROUND;
    }

    /**
     * Assign every patient in the batch
     *
     * Steps:
     * 1. Pre-filter patients that must forfeit (deceased, expired, unreachable)
     * 2. One pooled solve over the remaining patients
     * 3. Extract assignments and generate alternatives, or fall back to greedy
     *
     * @param patients Triaged patients
     * @returns patient id → assignment, in input order
     */
    solve(patients: Patient[]): Map<string, PatientAssignment> {
        const results = new Map<string, PatientAssignment>();
        const active: Patient[] = [];

        // Step 1: Pre-filter
        for (const patient of patients) {
            const rejection = this.prefilter(patient);
            if (rejection) {
                results.set(patient.id, forfeit(patient.id, rejection));
            } else {
                active.push(patient);
            }
        }

        if (active.length === 0) {
            return results;
        }

        // Step 2: Pooled solve
        const costs = this.buildCostMatrix(active);
        const primary = this.buildProgram(active, costs, new Map());
        const outcome = this.runBackend(primary.program);

        // Step 3a: Solver failed → greedy per patient, shared capacity ignored
        if (!isSolved(outcome.status)) {
            console.warn(
                `[AssignmentOptimizer] Solver returned ${outcome.status}; greedy fallback for ${active.length} patient(s)`
            );
            for (const patient of active) {
                results.set(patient.id, this.greedyAssign(patient, outcome.status));
            }
            return this.ordered(patients, results);
        }

        // Step 3b: Extract solution
        const assigned = this.extractAssignments(primary.pairs, outcome);
        active.forEach((patient, patientIndex) => {
            const facilityIndex = assigned.get(patientIndex);
            if (facilityIndex === undefined) {
                results.set(patient.id, forfeit(patient.id, ReasoningCode.NO_FACILITIES_AVAILABLE));
                return;
            }

            const facility = this.facilities[facilityIndex];
            results.set(patient.id, {
                patientId: patient.id,
                action: DecisionAction.TRANSFER,
                reasoningCode: ReasoningCode.TRANSFER_OPTIMAL,
                destination: this.toChoice(patient, facility),
                alternatives: this.findAlternatives(active, costs, patientIndex, facility),
                solverStatus: outcome.status
            });
        });

        return this.ordered(patients, results);
    }

    /**
     * Build the integer program for a batch
     *
     * Pairs with an infinite cost (no location on either side) get no variable,
     * which is the same as fixing them to 0.
     *
     * @param active Patients to assign
     * @param costs costs[p][f] from buildCostMatrix
     * @param exclusions Pairs forced to 0
     */
    buildProgram(active: Patient[], costs: number[][], exclusions: ExclusionMap): BuiltProgram {
        const pairs: PairVariable[] = [];
        const variables: IntegerProgram['variables'] = [];
        const constraints: LinearConstraint[] = [];
        const pairIndex = new Map<string, PairVariable>();

        active.forEach((_patient, patientIndex) => {
            this.facilities.forEach((_facility, facilityIndex) => {
                const cost = costs[patientIndex][facilityIndex];
                if (!Number.isFinite(cost)) {
                    return;
                }
                const pair = { name: `x_${patientIndex}_${facilityIndex}`, patientIndex, facilityIndex };
                pairs.push(pair);
                pairIndex.set(pair.name, pair);
                variables.push({ name: pair.name, cost });
            });
        });

        // Constraint 1: exactly one facility per patient
        active.forEach((_patient, patientIndex) => {
            const terms = pairs
                .filter(pair => pair.patientIndex === patientIndex)
                .map(pair => ({ variable: pair.name, coefficient: 1 }));
            if (terms.length > 0) {
                constraints.push({ name: `assign_${patientIndex}`, terms, sense: '=', rhs: 1 });
            }
        });

        // Constraint 2: exclusions
        active.forEach((patient, patientIndex) => {
            const excluded = exclusions.get(patient.id);
            if (!excluded) {
                return;
            }
            this.facilities.forEach((facility, facilityIndex) => {
                const name = `x_${patientIndex}_${facilityIndex}`;
                if (excluded.has(facility.id) && pairIndex.has(name)) {
                    constraints.push({
                        name: `exclude_${patientIndex}_${facilityIndex}`,
                        terms: [{ variable: name, coefficient: 1 }],
                        sense: '=',
                        rhs: 0
                    });
                }
            });
        });

        // Constraint 3: shared resource capacity
        this.facilities.forEach((facility, facilityIndex) => {
            const capacities = facility.resources;
            if (!capacities) {
                return;
            }
            this.rules.resourceCatalog.forEach((resource, resourceIndex) => {
                const capacity = capacities[resource] ?? 0;
                const terms = active.flatMap((patient, patientIndex) => {
                    const required = patient.requiredResources?.[resource] ?? 0;
                    const name = `x_${patientIndex}_${facilityIndex}`;
                    return required > 0 && pairIndex.has(name) ? [{ variable: name, coefficient: required }] : [];
                });
                if (terms.length > 0) {
                    constraints.push({
                        name: `capacity_${facilityIndex}_${resourceIndex}`,
                        terms,
                        sense: '<=',
                        rhs: capacity
                    });
                }
            });
        });

        return { program: { variables, constraints }, pairs };
    }

    /**
     * costs[p][f] with the stewardship term active
     */
    buildCostMatrix(active: Patient[]): number[][] {
        return active.map(patient =>
            this.facilities.map(facility =>
                scorePairing(patient, facility, patient.location, this.rules, {
                    mode: this.mode,
                    includeStewardship: true
                }).total
            )
        );
    }

    /**
     * Re-solve with the chosen facilities excluded for one patient
     *
     * Order is discovery order. Stops early on a non-solved status or when the
     * patient ends up without an assignment.
     */
    private findAlternatives(
        active: Patient[],
        costs: number[][],
        patientIndex: number,
        chosen: Facility
    ): FacilityChoice[] {
        const patient = active[patientIndex];
        const alternatives: FacilityChoice[] = [];
        const excludedForPatient = new Set<string>([chosen.id]);
        const exclusions: ExclusionMap = new Map([[patient.id, excludedForPatient]]);

        for (let attempt = 0; attempt < this.rules.maxAlternatives; attempt++) {
            const { program, pairs } = this.buildProgram(active, costs, exclusions);
            const outcome = this.runBackend(program);
            if (!isSolved(outcome.status)) {
                break;
            }

            const facilityIndex = this.extractAssignments(pairs, outcome).get(patientIndex);
            if (facilityIndex === undefined) {
                break;
            }

            const facility = this.facilities[facilityIndex];
            if (excludedForPatient.has(facility.id)) {
                break;  // Backend ignored the exclusion
            }
            alternatives.push(this.toChoice(patient, facility));
            excludedForPatient.add(facility.id);
        }

        return alternatives;
    }

    /**
     * Deterministic fallback: cheapest facility per patient on its own
     * (ETA × acuity weight + capability penalty). Never throws.
     */
    private greedyAssign(patient: Patient, status: SolverStatus): PatientAssignment {
        const weight = getAcuityWeight(patient.acuity, this.rules);
        let best: Facility | null = null;
        let bestCost = Infinity;

        for (const facility of this.facilities) {
            const eta = calculateEtaMinutes(patient.location, facility.location, this.mode, this.rules);
            if (!Number.isFinite(eta)) {
                continue;
            }
            const cost = eta * weight + evaluateCapabilities(patient, facility, this.rules).penalty;
            if (cost < bestCost) {
                bestCost = cost;
                best = facility;
            }
        }

        if (!best) {
            return { ...forfeit(patient.id, ReasoningCode.NO_FACILITIES_AVAILABLE), solverStatus: status };
        }

        return {
            patientId: patient.id,
            action: DecisionAction.TRANSFER,
            reasoningCode: ReasoningCode.TRANSFER_FALLBACK,
            destination: this.toChoice(patient, best),
            alternatives: [],
            solverStatus: status,
            fallbackReason: `Solver returned ${status}`
        };
    }

    private prefilter(patient: Patient): ReasoningCode | null {
        if (isDeceased(patient)) {
            return ReasoningCode.PATIENT_DECEASED;
        }

        const slack = survivalSlackMinutes(patient, this.now, this.rules);
        if (slack <= 0) {
            return ReasoningCode.PATIENT_DECEASED;
        }

        if (!toCoordinates(patient.location)) {
            return ReasoningCode.NO_LOCATION;
        }

        const reachable = this.facilities.some(
            facility => calculateEtaMinutes(patient.location, facility.location, this.mode, this.rules) < slack
        );
        return reachable ? null : ReasoningCode.DEAD_ON_ARRIVAL_ALL_FACILITIES;
    }

    private runBackend(program: IntegerProgram): SolveResult {
        if (!this.backend) {
            return emptyResult(SolverStatus.UNAVAILABLE);
        }
        try {
            return this.backend.solve(program);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[AssignmentOptimizer] ${this.backend.name} threw: ${message}`);
            return emptyResult(SolverStatus.ABNORMAL);
        }
    }

    private extractAssignments(pairs: PairVariable[], outcome: SolveResult): Map<number, number> {
        const assigned = new Map<number, number>();
        for (const pair of pairs) {
            if ((outcome.values.get(pair.name) ?? 0) > 0.5 && !assigned.has(pair.patientIndex)) {
                assigned.set(pair.patientIndex, pair.facilityIndex);
            }
        }
        return assigned;
    }

    private toChoice(patient: Patient, facility: Facility): FacilityChoice {
        return {
            facilityId: facility.id,
            facilityName: facility.name,
            etaMinutes: calculateEtaMinutes(patient.location, facility.location, this.mode, this.rules)
        };
    }

    private ordered(
        patients: Patient[],
        results: Map<string, PatientAssignment>
    ): Map<string, PatientAssignment> {
        const ordered = new Map<string, PatientAssignment>();
        for (const patient of patients) {
            const result = results.get(patient.id);
            if (result) {
                ordered.set(patient.id, result);
            }
        }
        return ordered;
    }
}
