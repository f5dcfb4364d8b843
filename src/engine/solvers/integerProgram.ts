// src/engine/solvers/integerProgram.ts

/**
 * Solver capability abstraction
 *
 * The assignment optimizer only talks to SolverBackend, so the integer
 * programming backend (HiGHS, a test stand-in, anything else) is swappable
 * without touching the cost model or the chain builder.
 */

export enum SolverStatus {
    OPTIMAL = 'OPTIMAL',
    FEASIBLE = 'FEASIBLE',
    INFEASIBLE = 'INFEASIBLE',
    UNBOUNDED = 'UNBOUNDED',
    ABNORMAL = 'ABNORMAL',
    NOT_SOLVED = 'NOT_SOLVED',
    UNAVAILABLE = 'UNAVAILABLE'   // No backend configured
}

/**
 * 0/1 decision variable with its objective coefficient
 */
export interface BinaryVariable {
    name: string;
    cost: number;
}

export interface ConstraintTerm {
    variable: string;
    coefficient: number;
}

export type ConstraintSense = '=' | '<=';

export interface LinearConstraint {
    name: string;
    terms: ConstraintTerm[];
    sense: ConstraintSense;
    rhs: number;
}

/**
 * Minimisation problem over binary variables
 */
export interface IntegerProgram {
    variables: BinaryVariable[];
    constraints: LinearConstraint[];
}

export interface SolveResult {
    status: SolverStatus;
    values: Map<string, number>;  // Empty unless status is OPTIMAL or FEASIBLE
    objectiveValue: number | null;
}

export interface SolverBackend {
    readonly name: string;
    solve(program: IntegerProgram): SolveResult;
}

export function isSolved(status: SolverStatus): boolean {
    return status === SolverStatus.OPTIMAL || status === SolverStatus.FEASIBLE;
}

export function emptyResult(status: SolverStatus): SolveResult {
    return { status, values: new Map(), objectiveValue: null };
}
