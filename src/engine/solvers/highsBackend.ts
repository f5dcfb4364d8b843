// src/engine/solvers/highsBackend.ts

import highsLoader from 'highs';
import {
    ConstraintTerm,
    IntegerProgram,
    SolveResult,
    SolverBackend,
    SolverStatus,
    emptyResult
} from './integerProgram';

type Highs = Awaited<ReturnType<typeof highsLoader>>;

export interface HighsBackendOptions {
    timeLimitSeconds: number;
}

const TERMS_PER_LINE = 8;

/**
 * Fixed-point rendering; LP readers reject exponent notation
 */
export function formatCoefficient(value: number): string {
    return Number(value.toFixed(6)).toString();
}

function formatExpression(terms: ConstraintTerm[]): string {
    const lines: string[] = [];
    let current = '';

    terms.forEach((term, index) => {
        const magnitude = formatCoefficient(Math.abs(term.coefficient));
        const negative = term.coefficient < 0;
        let token: string;
        if (index === 0) {
            token = `${negative ? '- ' : ''}${magnitude} ${term.variable}`;
        } else {
            token = `${negative ? '-' : '+'} ${magnitude} ${term.variable}`;
        }

        if (index > 0 && index % TERMS_PER_LINE === 0) {
            lines.push(current);
            current = token;
        } else {
            current = current ? `${current} ${token}` : token;
        }
    });
    lines.push(current);

    return lines.join('\n   ');
}

/**
 * Serialise an IntegerProgram to CPLEX LP text
 *
 * Constraints without terms are dropped (nothing to bind).
 */
export function toLpFormat(program: IntegerProgram): string {
    const objective = formatExpression(
        program.variables.map(v => ({ variable: v.name, coefficient: v.cost }))
    );

    const constraints = program.constraints
        .filter(c => c.terms.length > 0)
        .map(c => ` ${c.name}: ${formatExpression(c.terms)} ${c.sense} ${formatCoefficient(c.rhs)}`);

    const bounds = program.variables.map(v => ` 0 <= ${v.name} <= 1`);
    const integers = program.variables.map(v => v.name).join(' ');

    return [
        'Minimize',
        ` obj: ${objective}`,
        'Subject To',
        ...constraints,
        'Bounds',
        ...bounds,
        'General',
        ` ${integers}`,
        'End'
    ].join('\n');
}

/**
 * Map a HiGHS model status string onto SolverStatus
 * A hit time limit is NOT_SOLVED so the caller falls back to greedy
 */
export function mapHighsStatus(status: string): SolverStatus {
    switch (status) {
        case 'Optimal':
            return SolverStatus.OPTIMAL;
        case 'Infeasible':
            return SolverStatus.INFEASIBLE;
        case 'Unbounded':
        case 'Primal infeasible or unbounded':
            return SolverStatus.UNBOUNDED;
        case 'Not Set':
        case 'Load error':
        case 'Model error':
        case 'Presolve error':
        case 'Solve error':
        case 'Postsolve error':
            return SolverStatus.ABNORMAL;
        default:
            return SolverStatus.NOT_SOLVED;
    }
}

/**
 * HiGHS mixed-integer backend (WebAssembly build, runs in process)
 *
 * solve() is a single blocking call bounded by timeLimitSeconds.
 * Solver errors are reported as ABNORMAL, never thrown.
 */
export class HighsBackend implements SolverBackend {
    readonly name = 'highs';
    private highs: Highs;
    private timeLimitSeconds: number;

    constructor(highs: Highs, options: HighsBackendOptions) {
        this.highs = highs;
        this.timeLimitSeconds = options.timeLimitSeconds;
    }

    solve(program: IntegerProgram): SolveResult {
        if (program.variables.length === 0) {
            return { status: SolverStatus.OPTIMAL, values: new Map(), objectiveValue: 0 };
        }

        let solution: ReturnType<Highs['solve']>;
        try {
            solution = this.highs.solve(toLpFormat(program), { time_limit: this.timeLimitSeconds });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[HighsBackend] solve failed: ${message}`);
            return emptyResult(SolverStatus.ABNORMAL);
        }

        const rawStatus: string = solution.Status;
        const status = mapHighsStatus(rawStatus);
        if (status !== SolverStatus.OPTIMAL) {
            return emptyResult(status);
        }

        const values = new Map<string, number>();
        for (const [name, column] of Object.entries(solution.Columns)) {
            if ('Primal' in column && typeof column.Primal === 'number') {
                values.set(name, column.Primal);
            }
        }

        const objectiveValue =
            'ObjectiveValue' in solution && typeof solution.ObjectiveValue === 'number'
                ? solution.ObjectiveValue
                : null;

        return { status, values, objectiveValue };
    }
}

/**
 * Load the HiGHS WebAssembly module once and wrap it
 */
export async function createHighsBackend(options: HighsBackendOptions): Promise<HighsBackend> {
    const highs = await highsLoader();
    return new HighsBackend(highs, options);
}
