import z from 'zod';

import { Allocation, CellPosition, EnteringCell, LoopCell, OpportunityCostTable, Potentials, Problem } from './types';

export const tieBreakSchema = z.enum(['lowest-index', 'highest-index']);

export type TieBreak = z.infer<typeof tieBreakSchema>;

export const solverConfigSchema = z.object({
    tolerance: z.number().positive().default(1e-9),
    iterationLimitFactor: z.number().int().positive().default(10), // cap = factor * m * n
    maxIterations: z.number().int().nonnegative().optional(), // overrides the factor when set
    enteringTieBreak: tieBreakSchema.default('lowest-index'),
    leavingTieBreak: tieBreakSchema.default('lowest-index'),
});

export type SolverConfig = z.infer<typeof solverConfigSchema>;

export const resolveSolverConfig = (config: Partial<SolverConfig> = {}): SolverConfig =>
    solverConfigSchema.parse(config);

/** Starting point produced by the north-west corner rule */
export interface InitialRecord {
    readonly allocation: Allocation;
    readonly basicCells: CellPosition[];
    readonly totalCost: number;
}

/** One closed-loop reallocation of the MODI method */
export interface IterationRecord {
    readonly iteration: number;
    readonly entering: EnteringCell;
    readonly potentials: Potentials;
    readonly loop: LoopCell[];
    readonly theta: number;
    readonly leaving: CellPosition;
    readonly allocation: Allocation;
    readonly basicCells: CellPosition[];
    readonly totalCost: number;
}

export interface TransportationSolution {
    allocation: Allocation;
    totalCost: number;
}

export interface SolveResult extends TransportationSolution {
    status: 'optimal';
    basicCells: CellPosition[];
    potentials: Potentials;
    opportunityCosts: OpportunityCostTable;
    initial: InitialRecord;
    iterations: IterationRecord[];
}

export interface TransportationAlgorithm<T extends TransportationSolution = TransportationSolution> {
    readonly name: string;
    solve: (problem: Problem, config?: Partial<SolverConfig>) => T;
}

export const isSolveResult = (solution: TransportationSolution): solution is SolveResult =>
    'status' in solution && solution.status === 'optimal';
