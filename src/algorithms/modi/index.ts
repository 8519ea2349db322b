/**
 * @module modi-solver
 * @description
 * Entry point for the transportation solver.
 *
 * Algorithm:
 * 1. Validates shape, value ranges and balance of the instance.
 * 2. Builds an initial basic feasible solution with the north-west corner rule.
 * 3. Improves it with the Modified Distribution (MODI / u-v) method until every opportunity cost is
 *    non-negative or the iteration cap is reached.
 *
 * The solve is synchronous, deterministic and shares no state between calls.
 */

import cloneDeep from 'lodash/cloneDeep';

import { resolveSolverConfig, SolveResult, SolverConfig, TransportationAlgorithm } from '../../types/algorithm';
import { Problem } from '../../types/types';
import { calculateTotalCost } from '../../utils/matrix';
import { northWestCorner } from './northWestCorner';
import { optimize } from './optimize';
import { validateProblem } from './validateProblem';

export class ModiAlgorithm implements TransportationAlgorithm<SolveResult> {
    readonly name = 'modi';

    solve({ costs, supply, demand }: Problem, config?: Partial<SolverConfig>): SolveResult {
        const resolved = resolveSolverConfig(config);

        validateProblem(costs, supply, demand, resolved.tolerance);

        const { allocation, basicCells } = northWestCorner(supply, demand, resolved.tolerance);
        const initial = {
            allocation: cloneDeep(allocation),
            basicCells: basicCells.cells(),
            totalCost: calculateTotalCost(allocation, costs),
        };

        const outcome = optimize(costs, allocation, basicCells, resolved);

        return {
            status: 'optimal',
            allocation: outcome.allocation,
            totalCost: outcome.totalCost,
            basicCells: outcome.basicCells.cells(),
            potentials: outcome.potentials,
            opportunityCosts: outcome.opportunityCosts,
            initial,
            iterations: outcome.iterations,
        };
    }
}

export const solveTransportation = (problem: Problem, config?: Partial<SolverConfig>): SolveResult =>
    new ModiAlgorithm().solve(problem, config);

export { BasicCellSet } from './basicCellSet';
export { computePotentials } from './computePotentials';
export { findLoop } from './findLoop';
export { northWestCorner } from './northWestCorner';
export type { InitialAllocation } from './northWestCorner';
export { computeOpportunityCosts, selectEnteringCell } from './opportunityCosts';
export { getIterationLimit, optimize, shiftAlongLoop } from './optimize';
export type { OptimizationOutcome } from './optimize';
export { validateProblem } from './validateProblem';
