/**
 * @module modi-reoptimizer
 * @description
 * Drives the Modified Distribution method as an explicit state machine:
 *
 *   evaluating -> optimal    no opportunity cost below -tolerance
 *   evaluating -> failed     an improving cell exists but the iteration cap is spent
 *   evaluating -> shifting   otherwise, carrying the entering cell
 *   shifting   -> evaluating after one closed-loop reallocation
 *
 * The allocation and the basic cells are mutated in place. A shift only starts writing once its loop
 * is known, so an iteration either commits completely or the whole solve throws.
 */

import cloneDeep from 'lodash/cloneDeep';

import { NonConvergenceError } from '../../errors';
import { IterationRecord, SolverConfig, TieBreak } from '../../types/algorithm';
import {
    Allocation,
    CellPosition,
    CostMatrix,
    EnteringCell,
    LoopCell,
    OpportunityCostTable,
    Potentials,
} from '../../types/types';
import { calculateTotalCost } from '../../utils/matrix';
import { BasicCellSet } from './basicCellSet';
import { computePotentials } from './computePotentials';
import { findLoop } from './findLoop';
import { computeOpportunityCosts, selectEnteringCell } from './opportunityCosts';

type ModiState =
    | { phase: 'evaluating' }
    | { phase: 'shifting'; entering: EnteringCell; potentials: Potentials }
    | { phase: 'optimal'; potentials: Potentials; opportunityCosts: OpportunityCostTable }
    | { phase: 'failed' };

export interface OptimizationOutcome {
    allocation: Allocation;
    basicCells: BasicCellSet;
    potentials: Potentials;
    opportunityCosts: OpportunityCostTable;
    iterations: IterationRecord[];
    totalCost: number;
}

export const getIterationLimit = (
    rows: number,
    cols: number,
    { maxIterations, iterationLimitFactor }: Pick<SolverConfig, 'maxIterations' | 'iterationLimitFactor'>,
): number => maxIterations ?? iterationLimitFactor * rows * cols;

const byPosition = (a: CellPosition, b: CellPosition) => a.row - b.row || a.col - b.col;

/** Moves theta units around the loop and swaps the entering cell into the basis */
export const shiftAlongLoop = (
    allocation: Allocation,
    basicCells: BasicCellSet,
    loop: ReadonlyArray<LoopCell>,
    tolerance: number,
    tieBreak: TieBreak,
): { theta: number; leaving: CellPosition } => {
    const minusCells = loop.filter(({ sign }) => sign === '-');
    const theta = Math.min(...minusCells.map(({ row, col }) => allocation[row][col]));

    for (const { row, col, sign } of loop) {
        allocation[row][col] += sign === '+' ? theta : -theta;
    }

    const candidates = minusCells
        .filter(({ row, col }) => Math.abs(allocation[row][col]) <= tolerance * Math.max(1, theta))
        .sort(byPosition);
    const { row, col } = tieBreak === 'lowest-index' ? candidates[0] : candidates[candidates.length - 1];
    const leaving = { row, col };

    allocation[row][col] = 0;
    basicCells.delete(row, col);
    basicCells.add(loop[0].row, loop[0].col);

    return { theta, leaving };
};

export const optimize = (
    costs: CostMatrix,
    allocation: Allocation,
    basicCells: BasicCellSet,
    config: SolverConfig,
): OptimizationOutcome => {
    const maxIterations = getIterationLimit(basicCells.rows, basicCells.cols, config);
    const iterations: IterationRecord[] = [];
    let totalCost = calculateTotalCost(allocation, costs);
    let state: ModiState = { phase: 'evaluating' };

    for (;;) {
        switch (state.phase) {
            case 'evaluating': {
                const potentials = computePotentials(costs, basicCells);
                const opportunityCosts = computeOpportunityCosts(costs, potentials, basicCells);
                const entering = selectEnteringCell(opportunityCosts, config.tolerance, config.enteringTieBreak);

                if (entering === null) {
                    state = { phase: 'optimal', potentials, opportunityCosts };
                } else if (iterations.length >= maxIterations) {
                    state = { phase: 'failed' };
                } else {
                    state = { phase: 'shifting', entering, potentials };
                }
                break;
            }

            case 'shifting': {
                const { entering, potentials } = state;
                const loop = findLoop(entering, basicCells);
                const { theta, leaving } = shiftAlongLoop(
                    allocation,
                    basicCells,
                    loop,
                    config.tolerance,
                    config.leavingTieBreak,
                );
                totalCost = calculateTotalCost(allocation, costs);

                iterations.push({
                    iteration: iterations.length + 1,
                    entering,
                    potentials,
                    loop,
                    theta,
                    leaving,
                    allocation: cloneDeep(allocation),
                    basicCells: basicCells.cells(),
                    totalCost,
                });

                state = { phase: 'evaluating' };
                break;
            }

            case 'optimal':
                return {
                    allocation,
                    basicCells,
                    potentials: state.potentials,
                    opportunityCosts: state.opportunityCosts,
                    iterations,
                    totalCost,
                };

            case 'failed':
                throw new NonConvergenceError(iterations.length, cloneDeep(allocation), totalCost);
        }
    }
};
