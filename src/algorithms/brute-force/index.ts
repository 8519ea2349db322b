/**
 * @module brute-force-solver
 * @description
 * Exhaustive reference solver used to verify MODI results on small instances.
 *
 * Algorithm:
 * 1. Walks the cells row by row, trying every integer quantity for each cell that the remaining
 *    row supply and column demand allow. The last cell of a row takes whatever supply is left.
 * 2. The last row is fully determined by the remaining column demands.
 * 3. Branches whose partial cost already reaches the best complete plan are pruned (costs are
 *    non-negative, so partial cost is a lower bound).
 *
 * With integer supply and demand the transportation polytope has integer vertices, so the best
 * integer plan is the true optimum.
 *
 * WARNING:
 * The number of plans grows combinatorially with the quantities and the number of cells. Use it
 * only for tiny instances (a handful of cells, quantities in the tens).
 */

import { InvalidQuantityError } from '../../errors';
import {
    resolveSolverConfig,
    SolverConfig,
    TransportationAlgorithm,
    TransportationSolution,
} from '../../types/algorithm';
import { Problem } from '../../types/types';
import { createMatrix } from '../../utils/matrix';
import { validateProblem } from '../modi/validateProblem';

export class BruteForceAlgorithm implements TransportationAlgorithm {
    readonly name = 'brute-force';

    solve({ costs, supply, demand }: Problem, config?: Partial<SolverConfig>): TransportationSolution {
        const { tolerance } = resolveSolverConfig(config);
        validateProblem(costs, supply, demand, tolerance);

        if (![...supply, ...demand].every(Number.isInteger)) {
            throw new InvalidQuantityError('Exhaustive search requires integer supply and demand');
        }

        const m = supply.length;
        const n = demand.length;
        const allocation = createMatrix(m, n);
        const remainingDemand = [...demand];
        const best: TransportationSolution = { allocation: createMatrix(m, n), totalCost: Infinity };

        const completeLastRow = (cost: number) => {
            const row = m - 1;
            let total = cost;

            for (let col = 0; col < n; ++col) {
                allocation[row][col] = remainingDemand[col];
                total += remainingDemand[col] * costs[row][col];
            }

            if (total < best.totalCost) {
                best.totalCost = total;
                best.allocation = allocation.map(r => [...r]);
            }
        };

        const visit = (row: number, col: number, rowSupply: number, cost: number): void => {
            if (cost >= best.totalCost) {
                return;
            }

            if (row === m - 1) {
                completeLastRow(cost);
                return;
            }

            const upper = col === n - 1 ? rowSupply : Math.min(rowSupply, remainingDemand[col]);
            const lower = col === n - 1 ? rowSupply : 0;

            if (upper > remainingDemand[col]) {
                return;
            }

            for (let quantity = lower; quantity <= upper; ++quantity) {
                allocation[row][col] = quantity;
                remainingDemand[col] -= quantity;

                const nextCost = cost + quantity * costs[row][col];
                if (col === n - 1) {
                    visit(row + 1, 0, supply[row + 1], nextCost);
                } else {
                    visit(row, col + 1, rowSupply - quantity, nextCost);
                }

                remainingDemand[col] += quantity;
            }

            allocation[row][col] = 0;
        };

        visit(0, 0, supply[0], 0);

        return best;
    }
}

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('BruteForceAlgorithm', () => {
        test('finds the cheapest plan of a 2x2 instance', () => {
            const result = new BruteForceAlgorithm().solve({
                costs: [
                    [5, 1],
                    [1, 5],
                ],
                supply: [10, 10],
                demand: [10, 10],
            });

            expect(result.totalCost).toBe(20);
            expect(result.allocation).toEqual([
                [0, 10],
                [10, 0],
            ]);
        });

        test('rejects fractional quantities', () => {
            expect(() =>
                new BruteForceAlgorithm().solve({ costs: [[1]], supply: [0.5], demand: [0.5] }),
            ).toThrowError(InvalidQuantityError);
        });
    });
}
