/**
 * @module problem-validation
 * @description
 * Gatekeeper run before any allocation work. Rejects malformed instances (`ShapeError`), negative or
 * non-finite values (`InvalidQuantityError`) and unbalanced instances (`BalanceError`).
 * Unbalanced problems are never padded with a dummy warehouse or destination.
 */

import { BalanceError, InvalidQuantityError, ShapeError } from '../../errors';
import { CostMatrix } from '../../types/types';
import { balanceSlack, sum } from '../../utils/matrix';

const assertQuantities = (values: ReadonlyArray<number>, label: string) => {
    values.forEach((value, index) => {
        if (!Number.isFinite(value) || value < 0) {
            throw new InvalidQuantityError(`${label}[${index}] must be a finite non-negative number, got ${value}`);
        }
    });
};

export const validateProblem = (
    costs: CostMatrix,
    supply: ReadonlyArray<number>,
    demand: ReadonlyArray<number>,
    tolerance: number,
): void => {
    const m = supply.length;
    const n = demand.length;

    if (m === 0) {
        throw new ShapeError('Problem must have at least one warehouse');
    }
    if (n === 0) {
        throw new ShapeError('Problem must have at least one destination');
    }
    if (costs.length !== m) {
        throw new ShapeError(`Cost matrix has ${costs.length} rows but supply has ${m} entries`);
    }

    costs.forEach((row, r) => {
        if (row.length !== n) {
            throw new ShapeError(`Cost matrix row ${r} has ${row.length} columns but demand has ${n} entries`);
        }
        assertQuantities(row, `costs[${r}]`);
    });

    assertQuantities(supply, 'supply');
    assertQuantities(demand, 'demand');

    const totalSupply = sum(supply);
    const totalDemand = sum(demand);

    if (Math.abs(totalSupply - totalDemand) > balanceSlack(supply, demand, tolerance)) {
        throw new BalanceError(totalSupply, totalDemand);
    }
};
