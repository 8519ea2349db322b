/**
 * @module north-west-corner
 * @description
 * Builds the initial basic feasible solution by sweeping a cursor from the top-left cell.
 *
 * Every step allocates `min(remaining supply, remaining demand)`, marks the cell basic and advances
 * exactly one index, so the sweep always produces m + n - 1 basic cells. When a row and a column are
 * exhausted together, only the row advances; the next step then lands on an exhausted column and
 * records a zero-valued basic cell, which keeps the basic cells a spanning tree.
 *
 * The final cell takes the remaining supply. An imbalance within the validation slack therefore
 * shows up only in the last column's total.
 *
 * Complexity: O(m + n) steps, O(m * n) to build the allocation matrix.
 */

import { InvariantError } from '../../errors';
import { Allocation } from '../../types/types';
import { balanceSlack, createMatrix } from '../../utils/matrix';
import { BasicCellSet } from './basicCellSet';

export interface InitialAllocation {
    allocation: Allocation;
    basicCells: BasicCellSet;
}

export const northWestCorner = (
    supply: ReadonlyArray<number>,
    demand: ReadonlyArray<number>,
    tolerance: number,
): InitialAllocation => {
    const m = supply.length;
    const n = demand.length;
    const allocation = createMatrix(m, n);
    const basicCells = new BasicCellSet(m, n);

    const remainingSupply = [...supply];
    const remainingDemand = [...demand];

    let row = 0;
    let col = 0;

    while (row < m - 1 || col < n - 1) {
        const quantity = Math.min(remainingSupply[row], remainingDemand[col]);

        allocation[row][col] = quantity;
        basicCells.add(row, col);
        remainingSupply[row] -= quantity;
        remainingDemand[col] -= quantity;

        if (row === m - 1) {
            ++col;
        } else if (col === n - 1) {
            ++row;
        } else if (remainingSupply[row] === 0) {
            ++row;
        } else {
            ++col;
        }
    }

    const lastSupply = remainingSupply[row];
    const lastDemand = remainingDemand[col];

    // Same slack as validation
    if (Math.abs(lastSupply - lastDemand) > balanceSlack(supply, demand, tolerance)) {
        throw new InvariantError(
            `North-west corner ended with supply ${lastSupply} and demand ${lastDemand} at (${row}, ${col})`,
        );
    }

    // Rows stay exact; the last column absorbs the accepted imbalance
    allocation[row][col] = lastSupply;
    basicCells.add(row, col);

    return { allocation, basicCells };
};
