import { Allocation, CostMatrix } from '../types/types';

export const sum = (values: ReadonlyArray<number>): number => values.reduce((acc, value) => acc + value, 0);

/** Largest supply/demand imbalance accepted as rounding noise */
export const balanceSlack = (
    supply: ReadonlyArray<number>,
    demand: ReadonlyArray<number>,
    tolerance: number,
): number => tolerance * Math.max(1, sum(supply), sum(demand));

export const createMatrix = (rows: number, cols: number, fill: number = 0): number[][] =>
    Array.from({ length: rows }, () => Array<number>(cols).fill(fill));

export const rowSums = (allocation: Allocation): number[] => allocation.map(row => sum(row));

export const columnSums = (allocation: Allocation): number[] => {
    const cols = allocation.length > 0 ? allocation[0].length : 0;
    const totals = Array<number>(cols).fill(0);

    for (const row of allocation) {
        row.forEach((value, col) => (totals[col] += value));
    }

    return totals;
};

export const calculateTotalCost = (allocation: Allocation, costs: CostMatrix): number => {
    let total = 0;

    for (let r = 0; r < allocation.length; ++r) {
        for (let c = 0; c < allocation[r].length; ++c) {
            total += allocation[r][c] * costs[r][c];
        }
    }

    return total;
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('matrix helpers', () => {
        test('createMatrix returns independent rows', () => {
            const matrix = createMatrix(2, 3);
            matrix[0][0] = 5;

            expect(matrix).toEqual([
                [5, 0, 0],
                [0, 0, 0],
            ]);
        });

        test('row and column sums', () => {
            const allocation = [
                [80, 20, 0],
                [0, 50, 70],
            ];

            expect(rowSums(allocation)).toEqual([100, 120]);
            expect(columnSums(allocation)).toEqual([80, 70, 70]);
        });

        test('total cost multiplies allocation by unit cost', () => {
            const costs = [
                [4, 6, 8],
                [5, 4, 7],
            ];
            const allocation = [
                [80, 20, 0],
                [0, 50, 70],
            ];

            expect(calculateTotalCost(allocation, costs)).toBe(1130);
        });
    });
}
