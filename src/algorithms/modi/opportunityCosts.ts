import { TieBreak } from '../../types/algorithm';
import { CostMatrix, EnteringCell, OpportunityCostTable, Potentials } from '../../types/types';
import { BasicCellSet } from './basicCellSet';

/** d(i, j) = cost(i, j) - (u_i + v_j) for every non-basic cell, `null` for basic cells */
export const computeOpportunityCosts = (
    costs: CostMatrix,
    { u, v }: Potentials,
    basicCells: BasicCellSet,
): OpportunityCostTable =>
    costs.map((row, r) => row.map((cost, c) => (basicCells.has(r, c) ? null : cost - (u[r] + v[c]))));

/**
 * Picks the most negative opportunity cost, scanning row-major. Ties go to the first cell scanned
 * for `lowest-index` and to the last one for `highest-index`. Returns `null` when no cell is below
 * `-tolerance`, i.e. the current allocation is optimal.
 */
export const selectEnteringCell = (
    table: OpportunityCostTable,
    tolerance: number,
    tieBreak: TieBreak,
): EnteringCell | null => {
    let best: EnteringCell | null = null;

    for (let r = 0; r < table.length; ++r) {
        for (let c = 0; c < table[r].length; ++c) {
            const delta = table[r][c];
            if (delta === null || delta >= -tolerance) {
                continue;
            }

            const improves =
                best === null ||
                delta < best.opportunityCost ||
                (tieBreak === 'highest-index' && delta === best.opportunityCost);

            if (improves) {
                best = { row: r, col: c, opportunityCost: delta };
            }
        }
    }

    return best;
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('selectEnteringCell', () => {
        const table: OpportunityCostTable = [
            [null, -3, 2],
            [-3, null, -1e-12],
        ];

        test('breaks ties on the lowest row then column by default', () => {
            expect(selectEnteringCell(table, 1e-9, 'lowest-index')).toEqual({ row: 0, col: 1, opportunityCost: -3 });
        });

        test('breaks ties on the highest index when asked to', () => {
            expect(selectEnteringCell(table, 1e-9, 'highest-index')).toEqual({ row: 1, col: 0, opportunityCost: -3 });
        });

        test('treats values within tolerance as non-negative', () => {
            expect(selectEnteringCell([[null, -1e-12]], 1e-9, 'lowest-index')).toBeNull();
        });
    });
}
