/**
 * @module closed-loop
 * @description
 * Finds the stepping-stone loop created by adding a non-basic cell to the basic-cell tree.
 *
 * Rows and columns are nodes of a bipartite graph and basic cells are its edges. Because the basic
 * cells form a spanning tree, there is exactly one path from the entering cell's column node to its
 * row node; that path closed by the entering cell is the loop. Consecutive cells of the path share a
 * column, then a row, then a column and so on, so the loop alternates vertical and horizontal moves.
 *
 * Signs alternate starting with `+` on the entering cell. The loop has even length, so reading it in
 * the opposite direction assigns the same sign to every cell.
 *
 * Complexity: O(m * n) for the breadth-first search over at most m + n - 1 edges with adjacency sets.
 */

import { InvariantError } from '../../errors';
import { CellPosition, LoopCell } from '../../types/types';
import { BasicCellSet } from './basicCellSet';

// Node ids: rows are [0, m), columns are [m, m + n)
export const findLoop = (entering: CellPosition, basicCells: BasicCellSet): LoopCell[] => {
    const { rows: m, cols: n } = basicCells;
    const { row: enteringRow, col: enteringCol } = entering;

    if (basicCells.has(enteringRow, enteringCol)) {
        throw new InvariantError(`Entering cell (${enteringRow}, ${enteringCol}) is already basic`);
    }

    const source = m + enteringCol;
    const target = enteringRow;
    const parent = new Int32Array(m + n).fill(-1);
    parent[source] = source;

    const queue = [source];
    for (let head = 0; head < queue.length && parent[target] === -1; ++head) {
        const node = queue[head];
        const neighbours =
            node < m ? [...basicCells.inRow(node)].map(col => m + col) : [...basicCells.inColumn(node - m)];

        for (const next of neighbours) {
            if (parent[next] === -1) {
                parent[next] = node;
                queue.push(next);
            }
        }
    }

    if (parent[target] === -1) {
        throw new InvariantError(`No closed loop through entering cell (${enteringRow}, ${enteringCol})`);
    }

    // Walk back from the row node; edges come out ordered from the row end, reverse to start at the column end
    const path: CellPosition[] = [];
    for (let node = target; node !== source; node = parent[node]) {
        const prev = parent[node];
        path.push(node < m ? { row: node, col: prev - m } : { row: prev, col: node - m });
    }
    path.reverse();

    return [entering, ...path].map(({ row, col }, index) => ({ row, col, sign: index % 2 === 0 ? '+' : '-' }));
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('findLoop', () => {
        test('closes a rectangle', () => {
            const basic = BasicCellSet.from(2, 2, [
                { row: 0, col: 0 },
                { row: 1, col: 0 },
                { row: 1, col: 1 },
            ]);

            expect(findLoop({ row: 0, col: 1 }, basic)).toEqual([
                { row: 0, col: 1, sign: '+' },
                { row: 1, col: 1, sign: '-' },
                { row: 1, col: 0, sign: '+' },
                { row: 0, col: 0, sign: '-' },
            ]);
        });

        test('rejects a basic entering cell', () => {
            const basic = BasicCellSet.from(1, 2, [
                { row: 0, col: 0 },
                { row: 0, col: 1 },
            ]);

            expect(() => findLoop({ row: 0, col: 0 }, basic)).toThrowError(InvariantError);
        });
    });
}
