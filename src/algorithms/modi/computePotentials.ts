/**
 * @module potentials
 * @description
 * Solves u_i + v_j = cost(i, j) over the basic cells with u_0 = 0 by a breadth-first walk of the
 * bipartite tree whose nodes are rows and columns and whose edges are basic cells.
 */

import { InvariantError } from '../../errors';
import { CostMatrix, Potentials } from '../../types/types';
import { BasicCellSet } from './basicCellSet';

type TreeNode = { kind: 'row' | 'col'; index: number };

export const computePotentials = (costs: CostMatrix, basicCells: BasicCellSet): Potentials => {
    const { rows: m, cols: n } = basicCells;

    if (basicCells.size !== m + n - 1) {
        throw new InvariantError(`Expected ${m + n - 1} basic cells, found ${basicCells.size}`);
    }

    const u: (number | undefined)[] = Array(m).fill(undefined);
    const v: (number | undefined)[] = Array(n).fill(undefined);

    u[0] = 0;
    const queue: TreeNode[] = [{ kind: 'row', index: 0 }];

    for (let head = 0; head < queue.length; ++head) {
        const node = queue[head];

        if (node.kind === 'row') {
            const ui = u[node.index] ?? 0;
            for (const col of basicCells.inRow(node.index)) {
                if (v[col] === undefined) {
                    v[col] = costs[node.index][col] - ui;
                    queue.push({ kind: 'col', index: col });
                }
            }
        } else {
            const vj = v[node.index] ?? 0;
            for (const row of basicCells.inColumn(node.index)) {
                if (u[row] === undefined) {
                    u[row] = costs[row][node.index] - vj;
                    queue.push({ kind: 'row', index: row });
                }
            }
        }
    }

    const missingRow = u.findIndex(value => value === undefined);
    const missingCol = v.findIndex(value => value === undefined);

    if (missingRow !== -1 || missingCol !== -1) {
        const node = missingRow !== -1 ? `row ${missingRow}` : `column ${missingCol}`;
        throw new InvariantError(`Basic cells do not form a connected tree: ${node} is unreachable`);
    }

    return {
        u: u.map(value => value ?? 0),
        v: v.map(value => value ?? 0),
    };
};
