import { CellPosition } from '../../types/types';

/**
 * Basic cells of the current solution, kept as index pairs with per-row and per-column adjacency so
 * the spanning tree over row and column nodes can be walked without a linked structure.
 */
export class BasicCellSet {
    private readonly byRow: Set<number>[];
    private readonly byCol: Set<number>[];
    private count = 0;

    constructor(
        readonly rows: number,
        readonly cols: number,
    ) {
        this.byRow = Array.from({ length: rows }, () => new Set<number>());
        this.byCol = Array.from({ length: cols }, () => new Set<number>());
    }

    get size(): number {
        return this.count;
    }

    has(row: number, col: number): boolean {
        return this.byRow[row].has(col);
    }

    add(row: number, col: number): void {
        if (this.has(row, col)) {
            return;
        }
        this.byRow[row].add(col);
        this.byCol[col].add(row);
        ++this.count;
    }

    delete(row: number, col: number): boolean {
        if (!this.has(row, col)) {
            return false;
        }
        this.byRow[row].delete(col);
        this.byCol[col].delete(row);
        --this.count;
        return true;
    }

    /** Columns of the basic cells in `row` */
    inRow(row: number): ReadonlySet<number> {
        return this.byRow[row];
    }

    /** Rows of the basic cells in `col` */
    inColumn(col: number): ReadonlySet<number> {
        return this.byCol[col];
    }

    /** Row-major order */
    cells(): CellPosition[] {
        const result: CellPosition[] = [];

        this.byRow.forEach((cols, row) => {
            [...cols].sort((a, b) => a - b).forEach(col => result.push({ row, col }));
        });

        return result;
    }

    clone(): BasicCellSet {
        const copy = new BasicCellSet(this.rows, this.cols);
        this.cells().forEach(({ row, col }) => copy.add(row, col));
        return copy;
    }

    static from(rows: number, cols: number, cells: ReadonlyArray<CellPosition>): BasicCellSet {
        const set = new BasicCellSet(rows, cols);
        cells.forEach(({ row, col }) => set.add(row, col));
        return set;
    }
}

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('BasicCellSet', () => {
        test('tracks adjacency by row and column', () => {
            const set = BasicCellSet.from(2, 3, [
                { row: 1, col: 2 },
                { row: 0, col: 0 },
                { row: 1, col: 1 },
            ]);

            expect(set.size).toBe(3);
            expect([...set.inRow(1)].sort()).toEqual([1, 2]);
            expect([...set.inColumn(0)]).toEqual([0]);
            expect(set.cells()).toEqual([
                { row: 0, col: 0 },
                { row: 1, col: 1 },
                { row: 1, col: 2 },
            ]);
        });

        test('ignores duplicates and reports missing deletions', () => {
            const set = new BasicCellSet(2, 2);
            set.add(0, 1);
            set.add(0, 1);

            expect(set.size).toBe(1);
            expect(set.delete(1, 1)).toBe(false);
            expect(set.delete(0, 1)).toBe(true);
            expect(set.size).toBe(0);
            expect(set.inColumn(1).size).toBe(0);
        });

        test('clone is independent', () => {
            const set = BasicCellSet.from(2, 2, [{ row: 0, col: 0 }]);
            const copy = set.clone();
            copy.add(1, 1);

            expect(set.size).toBe(1);
            expect(copy.has(1, 1)).toBe(true);
        });
    });
}
