/**
 * @module step-logger
 * @description
 * Turns solver records into a styled, display-agnostic trace. Rendering (terminal, HTML) is left to
 * the caller; each entry only carries its text and a style hint.
 */

import { NonConvergenceError } from '../errors';
import { resolveSolverConfig, SolveResult } from '../types/algorithm';
import { Allocation, CellPosition, Problem } from '../types/types';

export type LogStyle = 'header' | 'normal' | 'bold' | 'highlight' | 'success' | 'error';

export interface LogEntry {
    readonly message: string;
    readonly style: LogStyle;
}

export interface ShipmentLine {
    readonly from: string;
    readonly to: string;
    readonly quantity: number;
    readonly unitCost: number;
    readonly subtotal: number;
}

export type ProblemLabels = Pick<Problem, 'warehouses' | 'destinations'>;

/** Named cells read `(North, Mill)`, unnamed ones fall back to 1-based indices */
export const buildStepLog = (
    { initial, iterations, totalCost }: SolveResult,
    { warehouses, destinations }: ProblemLabels = {},
): LogEntry[] => {
    const formatCell = ({ row, col }: CellPosition) =>
        `(${warehouses?.[row] ?? row + 1}, ${destinations?.[col] ?? col + 1})`;

    const log: LogEntry[] = [
        { message: 'Initial basic feasible solution (north-west corner)', style: 'header' },
        { message: `Initial cost: ${initial.totalCost}`, style: 'bold' },
    ];

    for (const { iteration, entering, loop, theta, leaving, totalCost: cost } of iterations) {
        const path = loop.map(cell => `${formatCell(cell)}${cell.sign}`).join(' -> ');

        log.push(
            { message: `Iteration ${iteration}`, style: 'header' },
            {
                message: `Negative opportunity cost ${entering.opportunityCost} at ${formatCell(entering)}; improving`,
                style: 'highlight',
            },
            { message: `Loop: ${path}`, style: 'normal' },
            { message: `Shifting ${theta} units; ${formatCell(leaving)} leaves the basis`, style: 'normal' },
            { message: `Total cost: ${cost}`, style: 'bold' },
        );
    }

    log.push({ message: `All opportunity costs are non-negative. Optimal total cost: ${totalCost}`, style: 'success' });

    return log;
};

export const describeFailure = (error: unknown): LogEntry[] => {
    if (error instanceof NonConvergenceError) {
        return [
            { message: `Stopped after ${error.iterations} iterations without reaching optimality`, style: 'error' },
            { message: `Best total cost so far: ${error.totalCost}`, style: 'bold' },
        ];
    }

    return [{ message: error instanceof Error ? error.message : String(error), style: 'error' }];
};

/**
 * One line per route that carries more than `tolerance` units, labels default to `Warehouse i` /
 * `Dest j`
 */
export const summarizeShipments = (
    { costs, warehouses, destinations }: Problem,
    allocation: Allocation,
    tolerance: number = resolveSolverConfig().tolerance,
): ShipmentLine[] => {
    const lines: ShipmentLine[] = [];

    allocation.forEach((row, r) =>
        row.forEach((quantity, c) => {
            if (quantity <= tolerance) {
                return;
            }

            const unitCost = costs[r][c];
            lines.push({
                from: warehouses?.[r] ?? `Warehouse ${r + 1}`,
                to: destinations?.[c] ?? `Dest ${c + 1}`,
                quantity,
                unitCost,
                subtotal: quantity * unitCost,
            });
        }),
    );

    return lines;
};
