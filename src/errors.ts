import { Allocation } from './types/types';

export const TRANSPORTATION_ERRORS = {
    SHAPE_MISMATCH: 'SHAPE_MISMATCH',
    INVALID_QUANTITY: 'INVALID_QUANTITY',
    UNBALANCED: 'UNBALANCED',
    INVARIANT_VIOLATED: 'INVARIANT_VIOLATED',
    NON_CONVERGENCE: 'NON_CONVERGENCE',
} as const;

export type TransportationErrorCode = (typeof TRANSPORTATION_ERRORS)[keyof typeof TRANSPORTATION_ERRORS];

export abstract class TransportationError extends Error {
    abstract readonly code: TransportationErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Cost matrix dimensions do not match the supply/demand vectors */
export class ShapeError extends TransportationError {
    readonly code = TRANSPORTATION_ERRORS.SHAPE_MISMATCH;
}

/** A cost, supply or demand value is negative or not a finite number */
export class InvalidQuantityError extends TransportationError {
    readonly code = TRANSPORTATION_ERRORS.INVALID_QUANTITY;
}

export class BalanceError extends TransportationError {
    readonly code = TRANSPORTATION_ERRORS.UNBALANCED;

    constructor(
        readonly totalSupply: number,
        readonly totalDemand: number,
    ) {
        const difference = totalSupply - totalDemand;
        super(`Total supply (${totalSupply}) must equal total demand (${totalDemand}), difference ${difference}`);
    }

    get difference(): number {
        return this.totalSupply - this.totalDemand;
    }
}

/**
 * Internal algorithmic invariant broken: disconnected basic-cell tree, missing closed loop or a
 * north-west corner mismatch. Always a defect, never recovered from.
 */
export class InvariantError extends TransportationError {
    readonly code = TRANSPORTATION_ERRORS.INVARIANT_VIOLATED;
}

export class NonConvergenceError extends TransportationError {
    readonly code = TRANSPORTATION_ERRORS.NON_CONVERGENCE;

    constructor(
        readonly iterations: number,
        readonly allocation: Allocation,
        readonly totalCost: number,
    ) {
        super(`MODI did not reach optimality within ${iterations} iterations (current cost ${totalCost})`);
    }
}
