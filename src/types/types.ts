import z from 'zod';

const quantitySchema = z.number().finite().nonnegative();

export const problemJsonSchema = z.object({
    costs: quantitySchema.array().array(), // [warehouse][destination] unit cost
    supply: quantitySchema.array(),
    demand: quantitySchema.array(),
    warehouses: z.string().array().optional(),
    destinations: z.string().array().optional(),
});

export type Problem = z.infer<typeof problemJsonSchema>;

export type CostMatrix = ReadonlyArray<ReadonlyArray<number>>;

export type Allocation = number[][];

export interface CellPosition {
    readonly row: number;
    readonly col: number;
}

export interface Potentials {
    readonly u: number[];
    readonly v: number[];
}

/** `null` marks a basic cell, which has no opportunity cost */
export type OpportunityCostTable = (number | null)[][];

export type LoopSign = '+' | '-';

export interface LoopCell extends CellPosition {
    readonly sign: LoopSign;
}

export interface EnteringCell extends CellPosition {
    readonly opportunityCost: number;
}
