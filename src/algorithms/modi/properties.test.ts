import { describe, it, expect } from 'vitest';

import { BalanceError } from '../../errors';
import { Problem } from '../../types/types';
import { columnSums, rowSums, sum } from '../../utils/matrix';
import { BruteForceAlgorithm } from '../brute-force';
import { solveTransportation } from './index';
import { validateProblem } from './validateProblem';

// mulberry32, seeded so failures are reproducible
const createRandom = (seed: number) => {
    let state = seed >>> 0;

    const next = () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };

    return { next, nextInt: (min: number, max: number) => min + Math.floor(next() * (max - min + 1)) };
};

type Random = ReturnType<typeof createRandom>;

/** Splits `total` into `parts` non-negative integers */
const splitTotal = (random: Random, total: number, parts: number): number[] => {
    const cuts = Array.from({ length: parts - 1 }, () => random.nextInt(0, total)).sort((a, b) => a - b);
    const bounds = [0, ...cuts, total];
    return bounds.slice(1).map((bound, i) => bound - bounds[i]);
};

const generateProblem = (random: Random, maxRows: number, maxCols: number, maxSupply: number): Problem => {
    const m = random.nextInt(1, maxRows);
    const n = random.nextInt(1, maxCols);
    const supply = Array.from({ length: m }, () => random.nextInt(0, maxSupply));

    return {
        costs: Array.from({ length: m }, () => Array.from({ length: n }, () => random.nextInt(1, 9))),
        supply,
        demand: splitTotal(random, sum(supply), n),
    };
};

const RUNS = 150;

describe('MODI invariants on random balanced instances', () => {
    const random = createRandom(20240611);
    const problems = Array.from({ length: RUNS }, () => generateProblem(random, 4, 4, 12));

    it('should keep row and column sums and m + n - 1 basic cells after every iteration', () => {
        for (const problem of problems) {
            const result = solveTransportation(problem);
            const basicCount = problem.supply.length + problem.demand.length - 1;

            for (const { allocation, basicCells } of [result.initial, ...result.iterations]) {
                expect(rowSums(allocation)).toEqual(problem.supply);
                expect(columnSums(allocation)).toEqual(problem.demand);
                expect(basicCells).toHaveLength(basicCount);
                allocation.forEach(row => row.forEach(value => expect(value).toBeGreaterThanOrEqual(0)));
            }
        }
    });

    it('should never increase the total cost and strictly decrease it when theta > 0', () => {
        for (const problem of problems) {
            const result = solveTransportation(problem);
            let previous = result.initial.totalCost;

            for (const { theta, totalCost } of result.iterations) {
                if (theta > 0) {
                    expect(totalCost).toBeLessThan(previous);
                } else {
                    expect(totalCost).toBe(previous);
                }
                previous = totalCost;
            }

            expect(result.totalCost).toBe(previous);
        }
    });

    it('should stop with every opportunity cost non-negative', () => {
        for (const problem of problems) {
            const result = solveTransportation(problem);
            const { u, v } = result.potentials;

            result.opportunityCosts.forEach((row, r) =>
                row.forEach((delta, c) => {
                    if (delta === null) {
                        expect(problem.costs[r][c]).toBe(u[r] + v[c]);
                    } else {
                        expect(delta).toBeGreaterThanOrEqual(0);
                    }
                }),
            );
        }
    });

    it('should stay within the iteration cap', () => {
        for (const problem of problems) {
            const result = solveTransportation(problem);
            expect(result.iterations.length).toBeLessThanOrEqual(10 * problem.supply.length * problem.demand.length);
        }
    });

    it('should match the exhaustive optimum under every tie-break policy', () => {
        const bruteForce = new BruteForceAlgorithm();
        const small = problems.filter(({ supply, demand }) => supply.length * demand.length <= 9);

        for (const problem of small) {
            const expected = bruteForce.solve(problem).totalCost;

            expect(solveTransportation(problem).totalCost).toBe(expected);
            expect(
                solveTransportation(problem, { enteringTieBreak: 'highest-index', leavingTieBreak: 'highest-index' })
                    .totalCost,
            ).toBe(expected);
        }
    });
});

describe('validateProblem on random vectors', () => {
    const random = createRandom(7);

    it('should accept matched totals and reject mismatched ones', () => {
        for (let run = 0; run < RUNS; ++run) {
            const problem = generateProblem(random, 5, 5, 50);
            const { costs, supply, demand } = problem;

            expect(() => validateProblem(costs, supply, demand, 1e-9)).not.toThrow();

            const skewed = [...demand];
            skewed[random.nextInt(0, skewed.length - 1)] += random.nextInt(1, 10);

            expect(() => validateProblem(costs, supply, skewed, 1e-9)).toThrowError(BalanceError);
        }
    });
});
