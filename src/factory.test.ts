import { describe, it, expect } from 'vitest';

import { BruteForceAlgorithm } from './algorithms/brute-force';
import { ModiAlgorithm } from './algorithms/modi';
import { AlgorithmFactory } from './factory';

describe('AlgorithmFactory', () => {
    it('should create the built-in solvers by name', () => {
        expect(AlgorithmFactory.create('modi')).toBeInstanceOf(ModiAlgorithm);
        expect(AlgorithmFactory.create('brute-force')).toBeInstanceOf(BruteForceAlgorithm);
        expect(AlgorithmFactory.getAvailable()).toEqual(expect.arrayContaining(['modi', 'brute-force']));
    });

    it('should reject unknown names', () => {
        expect(() => AlgorithmFactory.create('simplex')).toThrowError('Unknown algorithm: simplex');
    });

    it('should agree across solvers on a small instance', () => {
        const problem = {
            costs: [
                [3, 1, 7],
                [2, 6, 5],
            ],
            supply: [6, 9],
            demand: [4, 5, 6],
        };

        const results = ['modi', 'brute-force'].map(name => AlgorithmFactory.create(name).solve(problem).totalCost);

        expect(results[0]).toBe(results[1]);
    });
});
