export { BruteForceAlgorithm } from './algorithms/brute-force';
export * from './algorithms/modi';
export * from './errors';
export { AlgorithmFactory } from './factory';
export * from './logging/stepLogger';
export * from './types/algorithm';
export * from './types/types';
export { calculateTotalCost, columnSums, rowSums } from './utils/matrix';
export { ProblemLoader } from './utils/problem-loader';
export type { LoadedProblem, ProblemMetadata } from './utils/problem-loader';
