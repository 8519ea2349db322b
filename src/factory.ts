import { BruteForceAlgorithm } from './algorithms/brute-force';
import { ModiAlgorithm } from './algorithms/modi';
import { TransportationAlgorithm } from './types/algorithm';

/** Algorithm factory for creating solver instances by name */
export class AlgorithmFactory {
    private static algorithms = new Map<string, () => TransportationAlgorithm>([
        ['modi', () => new ModiAlgorithm()],
        ['brute-force', () => new BruteForceAlgorithm()],
    ]);

    static register(name: string, factory: () => TransportationAlgorithm): void {
        this.algorithms.set(name, factory);
    }

    static create(name: string): TransportationAlgorithm {
        const factory = this.algorithms.get(name);
        if (!factory) {
            throw new Error(`Unknown algorithm: ${name}`);
        }
        return factory();
    }

    static getAvailable(): ReadonlyArray<string> {
        return Array.from(this.algorithms.keys());
    }
}
