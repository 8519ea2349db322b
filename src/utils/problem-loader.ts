import { readFile, readdir } from 'fs/promises';
import path from 'path';
import { ZodError } from 'zod';

import { Problem, problemJsonSchema } from '../types/types';

export interface LoadedProblem {
    problem: Problem;
    metadata: ProblemMetadata;
}

export interface ProblemMetadata {
    filename: string;
    warehouseCount: number;
    destinationCount: number;
}

export class ProblemLoader {
    async loadFromDirectory(directoryPath: string): Promise<LoadedProblem[]> {
        const problems: LoadedProblem[] = [];

        try {
            const files = await readdir(directoryPath);
            const jsonFiles = files.filter(file => file.endsWith('.json') && !file.endsWith('_solved.json'));

            console.log(`Found ${jsonFiles.length} problem files in "${directoryPath}"`);

            for (const file of jsonFiles) {
                try {
                    const problem = await this.loadFromFile(path.join(directoryPath, file));
                    problems.push(problem);
                    console.log(`\tLoaded ${file} successfully`);
                } catch (error) {
                    console.error(`\tFailed to load ${file}:`, error);
                }
            }
        } catch (error) {
            console.error(`Failed to read directory "${directoryPath}"`);
            throw error;
        }

        return problems;
    }

    async loadFromFile(filePath: string): Promise<LoadedProblem> {
        try {
            const content = await readFile(filePath, 'utf-8');
            const problem = this.parse(JSON.parse(content));

            return { problem, metadata: this.extractMetadata(problem, filePath) };
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new Error(`Invalid JSON in ${filePath}: ${error.message}`);
            }
            if (error instanceof ZodError) {
                const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
                throw new Error(`Invalid problem in ${filePath}: ${issues.join('; ')}`);
            }
            throw new Error(`Failed to load problem from ${filePath}: ${error}`);
        }
    }

    public parse(data: unknown): Problem {
        return problemJsonSchema.parse(data);
    }

    private extractMetadata(problem: Problem, filePath: string): ProblemMetadata {
        return {
            filename: path.basename(filePath, '.json'),
            warehouseCount: problem.supply.length,
            destinationCount: problem.demand.length,
        };
    }
}
