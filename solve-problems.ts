/**
 * @file solve-problems.ts
 * @description
 * Batch solver for problem files on disk.
 *
 * Usage: `npm run solve -- [algorithm]` (default `modi`, see `AlgorithmFactory.getAvailable()`).
 * Every JSON file under `problems/` is solved; the step trace and the shipment table are printed and
 * the result is written next to the input as `<name>_solved.json`.
 */

import fs from 'fs/promises';
import path from 'path';
import { glob } from 'glob';
import { fileURLToPath } from 'url';
import { performance } from 'perf_hooks';

import { AlgorithmFactory } from './src/factory';
import { buildStepLog, describeFailure, LogEntry, summarizeShipments } from './src/logging/stepLogger';
import { isSolveResult } from './src/types/algorithm';
import { ProblemLoader } from './src/utils/problem-loader';

const problemsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), 'problems');

const STYLE_PREFIX: Record<LogEntry['style'], string> = {
    header: '\n== ',
    bold: '** ',
    normal: '   ',
    highlight: ' > ',
    success: ' ✔ ',
    error: ' ✘ ',
};

const printLog = (log: LogEntry[]) => log.forEach(({ message, style }) => console.log(STYLE_PREFIX[style] + message));

const main = async () => {
    const algorithmName = process.argv[2] ?? 'modi';
    const algorithm = AlgorithmFactory.create(algorithmName);
    const loader = new ProblemLoader();

    const files = (await glob('**/*.json', { cwd: problemsDir, absolute: true }))
        .filter(file => !file.endsWith('_solved.json'))
        .sort();

    console.log(`Solving ${files.length} problems with ${algorithm.name}`);

    let failures = 0;
    for (const file of files) {
        const { problem, metadata } = await loader.loadFromFile(file);

        console.log(`\nProblem ${metadata.filename} (${metadata.warehouseCount}x${metadata.destinationCount})`);

        try {
            const start = performance.now();
            const solution = algorithm.solve(problem);
            const execTime = performance.now() - start;

            if (isSolveResult(solution)) {
                printLog(buildStepLog(solution, problem));
            }

            console.log(`Minimum total cost = ${solution.totalCost} (solved in ${execTime.toFixed(2)}ms)`);
            console.table(summarizeShipments(problem, solution.allocation));

            const { dir, name } = path.parse(file);
            await fs.writeFile(path.resolve(dir, `${name}_solved.json`), JSON.stringify(solution, null, 2));
        } catch (error) {
            ++failures;
            printLog(describeFailure(error));
        }
    }

    if (failures > 0) {
        throw new Error(`${failures} of ${files.length} problems could not be solved`);
    }
};

main().catch(err => {
    console.error(err);
    process.exit(1);
});
