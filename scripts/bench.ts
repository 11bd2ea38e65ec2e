#!/usr/bin/env node
// Run after `npm run build`: node dist/scripts/bench.js
// Pool timings need BJT_WORKERS > 0; with 0 only the in-process estimator runs.

import 'dotenv/config';
import { performance } from 'node:perf_hooks';
import chalk from 'chalk';
import { getConfig } from '../src/config/index.js';
import { createLogger } from '../src/log.js';
import { createEngine, draw } from '../src/games/blackjack/engine.js';
import { snapshotShoe } from '../src/games/blackjack/shoe.js';
import { estimateOutcomes, type SimulationInput } from '../src/games/blackjack/simulator.js';
import { SimulationPool } from '../src/compute/pool.js';
import { rngFromSeed } from '../src/util/rng.js';

const log = createLogger('bench');

interface BenchResult {
    mode: 'inline' | 'pool';
    trials: number;
    runs: number;
    p50: number;
    p95: number;
    win: number;
}

function percentile(sorted: number[], p: number): number {
    return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * p))];
}

async function bench(mode: BenchResult['mode'], trials: number, runs: number, estimate: () => Promise<number>): Promise<BenchResult> {
    const latencies: number[] = [];
    let win = 0;
    for (let i = 0; i < runs; i++) {
        const start = performance.now();
        win = await estimate();
        latencies.push(performance.now() - start);
    }
    latencies.sort((a, b) => a - b);
    return { mode, trials, runs, p50: percentile(latencies, 0.5), p95: percentile(latencies, 0.95), win };
}

function printResult(r: BenchResult): void {
    const mode = r.mode === 'pool' ? chalk.cyan(r.mode.padEnd(6)) : chalk.magenta(r.mode.padEnd(6));
    console.log(
        `${mode} ${chalk.gray('trials=')}${String(r.trials).padStart(7)}  ` +
        `${chalk.gray('p50=')}${chalk.bold(r.p50.toFixed(2))}ms  ${chalk.gray('p95=')}${r.p95.toFixed(2)}ms  ` +
        `${chalk.gray('win=')}${chalk.green((r.win * 100).toFixed(1) + '%')}`,
    );
}

async function main(): Promise<void> {
    const config = getConfig();
    const rng = rngFromSeed(config.seed);
    const engine = createEngine({ numDecks: config.decks, rng });
    draw(engine, 'player', rng);
    draw(engine, 'player', rng);
    draw(engine, 'dealer', rng);

    const input: SimulationInput = {
        player: engine.player,
        dealer: engine.dealer,
        shoe: snapshotShoe(engine.shoe),
        roundActive: true,
        rng,
    };
    const pool = config.workers > 0 ? new SimulationPool({ maxThreads: config.workers }) : null;
    pool?.init();

    try {
        for (const trials of [1000, 10000, 100000]) {
            printResult(await bench('inline', trials, 20, async () => estimateOutcomes({ ...input, trials }).win));
            if (pool) {
                printResult(await bench('pool', trials, 20, async () => (await pool.estimateOutcomes({ ...input, trials })).win));
            }
        }
    } finally {
        await pool?.destroy();
    }
}

if (require.main === module) {
    main().catch((err) => {
        log.error({ msg: 'bench_error', error: String(err) });
        process.exit(1);
    });
}
