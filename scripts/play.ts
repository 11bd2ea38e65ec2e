#!/usr/bin/env node
// Run after `npm run build`: node dist/scripts/play.js [rounds]
// Plays rounds by the advisor's recommendation and logs the feedback panel.
// BJT_WORKERS > 0 runs the outcome estimate on the worker pool.

import 'dotenv/config';
import { getConfig } from '../src/config/index.js';
import { createLogger } from '../src/log.js';
import { actionLabel } from '../src/games/blackjack/advisor.js';
import { formatHand } from '../src/games/blackjack/cards.js';
import { analyze, type Feedback } from '../src/games/blackjack/engine.js';
import { createTable, deal, hit, stand } from '../src/games/blackjack/table.js';
import { SimulationPool, analyzeWithPool, destroySimulationPool, getSimulationPool } from '../src/compute/pool.js';
import { RNG, rngFromSeed } from '../src/util/rng.js';
import { TableError } from '../src/util/errors.js';
import type { TableState } from '../src/games/blackjack/types.js';

const log = createLogger('play');

async function playRound(round: number, table: TableState, pool: SimulationPool | null, trials: number, rng: RNG): Promise<void> {
    while (table.phase === 'playing') {
        const opts = { roundActive: true, trials, rng };
        const feedback: Feedback = pool
            ? await analyzeWithPool(pool, table.engine, opts)
            : analyze(table.engine, opts);
        log.info({
            msg: 'feedback',
            round,
            player: formatHand(table.engine.player),
            dealer: formatHand(table.engine.dealer),
            total: feedback.playerTotal,
            advice: actionLabel(feedback.action),
            outcomes: feedback.outcomes,
            trueCount: Number(feedback.count.trueCount.toFixed(2)),
        });
        if (feedback.action === 'hit') hit(table, rng);
        else stand(table, rng);
    }
}

async function main(): Promise<void> {
    const config = getConfig();
    const rounds = Number(process.argv[2] ?? 10);
    const rng = rngFromSeed(config.seed);
    const table = createTable({
        numDecks: config.decks,
        credits: config.startCredits,
        bet: config.startBet,
        betStep: config.betStep,
    }, rng);
    const pool = config.workers > 0 ? getSimulationPool(config.workers) : null;

    try {
        for (let i = 0; i < rounds; i++) {
            try {
                deal(table, rng);
            } catch (err) {
                if (err instanceof TableError && err.code === 'insufficient_credits') {
                    log.warn({ msg: 'out_of_credits', round: i, credits: table.credits });
                    break;
                }
                throw err;
            }
            await playRound(i, table, pool, config.trials, rng);
        }
    } finally {
        await destroySimulationPool();
    }
    log.info({ msg: 'session_done', credits: table.credits });
}

if (require.main === module) {
    main().catch((err) => {
        log.error({ msg: 'play_error', error: String(err) });
        process.exit(1);
    });
}
