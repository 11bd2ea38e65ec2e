import Piscina from 'piscina';
import path from 'node:path';
import { z } from 'zod';
import { scopedLogger } from '../log.js';
import { normalizeError } from '../util/errors.js';
import { RNG, cryptoRNG, deriveSeed } from '../util/rng.js';
import {
    DEFAULT_TRIALS,
    assertTrials,
    bustDistribution,
    candidatePool,
    mergeTallies,
    toDistribution,
    type SimulationInput,
} from '../games/blackjack/simulator.js';
import { handValue } from '../games/blackjack/cards.js';
import { feedbackFor, type Feedback } from '../games/blackjack/engine.js';
import { snapshotShoe } from '../games/blackjack/shoe.js';
import type { EngineState, OutcomeDistribution, OutcomeTally } from '../games/blackjack/types.js';
import type { ComputeRequest } from './worker.js';

const log = scopedLogger('compute');

const tallySchema = z.object({
    bust: z.number().int().min(0),
    win: z.number().int().min(0),
    push: z.number().int().min(0),
    lose: z.number().int().min(0),
});

export interface PoolOptions {
    maxThreads: number;
    timeoutMs?: number;
    filename?: string;
}

/** Splits `trials` into at most `chunks` near-equal positive parts. */
export function splitTrials(trials: number, chunks: number): number[] {
    const n = Math.max(1, Math.min(chunks, trials));
    const base = Math.floor(trials / n);
    const extra = trials % n;
    return Array.from({ length: n }, (_, i) => base + (i < extra ? 1 : 0));
}

export class SimulationPool {
    private pool?: Piscina;
    private readonly timeoutMs: number;

    constructor(private readonly options: PoolOptions) {
        this.timeoutMs = options.timeoutMs ?? 30000;
    }

    get threads(): number {
        return Math.max(1, this.options.maxThreads);
    }

    init(): void {
        if (this.pool) return;
        this.pool = new Piscina({
            filename: this.options.filename ?? path.join(__dirname, 'worker.js'),
            maxThreads: this.threads,
            minThreads: Math.min(2, this.threads),
            idleTimeout: 30000,
        });
        log().info({ msg: 'compute_pool_initialized', maxThreads: this.threads });
    }

    async run(request: ComputeRequest): Promise<OutcomeTally> {
        if (!this.pool) {
            throw new Error('Compute pool not initialized');
        }
        try {
            const result: unknown = await this.pool.run(request, { signal: AbortSignal.timeout(this.timeoutMs) });
            return tallySchema.parse(result);
        } catch (error) {
            log().error({ msg: 'compute_task_error', op: request.op, error: normalizeError(error) });
            throw error;
        }
    }

    /**
     * Same estimator as the in-process one, with the trials spread over the
     * worker threads. Every chunk samples the same frozen pool with its own
     * seed; the tallies are summed before dividing by `trials`.
     */
    async estimateOutcomes(input: SimulationInput, chunks = this.threads): Promise<OutcomeDistribution> {
        const trials = input.trials ?? DEFAULT_TRIALS;
        assertTrials(trials);
        if (handValue(input.player) > 21) return bustDistribution();

        const rng: RNG = input.rng ?? cryptoRNG;
        const player = input.player.slice();
        const dealer = input.dealer.slice();
        const pool = candidatePool(input.shoe, player, dealer);
        const requests: ComputeRequest[] = splitTrials(trials, chunks).map((n) => ({
            op: 'simulate.trials',
            task: { player, dealer, pool, roundActive: input.roundActive, trials: n, seed: deriveSeed(rng) },
        }));
        const tallies = await Promise.all(requests.map((r) => this.run(r)));
        return toDistribution(mergeTallies(tallies), trials);
    }

    async destroy(): Promise<void> {
        if (this.pool) {
            await this.pool.destroy();
            this.pool = undefined;
            log().info({ msg: 'compute_pool_destroyed' });
        }
    }
}

/** `analyze` with the outcome estimate spread over the pool's threads. */
export async function analyzeWithPool(
    pool: SimulationPool,
    state: EngineState,
    opts: { roundActive: boolean; trials?: number; rng?: RNG },
): Promise<Feedback> {
    const outcomes = await pool.estimateOutcomes({
        player: state.player.slice(),
        dealer: state.dealer.slice(),
        shoe: snapshotShoe(state.shoe),
        roundActive: opts.roundActive,
        trials: opts.trials,
        rng: opts.rng,
    });
    return feedbackFor(state, outcomes);
}

// One pool per process, sized by the first caller
let poolInstance: SimulationPool | null = null;

export function getSimulationPool(maxThreads: number): SimulationPool {
    if (!poolInstance) {
        poolInstance = new SimulationPool({ maxThreads });
        poolInstance.init();
    }
    return poolInstance;
}

export async function destroySimulationPool(): Promise<void> {
    if (poolInstance) {
        await poolInstance.destroy();
        poolInstance = null;
    }
}
