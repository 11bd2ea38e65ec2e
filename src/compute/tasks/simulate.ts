import { seededRNG } from '../../util/rng.js';
import { runTrials, type TrialBatch } from '../../games/blackjack/simulator.js';
import type { OutcomeTally } from '../../games/blackjack/types.js';

export interface SimulationTask extends TrialBatch {
    seed: number;
}

export function runTrialsTask(task: SimulationTask): OutcomeTally {
    const { seed, ...batch } = task;
    return runTrials(batch, seededRNG(seed));
}
