import { InvalidConfigError } from '../../util/errors.js';
import { RNG, cryptoRNG, pick } from '../../util/rng.js';
import { handValue, sameCard } from './cards.js';
import type { Card, Outcome, OutcomeDistribution, OutcomeTally } from './types.js';

export const DEFAULT_TRIALS = 1000;
export const DEALER_STANDS_AT = 17;
export const OUTCOMES: readonly Outcome[] = ['bust', 'win', 'push', 'lose'];

export interface SimulationInput {
  player: readonly Card[];
  dealer: readonly Card[];
  /** Undrawn cards at the time of the query; never mutated. */
  shoe: readonly Card[];
  roundActive: boolean;
  trials?: number;
  rng?: RNG;
}

export interface TrialBatch {
  player: readonly Card[];
  dealer: readonly Card[];
  pool: readonly Card[];
  roundActive: boolean;
  trials: number;
}

export function emptyTally(): OutcomeTally {
  return { bust: 0, win: 0, push: 0, lose: 0 };
}

export function mergeTallies(tallies: readonly OutcomeTally[]): OutcomeTally {
  const total = emptyTally();
  for (const t of tallies) {
    for (const o of OUTCOMES) total[o] += t[o];
  }
  return total;
}

export function toDistribution(tally: OutcomeTally, trials: number): OutcomeDistribution {
  return {
    bust: tally.bust / trials,
    win: tally.win / trials,
    push: tally.push / trials,
    lose: tally.lose / trials,
  };
}

export function bustDistribution(): OutcomeDistribution {
  return { bust: 1, win: 0, push: 0, lose: 0 };
}

export function assertTrials(trials: number): void {
  if (!Number.isInteger(trials) || trials <= 0) {
    throw new InvalidConfigError(`trials must be a positive integer, got ${trials}`);
  }
}

/** Snapshot minus every card that matches one already held by either side. */
export function candidatePool(shoe: readonly Card[], player: readonly Card[], dealer: readonly Card[]): Card[] {
  const held = [...player, ...dealer];
  return shoe.filter((c) => !held.some((h) => sameCard(c, h)));
}

export function compareTotals(playerTotal: number, dealerTotal: number): Outcome {
  if (playerTotal > 21) return 'bust';
  if (dealerTotal > 21) return 'win';
  if (playerTotal > dealerTotal) return 'win';
  if (playerTotal === dealerTotal) return 'push';
  return 'lose';
}

/**
 * Runs `trials` independent repetitions against one pool. Every draw samples
 * the whole pool with replacement, so a card may show up more than once in a
 * trial. Both the worker tasks and the in-process estimator call this.
 */
export function runTrials(batch: TrialBatch, rng: RNG): OutcomeTally {
  const { player, dealer, pool, roundActive, trials } = batch;
  const tally = emptyTally();
  for (let t = 0; t < trials; t++) {
    const hand = player.slice();
    if (roundActive && pool.length > 0) hand.push(pick(pool, rng));
    const playerTotal = handValue(hand);
    if (playerTotal > 21) {
      tally.bust++;
      continue;
    }
    const dealerHand = dealer.slice();
    while (handValue(dealerHand) < DEALER_STANDS_AT && pool.length > 0) {
      dealerHand.push(pick(pool, rng));
    }
    tally[compareTotals(playerTotal, handValue(dealerHand))]++;
  }
  return tally;
}

export function estimateOutcomes(input: SimulationInput): OutcomeDistribution {
  const trials = input.trials ?? DEFAULT_TRIALS;
  assertTrials(trials);
  if (handValue(input.player) > 21) return bustDistribution();
  const batch: TrialBatch = {
    player: input.player,
    dealer: input.dealer,
    pool: candidatePool(input.shoe, input.player, input.dealer),
    roundActive: input.roundActive,
    trials,
  };
  return toDistribution(runTrials(batch, input.rng ?? cryptoRNG), trials);
}
