import { RNG, cryptoRNG } from '../../util/rng.js';
import { recommend } from './advisor.js';
import { handTotal, handValue } from './cards.js';
import { createCount, onDraw } from './counter.js';
import { createShoe, drawFromShoe, getCardProbabilities as probabilitiesOf, remainingCount, snapshotShoe } from './shoe.js';
import { DEFAULT_TRIALS, estimateOutcomes as simulate } from './simulator.js';
import type {
  Action,
  Card,
  CardProbabilityTable,
  CountState,
  EngineState,
  OutcomeDistribution,
  Shoe,
  Target,
} from './types.js';

export interface EngineOptions {
  numDecks?: number;
  rng?: RNG;
}

export interface Feedback {
  playerTotal: number;
  playerSoft: boolean;
  dealerTotal: number;
  cardProbabilities: CardProbabilityTable;
  outcomes: OutcomeDistribution;
  action: Action;
  count: CountState;
  remaining: number;
}

export function createEngine(opts: EngineOptions = {}): EngineState {
  return {
    shoe: createShoe(opts.numDecks ?? 6, opts.rng ?? cryptoRNG),
    player: [],
    dealer: [],
    count: createCount(),
  };
}

export function newRound(state: EngineState): EngineState {
  state.player = [];
  state.dealer = [];
  return state;
}

export function draw(state: EngineState, target: Target, rng: RNG = cryptoRNG): Card {
  const { card, reshuffled } = drawFromShoe(state.shoe, rng);
  // the count belongs to the shoe it was kept on
  if (reshuffled) state.count = createCount();
  if (target === 'player') state.player.push(card);
  else state.dealer.push(card);
  state.count = onDraw(state.count, card, remainingCount(state.shoe));
  return card;
}

export function getHandValue(hand: readonly Card[]): number {
  return handValue(hand);
}

export function getCardProbabilities(shoe: Shoe): CardProbabilityTable {
  return probabilitiesOf(shoe.cards);
}

export function getCountState(state: EngineState): CountState {
  return { ...state.count };
}

export function estimateOutcomes(
  state: EngineState,
  roundActive: boolean,
  trials = DEFAULT_TRIALS,
  rng: RNG = cryptoRNG,
): OutcomeDistribution {
  return simulate({
    player: state.player.slice(),
    dealer: state.dealer.slice(),
    shoe: snapshotShoe(state.shoe),
    roundActive,
    trials,
    rng,
  });
}

export function recommendFor(state: EngineState): Action {
  return recommend(state.player, state.dealer[0]);
}

/** Feedback panel values around an outcome estimate computed elsewhere. */
export function feedbackFor(state: EngineState, outcomes: OutcomeDistribution): Feedback {
  const player = handTotal(state.player);
  return {
    playerTotal: player.total,
    playerSoft: player.soft,
    dealerTotal: handValue(state.dealer),
    cardProbabilities: getCardProbabilities(state.shoe),
    outcomes,
    action: recommendFor(state),
    count: getCountState(state),
    remaining: remainingCount(state.shoe),
  };
}

/** Everything the feedback panel shows, recomputed on every call. */
export function analyze(
  state: EngineState,
  opts: { roundActive: boolean; trials?: number; rng?: RNG },
): Feedback {
  return feedbackFor(state, estimateOutcomes(state, opts.roundActive, opts.trials, opts.rng));
}
