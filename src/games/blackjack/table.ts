import { scopedLogger } from '../../log.js';
import { TableError } from '../../util/errors.js';
import { RNG, cryptoRNG } from '../../util/rng.js';
import { formatHand, handValue } from './cards.js';
import { createEngine, draw, newRound } from './engine.js';
import { compareTotals, DEALER_STANDS_AT } from './simulator.js';
import type { Card, RoundResult, TablePhase, TableState } from './types.js';

const log = scopedLogger('table');

export interface TableOptions {
  numDecks?: number;
  credits?: number;
  bet?: number;
  betStep?: number;
}

export function createTable(opts: TableOptions = {}, rng: RNG = cryptoRNG): TableState {
  const betStep = opts.betStep ?? 100;
  return {
    engine: createEngine({ numDecks: opts.numDecks ?? 6, rng }),
    phase: 'betting',
    credits: opts.credits ?? 1000,
    bet: opts.bet ?? 100,
    minBet: betStep,
    betStep,
  };
}

function requirePhase(table: TableState, action: string, ...allowed: TablePhase[]): void {
  if (!allowed.includes(table.phase)) {
    throw new TableError('wrong_phase', `cannot ${action} during ${table.phase}`);
  }
}

export function raiseBet(table: TableState): number {
  requirePhase(table, 'change the bet', 'betting', 'game_over');
  table.bet = Math.min(table.bet + table.betStep, table.credits);
  return table.bet;
}

// The floor drops below minBet once credits do, so a short stack can still play.
export function lowerBet(table: TableState): number {
  requirePhase(table, 'change the bet', 'betting', 'game_over');
  table.bet = Math.max(table.bet - table.betStep, Math.min(table.minBet, table.credits));
  return table.bet;
}

/** Win, push or lose from the player's side; a player bust loses outright. */
export function settle(player: readonly Card[], dealer: readonly Card[]): RoundResult {
  const outcome = compareTotals(handValue(player), handValue(dealer));
  return outcome === 'bust' ? 'lose' : outcome;
}

function finish(table: TableState, result: RoundResult): void {
  if (result === 'win') table.credits += table.bet;
  else if (result === 'lose') table.credits -= table.bet;
  if (table.credits > 0 && table.bet > table.credits) table.bet = table.credits;
  table.result = result;
  table.phase = 'game_over';
  log().info({
    msg: 'round_settled',
    result,
    player: formatHand(table.engine.player),
    dealer: formatHand(table.engine.dealer),
    credits: table.credits,
  });
}

export function deal(table: TableState, rng: RNG = cryptoRNG): void {
  requirePhase(table, 'deal', 'betting', 'game_over');
  if (table.bet <= 0 || table.credits < table.bet) {
    throw new TableError('insufficient_credits', `bet ${table.bet} exceeds credits ${table.credits}`);
  }
  newRound(table.engine);
  draw(table.engine, 'player', rng);
  draw(table.engine, 'player', rng);
  draw(table.engine, 'dealer', rng);
  table.result = undefined;
  table.phase = 'playing';
  log().debug({ msg: 'round_dealt', player: formatHand(table.engine.player), dealer: formatHand(table.engine.dealer) });
}

export function hit(table: TableState, rng: RNG = cryptoRNG): Card {
  requirePhase(table, 'hit', 'playing');
  const card = draw(table.engine, 'player', rng);
  if (handValue(table.engine.player) > 21) finish(table, 'lose');
  return card;
}

export function stand(table: TableState, rng: RNG = cryptoRNG): RoundResult {
  requirePhase(table, 'stand', 'playing');
  while (handValue(table.engine.dealer) < DEALER_STANDS_AT) {
    draw(table.engine, 'dealer', rng);
  }
  const result = settle(table.engine.player, table.engine.dealer);
  finish(table, result);
  return result;
}
