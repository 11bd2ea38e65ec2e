import { InvalidConfigError } from '../../util/errors.js';
import { RNG, cryptoRNG, shuffle } from '../../util/rng.js';
import { RANKS, SUITS, makeCard } from './cards.js';
import type { Card, CardProbabilityTable, Shoe } from './types.js';

export const CARDS_PER_DECK = 52;

function assertDecks(numDecks: number): void {
  if (!Number.isInteger(numDecks) || numDecks <= 0) {
    throw new InvalidConfigError(`numDecks must be a positive integer, got ${numDecks}`);
  }
}

export function buildCards(numDecks: number): Card[] {
  assertDecks(numDecks);
  const cards: Card[] = [];
  for (let d = 0; d < numDecks; d++) {
    for (const s of SUITS) {
      for (const r of RANKS) {
        cards.push(makeCard(r, s));
      }
    }
  }
  return cards;
}

export function createShoe(numDecks = 6, rng: RNG = cryptoRNG): Shoe {
  return { numDecks, cards: shuffle(buildCards(numDecks), rng) };
}

/**
 * Removes the top card. An exhausted shoe is rebuilt with the same number of
 * decks and reshuffled first; `reshuffled` tells the caller so it can reset
 * anything tied to the old shoe.
 */
export function drawFromShoe(shoe: Shoe, rng: RNG = cryptoRNG): { card: Card; reshuffled: boolean } {
  let reshuffled = false;
  if (shoe.cards.length === 0) {
    shoe.cards = shuffle(buildCards(shoe.numDecks), rng);
    reshuffled = true;
  }
  const card = shoe.cards.pop();
  if (!card) throw new Error('shoe is empty after reshuffle');
  return { card, reshuffled };
}

export function remainingCount(shoe: Shoe): number {
  return shoe.cards.length;
}

export function snapshotShoe(shoe: Shoe): readonly Card[] {
  return Object.freeze(shoe.cards.slice());
}

export function getCardProbabilities(cards: readonly Card[]): CardProbabilityTable {
  const table: CardProbabilityTable = {};
  for (let v = 2; v <= 11; v++) table[v] = 0;
  if (cards.length === 0) return table;
  for (const c of cards) table[c.value] += 1;
  for (let v = 2; v <= 11; v++) table[v] /= cards.length;
  return table;
}
