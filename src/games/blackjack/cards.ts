import type { Card, Rank, Suit } from './types.js';

export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'];
export const SUITS: readonly Suit[] = ['S', 'H', 'D', 'C'];

const SUIT_GLYPHS: Record<Suit, string> = { S: '♠', H: '♥', D: '♦', C: '♣' };

export function valueOfRank(r: Rank): number {
  if (r === 'A') return 11; // demoted to 1 by handTotal when needed
  if (r === 'K' || r === 'Q' || r === 'J' || r === '10') return 10;
  return parseInt(r, 10);
}

export function makeCard(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit, value: valueOfRank(rank) });
}

export function sameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/**
 * Best blackjack total for a hand. Every Ace starts at 11 and is demoted to 1
 * one at a time while the hand is over 21, so the result is independent of
 * card order. `soft` is true while at least one Ace still counts as 11.
 */
export function handTotal(cards: readonly Card[]): { total: number; soft: boolean } {
  let total = 0;
  let aces = 0;
  for (const c of cards) {
    total += c.value;
    if (c.rank === 'A') aces++;
  }
  while (total > 21 && aces > 0) {
    total -= 10;
    aces--;
  }
  return { total, soft: aces > 0 };
}

export function handValue(cards: readonly Card[]): number {
  return handTotal(cards).total;
}

export function isBust(cards: readonly Card[]): boolean {
  return handValue(cards) > 21;
}

export function isPair(cards: readonly Card[]): boolean {
  return cards.length === 2 && cards[0].rank === cards[1].rank;
}

export function isBlackjack(cards: readonly Card[]): boolean {
  return cards.length === 2 && handValue(cards) === 21;
}

export function formatCard(c: Card): string {
  return `${c.rank}${SUIT_GLYPHS[c.suit]}`;
}

export function formatHand(cards: readonly Card[]): string {
  return cards.map(formatCard).join(' ');
}
