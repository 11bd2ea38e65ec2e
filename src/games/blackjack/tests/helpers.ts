import { SUITS, makeCard } from '../cards.js';
import type { Card, Rank } from '../types.js';

/** Cards of the given ranks, suits rotating S, H, D, C. */
export function hand(...ranks: Rank[]): Card[] {
  return ranks.map((r, i) => makeCard(r, SUITS[i % SUITS.length]));
}
