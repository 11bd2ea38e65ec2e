import type { Card, CountState } from './types.js';
import { CARDS_PER_DECK } from './shoe.js';

export function createCount(): CountState {
  return { runningCount: 0, trueCount: 0 };
}

/** Hi-Lo tag: low cards +1, neutral 7-9, tens and Aces -1. */
export function hiLoTag(card: Card): number {
  if (card.value >= 2 && card.value <= 6) return 1;
  if (card.value >= 10) return -1;
  return 0;
}

export function computeTrueCount(runningCount: number, remaining: number): number {
  const decksLeft = remaining / CARDS_PER_DECK;
  return decksLeft > 0 ? runningCount / decksLeft : 0;
}

// Only for cards actually dealt; simulated cards never reach the count.
export function onDraw(count: CountState, card: Card, remaining: number): CountState {
  const runningCount = count.runningCount + hiLoTag(card);
  return { runningCount, trueCount: computeTrueCount(runningCount, remaining) };
}
