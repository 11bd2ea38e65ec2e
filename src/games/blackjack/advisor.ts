import { handTotal, isPair } from './cards.js';
import type { Action, Card } from './types.js';

const LABELS: Record<Action, string> = {
  hit: 'Hit',
  stand: 'Stand',
  split: 'Split',
  bust: 'Bust',
  consider_odds: 'Consider odds',
};

export function actionLabel(action: Action): string {
  return LABELS[action];
}

/**
 * Basic-strategy recommendation. Rules are checked in order: bust, 21, soft
 * totals, pairs, hard totals. A pair with no rule of its own (9s) falls
 * through to `consider_odds`. A missing dealer card counts as 0.
 */
export function recommend(player: readonly Card[], dealerUpCard?: Card): Action {
  const { total, soft } = handTotal(player);
  const up = dealerUpCard?.value ?? 0;

  if (total > 21) return 'bust';
  if (total === 21) return 'stand';

  if (soft) {
    if (total >= 19) return 'stand';
    if (total === 18) return up < 9 ? 'stand' : 'hit';
    return 'hit';
  }

  if (isPair(player)) {
    const pairValue = player[0].value;
    if (pairValue === 8 || pairValue === 11) return 'split';
    if (pairValue === 10) return 'stand';
    if (pairValue <= 7) return 'hit';
    return 'consider_odds';
  }

  if (total >= 17) return 'stand';
  if (total <= 11) return 'hit';
  if (total >= 12 && total <= 16) return up < 7 ? 'stand' : 'hit';
  return 'consider_odds';
}
