import { describe, expect, test } from '@jest/globals';
import { InvalidConfigError } from '../../../util/errors.js';
import { seededRNG } from '../../../util/rng.js';
import { makeCard } from '../cards.js';
import { createShoe, drawFromShoe, snapshotShoe } from '../shoe.js';
import { candidatePool, estimateOutcomes, mergeTallies, runTrials, toDistribution } from '../simulator.js';
import type { OutcomeDistribution } from '../types.js';
import { hand } from './helpers.js';

const total = (d: OutcomeDistribution) => d.bust + d.win + d.push + d.lose;

describe('outcome simulator', () => {
  test('busted player short-circuits', () => {
    const result = estimateOutcomes({
      player: hand('K', 'Q', '5'),
      dealer: hand('6'),
      shoe: [],
      roundActive: true,
    });
    expect(result).toEqual({ bust: 1, win: 0, push: 0, lose: 0 });
  });

  test('dealer stops at 17 and loses to 19', () => {
    const shoe = [makeCard('7', 'C'), makeCard('7', 'D')];
    const result = estimateOutcomes({
      player: hand('10', '9'),
      dealer: [makeCard('K', 'D')],
      shoe,
      roundActive: false,
      trials: 50,
      rng: seededRNG(1),
    });
    expect(result).toEqual({ bust: 0, win: 1, push: 0, lose: 0 });
  });

  test('one more card for an active round', () => {
    const result = estimateOutcomes({
      player: hand('10', '5'),
      dealer: [makeCard('K', 'D')],
      shoe: [makeCard('Q', 'C'), makeCard('Q', 'D')],
      roundActive: true,
      trials: 20,
      rng: seededRNG(2),
    });
    expect(result.bust).toBe(1);
  });

  test('equal totals push', () => {
    const result = estimateOutcomes({
      player: hand('10', '7'),
      dealer: [makeCard('K', 'D')],
      shoe: [makeCard('7', 'C')],
      roundActive: false,
      trials: 10,
      rng: seededRNG(3),
    });
    expect(result.push).toBe(1);
  });

  test('higher dealer total loses', () => {
    const result = estimateOutcomes({
      player: hand('10', '6'),
      dealer: [makeCard('K', 'D')],
      shoe: [makeCard('8', 'C')],
      roundActive: false,
      trials: 10,
      rng: seededRNG(4),
    });
    expect(result.lose).toBe(1);
  });

  test('dealer bust is a win', () => {
    const result = estimateOutcomes({
      player: hand('10', '2'),
      dealer: [makeCard('10', 'D'), makeCard('6', 'C')],
      shoe: [makeCard('K', 'H')],
      roundActive: false,
      trials: 10,
      rng: seededRNG(5),
    });
    expect(result.win).toBe(1);
  });

  test('draws sample the pool with replacement within a trial', () => {
    const result = estimateOutcomes({
      player: hand('10', '8'),
      dealer: [makeCard('2', 'D')],
      shoe: [makeCard('5', 'C')],
      roundActive: false,
      trials: 25,
      rng: seededRNG(8),
    });
    // 2 + 5 + 5 + 5: the single 5 is drawn three times
    expect(result).toEqual({ bust: 0, win: 1, push: 0, lose: 0 });
  });

  test('dealer stands on soft 17', () => {
    const result = estimateOutcomes({
      player: hand('10', '8'),
      dealer: [makeCard('A', 'D'), makeCard('6', 'C')],
      shoe: [makeCard('5', 'C')],
      roundActive: false,
      trials: 25,
      rng: seededRNG(9),
    });
    expect(result).toEqual({ bust: 0, win: 1, push: 0, lose: 0 });
  });

  test('empty pool leaves both hands as they are', () => {
    const result = estimateOutcomes({
      player: hand('10', '9'),
      dealer: [makeCard('K', 'D')],
      shoe: [],
      roundActive: true,
      trials: 10,
      rng: seededRNG(6),
    });
    expect(result).toEqual({ bust: 0, win: 1, push: 0, lose: 0 });
  });

  test('cards matching the hands are left out of the pool', () => {
    const player = [makeCard('K', 'S'), makeCard('8', 'H')];
    const dealer = [makeCard('8', 'D')];
    const shoe = [makeCard('K', 'S'), makeCard('9', 'C')];
    expect(candidatePool(shoe, player, dealer)).toEqual([makeCard('9', 'C')]);
    const result = estimateOutcomes({ player, dealer, shoe, roundActive: false, trials: 40, rng: seededRNG(7) });
    expect(result.win).toBe(1);
  });

  test('probabilities sum to one on a real shoe', () => {
    const rng = seededRNG(11);
    const shoe = createShoe(6, rng);
    const player = [drawFromShoe(shoe, rng).card, drawFromShoe(shoe, rng).card];
    const dealer = [drawFromShoe(shoe, rng).card];
    for (const roundActive of [true, false]) {
      for (const trials of [1, 7, 1000]) {
        const d = estimateOutcomes({ player, dealer, shoe: snapshotShoe(shoe), roundActive, trials, rng });
        expect(Math.abs(total(d) - 1)).toBeLessThan(1e-9);
      }
    }
  });

  test('seeded runs repeat and leave the shoe alone', () => {
    const shoe = createShoe(2, seededRNG(12));
    const before = shoe.cards.slice();
    const input = { player: hand('9', '4'), dealer: hand('10'), shoe: shoe.cards, roundActive: true };
    const a = estimateOutcomes({ ...input, rng: seededRNG(99) });
    const b = estimateOutcomes({ ...input, rng: seededRNG(99) });
    expect(a).toEqual(b);
    expect(shoe.cards).toEqual(before);
  });

  test('rejects a non-positive trial count', () => {
    const input = { player: hand('9', '4'), dealer: hand('10'), shoe: [], roundActive: false };
    expect(() => estimateOutcomes({ ...input, trials: 0 })).toThrow(InvalidConfigError);
    expect(() => estimateOutcomes({ ...input, trials: 2.5 })).toThrow(InvalidConfigError);
  });

  test('tallies merge by summing', () => {
    const batch = {
      player: hand('10', '9'),
      dealer: [makeCard('K', 'D')],
      pool: [makeCard('7', 'C')],
      roundActive: false,
      trials: 3,
    };
    const merged = mergeTallies([runTrials(batch, seededRNG(1)), runTrials({ ...batch, trials: 5 }, seededRNG(2))]);
    expect(merged).toEqual({ bust: 0, win: 8, push: 0, lose: 0 });
    expect(toDistribution({ bust: 1, win: 2, push: 3, lose: 4 }, 10)).toEqual({ bust: 0.1, win: 0.2, push: 0.3, lose: 0.4 });
  });
});
