import { describe, expect, test } from '@jest/globals';
import { seededRNG } from '../../../util/rng.js';
import { recommend } from '../advisor.js';
import { hiLoTag } from '../counter.js';
import {
  analyze,
  createEngine,
  draw,
  estimateOutcomes,
  getCardProbabilities,
  getCountState,
  getHandValue,
  newRound,
} from '../engine.js';
import { remainingCount } from '../shoe.js';

describe('engine session', () => {
  test('starts with a full shoe and a zero count', () => {
    const state = createEngine({ numDecks: 6, rng: seededRNG(1) });
    expect(remainingCount(state.shoe)).toBe(312);
    expect(state.player).toEqual([]);
    expect(state.dealer).toEqual([]);
    expect(getCountState(state)).toEqual({ runningCount: 0, trueCount: 0 });
  });

  test('draw deals into the named hand and counts the card', () => {
    const rng = seededRNG(2);
    const state = createEngine({ numDecks: 6, rng });
    const card = draw(state, 'player', rng);
    expect(state.player).toEqual([card]);
    expect(state.dealer).toEqual([]);
    expect(state.count.runningCount).toBe(hiLoTag(card));
    expect(state.count.trueCount).toBeCloseTo(hiLoTag(card) / (311 / 52), 12);

    const up = draw(state, 'dealer', rng);
    expect(state.dealer).toEqual([up]);
    expect(getHandValue(state.player)).toBe(card.value);
  });

  test('newRound clears hands but keeps shoe and count', () => {
    const rng = seededRNG(3);
    const state = createEngine({ numDecks: 1, rng });
    draw(state, 'player', rng);
    draw(state, 'dealer', rng);
    const count = getCountState(state);
    newRound(state);
    expect(state.player).toEqual([]);
    expect(state.dealer).toEqual([]);
    expect(remainingCount(state.shoe)).toBe(50);
    expect(getCountState(state)).toEqual(count);
  });

  test('a full deck nets to zero and the reshuffle resets the count', () => {
    const rng = seededRNG(4);
    const state = createEngine({ numDecks: 1, rng });
    for (let i = 0; i < 52; i++) draw(state, i % 2 === 0 ? 'player' : 'dealer', rng);
    expect(remainingCount(state.shoe)).toBe(0);
    expect(getCountState(state)).toEqual({ runningCount: 0, trueCount: 0 });

    state.count = { runningCount: 5, trueCount: 0 };
    const card = draw(state, 'player', rng);
    expect(remainingCount(state.shoe)).toBe(51);
    expect(state.count.runningCount).toBe(hiLoTag(card));
  });

  test('card probabilities of the live shoe', () => {
    const state = createEngine({ numDecks: 6, rng: seededRNG(5) });
    expect(getCardProbabilities(state.shoe)[10]).toBeCloseTo(96 / 312, 12);
  });

  test('estimateOutcomes reads a snapshot', () => {
    const rng = seededRNG(6);
    const state = createEngine({ numDecks: 2, rng });
    draw(state, 'player', rng);
    draw(state, 'player', rng);
    draw(state, 'dealer', rng);
    const before = state.shoe.cards.slice();
    const d = estimateOutcomes(state, true, 500, seededRNG(7));
    expect(Math.abs(d.bust + d.win + d.push + d.lose - 1)).toBeLessThan(1e-9);
    expect(state.shoe.cards).toEqual(before);
    expect(state.player).toHaveLength(2);
  });

  test('analyze bundles every query', () => {
    const rng = seededRNG(8);
    const state = createEngine({ numDecks: 6, rng });
    draw(state, 'player', rng);
    draw(state, 'player', rng);
    draw(state, 'dealer', rng);
    const feedback = analyze(state, { roundActive: true, trials: 200, rng: seededRNG(9) });
    expect(feedback.playerTotal).toBe(getHandValue(state.player));
    expect(feedback.dealerTotal).toBe(state.dealer[0].value);
    expect(feedback.action).toBe(recommend(state.player, state.dealer[0]));
    expect(feedback.count).toEqual(state.count);
    expect(feedback.remaining).toBe(309);
    expect(feedback.outcomes).toEqual(estimateOutcomes(state, true, 200, seededRNG(9)));
  });
});
