export * from './games/blackjack/types.js';
export {
    RANKS,
    SUITS,
    formatCard,
    formatHand,
    handTotal,
    handValue,
    isBlackjack,
    isBust,
    isPair,
    makeCard,
    valueOfRank,
} from './games/blackjack/cards.js';
export { buildCards, createShoe, drawFromShoe, remainingCount, snapshotShoe } from './games/blackjack/shoe.js';
export { computeTrueCount, createCount, hiLoTag, onDraw } from './games/blackjack/counter.js';
export {
    DEFAULT_TRIALS,
    candidatePool,
    estimateOutcomes as simulateOutcomes,
    mergeTallies,
    runTrials,
    toDistribution,
    type SimulationInput,
} from './games/blackjack/simulator.js';
export { actionLabel, recommend } from './games/blackjack/advisor.js';
export {
    analyze,
    feedbackFor,
    createEngine,
    draw,
    estimateOutcomes,
    getCardProbabilities,
    getCountState,
    getHandValue,
    newRound,
    recommendFor,
    type EngineOptions,
    type Feedback,
} from './games/blackjack/engine.js';
export { createTable, deal, hit, lowerBet, raiseBet, settle, stand, type TableOptions } from './games/blackjack/table.js';
export { SimulationPool, analyzeWithPool, destroySimulationPool, getSimulationPool, splitTrials } from './compute/pool.js';
export { DEFAULT_CONFIG, getConfig, loadConfig, type TrainerConfig } from './config/index.js';
export { InvalidConfigError, TableError, TrainerError, type TrainerErrorCode } from './util/errors.js';
export { cryptoRNG, mulberry32, rngFromSeed, seededRNG, type RNG } from './util/rng.js';
