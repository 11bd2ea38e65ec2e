export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K' | 'A';

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
  readonly value: number; // blackjack points, Ace counted high
}

export type Target = 'player' | 'dealer';

export interface Shoe {
  readonly numDecks: number;
  cards: Card[]; // undrawn; the top of the shoe is the end of the array
}

export interface CountState {
  runningCount: number;
  trueCount: number;
}

/** Point value (2..11) to the fraction of undrawn cards holding it. */
export type CardProbabilityTable = Record<number, number>;

export type Outcome = 'bust' | 'win' | 'push' | 'lose';
export type OutcomeTally = Record<Outcome, number>;
export type OutcomeDistribution = Record<Outcome, number>;

export type Action = 'hit' | 'stand' | 'split' | 'bust' | 'consider_odds';

export interface EngineState {
  shoe: Shoe;
  player: Card[];
  dealer: Card[];
  count: CountState;
}

export type TablePhase = 'betting' | 'playing' | 'game_over';
export type RoundResult = 'win' | 'push' | 'lose';

export interface TableState {
  engine: EngineState;
  phase: TablePhase;
  credits: number;
  bet: number;
  minBet: number;
  betStep: number;
  result?: RoundResult;
}
