//  GameConfig
// Central place for tuning the pachislo engine.
// Change values here to experiment with ball flow & rush length.

import { InvalidConfigError } from './errors';

export type Sym = 'Seven' | 'Bar' | 'Bell' | 'Cherry' | 'Lemon';

export const SYMBOLS: readonly Sym[] = Object.freeze(['Seven', 'Bar', 'Bell', 'Cherry', 'Lemon']);

export interface BallsConfig {
  /** Balls handed out by StartGame. */
  initBalls: number;
  /** Balls awarded by a real win in normal mode. */
  incrementalBalls: number;
  /** Balls awarded by a real win in rush mode. */
  incrementalRush: number;
}

export interface SlotProbability {
  win: number;
  /** Chance that a real win is displayed as a lose. */
  fakeWin: number;
  /** Chance that a real lose is displayed as a win. */
  fakeLose: number;
}

export interface Probability {
  startHole: number;
  normal: SlotProbability;
  rush: SlotProbability;
  rushContinue: SlotProbability;
  /**
   * Scales `rushContinue.win` by rush count: the continuation draw uses
   * `rushContinue.win * rushContinueFn(n)`. Should return 1 for n == 1 and
   * never increase.
   */
  rushContinueFn: (rushCount: number) => number;
}

export interface SlotConfig<S> {
  reels: number;
  symbols: readonly S[];
}

export interface GameConfig<S = Sym> {
  balls: BallsConfig;
  probability: Probability;
  slot: SlotConfig<S>;
}

/** rushContinueFn is checked over this range of rush counts. */
export const RUSH_CONTINUE_FN_DOMAIN = 64;

export const START_HOLE_PROBABILITY_EXAMPLE = 0.12;

/*
  Geometric decay: every further rush round keeps 60% of the previous
  continuation chance. f(1) == 1.
 */
export const decayBy =
  (ratio: number) =>
  (rushCount: number): number =>
    Math.pow(ratio, rushCount - 1);

export const CONFIG_EXAMPLE: GameConfig<Sym> = Object.freeze({
  balls: Object.freeze({
    initBalls: 1000,
    incrementalBalls: 15,
    incrementalRush: 300,
  }),
  probability: Object.freeze({
    /*
      Chance that a launched ball drops into the start hole.
      Only a ball in the start hole triggers a normal-mode lottery.
     */
    startHole: START_HOLE_PROBABILITY_EXAMPLE,

    /*
      Normal mode:
        win      - chance of a real win (enters RUSH)
        fakeWin  - a real win shown as a lose first
        fakeLose - a real lose teased as a win
     */
    normal: Object.freeze({ win: 0.16, fakeWin: 0.3, fakeLose: 0.15 }),

    // Rush mode: every launch is drawn, no start hole.
    rush: Object.freeze({ win: 0.48, fakeWin: 0.2, fakeLose: 0.05 }),

    // Continuing RUSH after a rush win, scaled by rushContinueFn.
    rushContinue: Object.freeze({ win: 0.8, fakeWin: 0.25, fakeLose: 0.1 }),

    rushContinueFn: decayBy(0.6),
  }),
  slot: Object.freeze({
    reels: 3,
    symbols: SYMBOLS,
  }),
});

function requireCount(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidConfigError(`${field} must be a non-negative integer`);
  }
}

function requireProbability(value: number, field: string): void {
  // also rejects NaN
  if (!(value >= 0 && value <= 1)) {
    throw new InvalidConfigError(`${field} must be within [0, 1], got ${value}`);
  }
}

function requireSlotProbability(p: SlotProbability, field: string): void {
  requireProbability(p.win, `${field}.win`);
  requireProbability(p.fakeWin, `${field}.fakeWin`);
  requireProbability(p.fakeLose, `${field}.fakeLose`);
}

export function distinctSymbols<S>(symbols: readonly S[]): S[] {
  return [...new Set(symbols)];
}

export function validateConfig<S>(config: GameConfig<S>): void {
  const { balls, probability, slot } = config;

  requireCount(balls.initBalls, 'balls.initBalls');
  requireCount(balls.incrementalBalls, 'balls.incrementalBalls');
  requireCount(balls.incrementalRush, 'balls.incrementalRush');

  requireProbability(probability.startHole, 'probability.startHole');
  requireSlotProbability(probability.normal, 'probability.normal');
  requireSlotProbability(probability.rush, 'probability.rush');
  requireSlotProbability(probability.rushContinue, 'probability.rushContinue');

  for (let n = 1; n <= RUSH_CONTINUE_FN_DOMAIN; n++) {
    requireProbability(probability.rushContinueFn(n), `probability.rushContinueFn(${n})`);
  }

  if (!Number.isSafeInteger(slot.reels) || slot.reels < 2) {
    throw new InvalidConfigError('slot.reels must be an integer >= 2');
  }
  if (distinctSymbols(slot.symbols).length < 2) {
    throw new InvalidConfigError('slot.symbols must hold at least 2 distinct symbols');
  }
}
