import type { Probability, SlotProbability } from './game-config';
import { chance, type RandomSource } from './rng';

export type Outcome = 'win' | 'lose';

export interface LotteryResult {
  /** Drives the state machine. */
  realOutcome: Outcome;
  /** What the player is shown; may be a tell. */
  displayedOutcome: Outcome;
  isFake: boolean;
}

/** A ball that missed the start hole: nothing was drawn. */
export const NO_EVENT: Readonly<LotteryResult> = Object.freeze({
  realOutcome: 'lose',
  displayedOutcome: 'lose',
  isFake: false,
});

export const isWin = (result: LotteryResult): boolean => result.realOutcome === 'win';

/**
 * Two draws, always in this order: the real outcome, then the tell.
 * fakeWin turns a real win into a displayed lose, fakeLose a real lose into
 * a displayed win.
 */
export function drawLottery(probability: SlotProbability, random: RandomSource): LotteryResult {
  const realOutcome: Outcome = chance(probability.win, random) ? 'win' : 'lose';
  const fakeChance = realOutcome === 'win' ? probability.fakeWin : probability.fakeLose;
  const isFake = chance(fakeChance, random);
  const displayedOutcome: Outcome = isFake ? (realOutcome === 'win' ? 'lose' : 'win') : realOutcome;
  return { realOutcome, displayedOutcome, isFake };
}

const clamp01 = (x: number) => Math.min(1, Math.max(0, x));

export function rushContinueProbability(probability: Probability, rushCount: number): SlotProbability {
  const { rushContinue, rushContinueFn } = probability;
  return {
    ...rushContinue,
    win: clamp01(rushContinue.win * rushContinueFn(rushCount)),
  };
}

export class Lottery {
  constructor(
    private readonly probability: Probability,
    private readonly random: RandomSource,
  ) {}

  normal(): LotteryResult {
    return drawLottery(this.probability.normal, this.random);
  }

  rush(): LotteryResult {
    return drawLottery(this.probability.rush, this.random);
  }

  rushContinue(rushCount: number): LotteryResult {
    return drawLottery(rushContinueProbability(this.probability, rushCount), this.random);
  }
}
