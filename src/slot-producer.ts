import { InvalidConfigError } from './errors';
import { distinctSymbols } from './game-config';
import type { LotteryResult, Outcome } from './lottery';
import { pickOne, randomInt, shuffle, type RandomSource } from './rng';

export interface SlotResult<S> {
  /** The line shown to the player, drawn for the displayed outcome. */
  symbols: S[];
  matched: boolean;
  /** For a fake result only: the line for the real outcome, shown afterwards. */
  reveal?: S[];
}

export function isMatchedLine<S>(symbols: readonly S[]): boolean {
  return symbols.length > 0 && symbols.every((s) => s === symbols[0]);
}

function requireReels(reels: number): void {
  if (!Number.isSafeInteger(reels) || reels <= 0) {
    throw new InvalidConfigError(`reel count must be a positive integer, got ${reels}`);
  }
}

function produceWinLine<S>(reels: number, symbols: readonly S[], random: RandomSource): S[] {
  if (symbols.length === 0) throw new InvalidConfigError('symbol set is empty');
  return Array<S>(reels).fill(pickOne(symbols, random));
}

/**
 * Splits the shuffled symbol set into two non-empty groups and fills the line
 * from both, so at least two distinct symbols always show.
 */
function produceLoseLine<S>(reels: number, symbols: readonly S[], random: RandomSource): S[] {
  const pool = shuffle(distinctSymbols(symbols), random);
  if (pool.length < 2) {
    throw new InvalidConfigError('a losing line needs at least 2 distinct symbols');
  }
  if (reels < 2) {
    throw new InvalidConfigError('a losing line needs at least 2 reels');
  }

  const partition = randomInt(random, 1, pool.length);
  const first = pool.slice(0, partition);
  const second = pool.slice(partition);

  const firstCount = randomInt(random, 1, reels);
  const line: S[] = [];
  for (let i = 0; i < firstCount; i++) line.push(pickOne(first, random));
  for (let i = firstCount; i < reels; i++) line.push(pickOne(second, random));

  return shuffle(line, random);
}

export function produceSlot<S>(
  reels: number,
  symbols: readonly S[],
  displayedOutcome: Outcome,
  random: RandomSource,
): SlotResult<S> {
  requireReels(reels);
  return displayedOutcome === 'win'
    ? { symbols: produceWinLine(reels, symbols, random), matched: true }
    : { symbols: produceLoseLine(reels, symbols, random), matched: false };
}

export class SlotProducer<S> {
  constructor(
    readonly reels: number,
    readonly symbols: readonly S[],
    private readonly random: RandomSource,
  ) {}

  produce(displayedOutcome: Outcome): SlotResult<S> {
    return produceSlot(this.reels, this.symbols, displayedOutcome, this.random);
  }

  /** Draws the displayed line first, then the reveal line when the result is fake. */
  produceFor(result: LotteryResult): SlotResult<S> {
    const slot = this.produce(result.displayedOutcome);
    if (!result.isFake) return slot;
    return { ...slot, reveal: this.produce(result.realOutcome).symbols };
  }

  produceWin(): S[] {
    return this.produce('win').symbols;
  }

  produceLose(): S[] {
    return this.produce('lose').symbols;
  }
}
