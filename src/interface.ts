import type { Command } from './command';
import type { GameError } from './errors';
import type { GameState, Transition } from './game-state';
import type { LotteryResult } from './lottery';
import type { SlotResult } from './slot-producer';

export interface UserInput {
  /** Commands queued since the last poll, in order; `null` once the input is closed. */
  waitForInput(): Command[] | null;
}

export interface UserOutput<S> {
  transition(transition: Transition): void;
  finishGame(state: GameState): void;
  /** `slot` is null when the ball missed the start hole. */
  lotteryNormal(result: LotteryResult, slot: SlotResult<S> | null): void;
  lotteryRush(result: LotteryResult, slot: SlotResult<S>): void;
  lotteryRushContinue(result: LotteryResult, slot: SlotResult<S>): void;
  commandRejected(error: GameError, state: GameState): void;
}
