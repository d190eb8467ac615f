import type { GameError, GameErrorKind } from './errors';
import type { GameState, Transition } from './game-state';
import type { UserOutput } from './interface';
import type { LotteryResult } from './lottery';
import type { SlotResult } from './slot-producer';

export type LotteryContext = 'normal' | 'rush' | 'rushContinue';

export type GameEvent<S> =
  | { type: 'transition'; before: GameState | null; after: GameState }
  | { type: 'finished'; state: GameState }
  | { type: 'lottery'; context: LotteryContext; result: LotteryResult; slot: SlotResult<S> | null }
  | { type: 'rejected'; kind: GameErrorKind; message: string; state: GameState };

/** Collects notices until the caller drains them (one HTTP request's worth). */
export class RecordingOutput<S> implements UserOutput<S> {
  private events: GameEvent<S>[] = [];

  transition({ before, after }: Transition): void {
    this.events.push({ type: 'transition', before, after });
  }

  finishGame(state: GameState): void {
    this.events.push({ type: 'finished', state });
  }

  lotteryNormal(result: LotteryResult, slot: SlotResult<S> | null): void {
    this.events.push({ type: 'lottery', context: 'normal', result, slot });
  }

  lotteryRush(result: LotteryResult, slot: SlotResult<S>): void {
    this.events.push({ type: 'lottery', context: 'rush', result, slot });
  }

  lotteryRushContinue(result: LotteryResult, slot: SlotResult<S>): void {
    this.events.push({ type: 'lottery', context: 'rushContinue', result, slot });
  }

  commandRejected(error: GameError, state: GameState): void {
    this.events.push({ type: 'rejected', kind: error.kind, message: error.message, state });
  }

  drain(): GameEvent<S>[] {
    const out = this.events;
    this.events = [];
    return out;
  }
}
