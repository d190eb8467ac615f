import type { GameError } from './errors';
import { describeState, type GameState, type Transition } from './game-state';
import type { UserOutput } from './interface';
import type { LotteryResult } from './lottery';
import type { SlotResult } from './slot-producer';

export type Print = (line: string) => void;

function formatResult(result: LotteryResult): string {
  const shown = result.displayedOutcome.toUpperCase();
  return result.isFake ? `${shown} (fake, really ${result.realOutcome.toUpperCase()})` : shown;
}

export class TerminalOutput<S> implements UserOutput<S> {
  constructor(
    private readonly print: Print,
    private readonly formatSymbol: (symbol: S) => string = String,
  ) {}

  transition({ before, after }: Transition): void {
    if (before?.mode === 'rush' && after.mode === 'normal') {
      this.print(`RUSH finished! Number of RUSH times: ${before.rushCount}`);
    } else if (before?.mode !== 'rush' && after.mode === 'rush') {
      this.print('RUSH!');
    }
    this.print(`Current state: ${describeState(after)}`);
  }

  finishGame(state: GameState): void {
    this.print('Game finished!');
    this.print(`Final state: ${describeState(state)}`);
  }

  lotteryNormal(result: LotteryResult, slot: SlotResult<S> | null): void {
    if (slot === null) {
      this.print('Missed the start hole');
      return;
    }
    this.printSlot(slot);
    this.print(`Lottery result: ${formatResult(result)}`);
  }

  lotteryRush(result: LotteryResult, slot: SlotResult<S>): void {
    this.printSlot(slot);
    this.print(`Lottery result in rush mode: ${formatResult(result)}`);
  }

  lotteryRushContinue(result: LotteryResult, slot: SlotResult<S>): void {
    this.printSlot(slot);
    this.print(`Lottery result in rush continue: ${formatResult(result)}`);
  }

  commandRejected(error: GameError, state: GameState): void {
    this.print(`Rejected (${error.kind}): ${error.message}`);
    this.print(`Current state: ${describeState(state)}`);
  }

  private printSlot(slot: SlotResult<S>): void {
    this.print(`Slot: [ ${this.formatLine(slot.symbols)} ]`);
    if (slot.reveal !== undefined) {
      this.print(`But: [ ${this.formatLine(slot.reveal)} ]`);
    }
  }

  private formatLine(symbols: readonly S[]): string {
    return symbols.map((s) => this.formatSymbol(s)).join(' | ');
  }
}
