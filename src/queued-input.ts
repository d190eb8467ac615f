import type { Command } from './command';
import type { Game, StepResult } from './game';
import type { UserInput } from './interface';

/**
 * Input fed from outside (a terminal, a socket). Hands out one command per
 * poll so a caller can drop the rest of a batch after a rejection.
 */
export class QueuedInput implements UserInput {
  private readonly queue: Command[] = [];
  private isClosed = false;

  get pending(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  push(commands: readonly Command[]): void {
    if (this.isClosed) return;
    this.queue.push(...commands);
  }

  /** Commands already queued are still handed out before `null`. */
  close(): void {
    this.isClosed = true;
  }

  discard(): void {
    this.queue.length = 0;
  }

  waitForInput(): Command[] | null {
    const next = this.queue.shift();
    if (next !== undefined) return [next];
    return this.isClosed ? null : [];
  }
}

/** Steps the game until the queue is drained, or until it finishes. */
export function runQueued<S>(game: Game<S>, input: QueuedInput): StepResult {
  if (game.isFinished) return 'finished';
  while (input.pending > 0 || input.closed) {
    if (game.runStep(input) === 'finished') return 'finished';
  }
  return 'continue';
}
