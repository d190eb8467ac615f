export type GameErrorKind = 'InvalidConfig' | 'InsufficientBalls' | 'InvalidCommand';

export abstract class GameError extends Error {
  abstract readonly kind: GameErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised at construction; a game with a bad config never starts. */
export class InvalidConfigError extends GameError {
  readonly kind = 'InvalidConfig';
}

export class InsufficientBallsError extends GameError {
  readonly kind = 'InsufficientBalls';
}

/** The command is not valid in the current state (e.g. launch before start). */
export class InvalidCommandError extends GameError {
  readonly kind = 'InvalidCommand';
}
