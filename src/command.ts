import type { GameError } from './errors';
import type { GameState } from './game-state';

/**
 * The closed set of commands the engine understands. Anything richer (help,
 * batch launches, ...) is expanded into these before it reaches the game.
 */
export type Command = { type: 'StartGame' } | { type: 'LaunchBall' } | { type: 'FinishGame' };

export type CommandType = Command['type'];

export const StartGame: Command = { type: 'StartGame' };
export const LaunchBall: Command = { type: 'LaunchBall' };
export const FinishGame: Command = { type: 'FinishGame' };

export type CommandOutcome =
  | { ok: true; state: GameState }
  | { ok: false; error: GameError; state: GameState };
