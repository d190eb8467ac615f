import { FinishGame, LaunchBall, StartGame, type Command } from './command';

export const MAX_BATCH = 1000;

export type ParsedLine =
  | { kind: 'commands'; commands: Command[] }
  | { kind: 'help' }
  | { kind: 'unknown'; input: string };

export const HELP_TEXT = [
  's        start the game',
  'l, <enter> launch one ball',
  'l N      launch N balls',
  'q        finish the game',
  'h        show this help',
].join('\n');

/**
 * Terminal commands on top of the core set: batched launches and help are
 * expanded here and never reach the game.
 */
export function parseLine(line: string): ParsedLine {
  const [head = '', arg, ...rest] = line.trim().split(/\s+/);
  if (rest.length > 0) return { kind: 'unknown', input: line };

  switch (head) {
    case 's':
      return arg === undefined ? { kind: 'commands', commands: [StartGame] } : { kind: 'unknown', input: line };
    case 'q':
      return arg === undefined ? { kind: 'commands', commands: [FinishGame] } : { kind: 'unknown', input: line };
    case '':
    case 'l': {
      if (arg === undefined) return { kind: 'commands', commands: [LaunchBall] };
      const n = Number(arg);
      if (!Number.isInteger(n) || n < 1 || n > MAX_BATCH) return { kind: 'unknown', input: line };
      return { kind: 'commands', commands: Array<Command>(n).fill(LaunchBall) };
    }
    case 'h':
    case '?':
      return { kind: 'help' };
    default:
      return { kind: 'unknown', input: line };
  }
}
