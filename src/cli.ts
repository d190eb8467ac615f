#!/usr/bin/env node
import { createInterface } from 'readline';
import { HELP_TEXT, parseLine } from './command-parser';
import { ConfigStore } from './config-store';
import type { GameError } from './errors';
import { Game } from './game';
import type { Sym } from './game-config';
import type { GameState } from './game-state';
import { QueuedInput, runQueued } from './queued-input';
import { TerminalOutput, type Print } from './terminal-output';

/** Drops the rest of a typed batch (`l 50`) once one command is rejected. */
class CliOutput extends TerminalOutput<Sym> {
  constructor(
    print: Print,
    private readonly input: QueuedInput,
  ) {
    super(print);
  }

  commandRejected(error: GameError, state: GameState): void {
    super.commandRejected(error, state);
    this.input.discard();
  }
}

function main(): void {
  // eslint-disable-next-line no-console
  const print = (line: string) => console.log(line);
  const store = new ConfigStore(process.env.PACHISLO_SETTINGS_FILE ?? null);
  const input = new QueuedInput();
  const game = new Game(store.gameConfig(), new CliOutput(print, input));

  print('Welcome to Pachislo!');
  print(HELP_TEXT);

  const rl = createInterface({ input: process.stdin, terminal: false });

  rl.on('line', (line) => {
    const parsed = parseLine(line);
    if (parsed.kind === 'help') {
      print(HELP_TEXT);
      return;
    }
    if (parsed.kind === 'unknown') {
      print(`Unknown command "${parsed.input}" (h for help)`);
      return;
    }
    input.push(parsed.commands);
    if (runQueued(game, input) === 'finished') rl.close();
  });

  rl.on('close', () => {
    input.close();
    runQueued(game, input);
  });
}

main();
