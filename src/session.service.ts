import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { Command, CommandOutcome } from './command';
import { ConfigStore } from './config-store';
import { Game } from './game';
import type { Sym } from './game-config';
import { describeState } from './game-state';
import { RecordingOutput, type GameEvent } from './recording-output';
import { defaultRandom, type RandomSource } from './rng';

export const RANDOM_FACTORY = Symbol('RANDOM_FACTORY');

/** Called twice per session: once for the lottery, once for the reels. */
export type RandomFactory = () => RandomSource;

export const defaultRandomFactory: RandomFactory = () => defaultRandom;

export type SessionGame = Game<Sym, RecordingOutput<Sym>>;

/** How long a finished session stays readable before it is evicted. */
export const SESSION_GRACE_MS = 5 * 60 * 1000;

export interface Session {
  readonly id: string;
  readonly game: SessionGame;
  /** Epoch millis of the first FinishGame, null while the game runs. */
  finishedAt: number | null;
}

export interface CommandReport {
  outcomes: CommandOutcome[];
  events: GameEvent<Sym>[];
}

@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);
  private readonly sessions = new Map<string, Session>();

  constructor(
    private readonly config: ConfigStore,
    @Inject(RANDOM_FACTORY) private readonly randomFactory: RandomFactory,
  ) {}

  /** The game reads the settings current at this point and never again. */
  create(): string {
    this.evictFinished();
    const id = randomUUID();
    const game: SessionGame = new Game(this.config.gameConfig(), new RecordingOutput<Sym>(), {
      random: this.randomFactory(),
      slotRandom: this.randomFactory(),
    });
    this.sessions.set(id, { id, game, finishedAt: null });
    this.logger.log(`Session ${id} created`);
    return id;
  }

  find(id: string | undefined): Session | undefined {
    return id === undefined ? undefined : this.sessions.get(id);
  }

  /** Runs commands in order, stopping at the first rejected one. */
  run(session: Session, commands: readonly Command[]): CommandReport {
    const { game } = session;
    const outcomes: CommandOutcome[] = [];
    for (const command of commands) {
      const outcome = game.execute(command);
      outcomes.push(outcome);
      if (!outcome.ok) break;
    }
    const events = game.output.drain();
    if (game.isFinished && session.finishedAt === null) {
      session.finishedAt = Date.now();
      this.logger.log(`Session ${session.id} finished at ${describeState(game.state)}`);
    }
    return { outcomes, events };
  }

  /** Drops sessions that finished at least `SESSION_GRACE_MS` before `now`. */
  evictFinished(now: number = Date.now()): number {
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (session.finishedAt !== null && now - session.finishedAt >= SESSION_GRACE_MS) {
        this.sessions.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) this.logger.log(`Evicted ${evicted} finished session(s)`);
    return evicted;
  }

  get size(): number {
    return this.sessions.size;
  }
}
