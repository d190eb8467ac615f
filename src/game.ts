import type { Command, CommandOutcome } from './command';
import { GameError, InsufficientBallsError, InvalidCommandError } from './errors';
import { validateConfig, type BallsConfig, type GameConfig, type Probability } from './game-config';
import {
  UNINITIALIZED,
  describeState,
  isStarted,
  normalState,
  rushState,
  type GameState,
  type StartedState,
} from './game-state';
import type { UserInput, UserOutput } from './interface';
import { LaunchBallFlowProducer } from './launch-ball';
import { Lottery, NO_EVENT, isWin } from './lottery';
import { defaultRandom, type RandomSource } from './rng';
import { SlotProducer } from './slot-producer';

export interface GameOptions {
  /** Start-hole and lottery draws. */
  random?: RandomSource;
  /** Reel symbols only, so rendering never shifts the lottery draws. */
  slotRandom?: RandomSource;
}

export type StepResult = 'continue' | 'finished';

type RushState = Extract<StartedState, { mode: 'rush' }>;

export class Game<S, O extends UserOutput<S> = UserOutput<S>> {
  private current: GameState = UNINITIALIZED;
  private finished: GameState | null = null;
  private readonly queue: Command[] = [];

  private readonly balls: BallsConfig;
  private readonly probability: Probability;
  private readonly lottery: Lottery;
  private readonly launcher: LaunchBallFlowProducer;
  private readonly slots: SlotProducer<S>;

  constructor(
    config: GameConfig<S>,
    readonly output: O,
    options: GameOptions = {},
  ) {
    const { balls, probability } = config;
    this.balls = Object.freeze({ ...balls });
    this.probability = Object.freeze({
      ...probability,
      normal: Object.freeze({ ...probability.normal }),
      rush: Object.freeze({ ...probability.rush }),
      rushContinue: Object.freeze({ ...probability.rushContinue }),
    });
    // Validate the snapshot, not the caller's object.
    validateConfig({ balls: this.balls, probability: this.probability, slot: config.slot });

    const random = options.random ?? defaultRandom;
    this.lottery = new Lottery(this.probability, random);
    this.launcher = new LaunchBallFlowProducer(random);
    this.slots = new SlotProducer(
      config.slot.reels,
      [...config.slot.symbols],
      options.slotRandom ?? defaultRandom,
    );
  }

  get state(): GameState {
    return this.current;
  }

  /** State recorded by the first FinishGame, or null while the session runs. */
  get finalState(): GameState | null {
    return this.finished;
  }

  get isFinished(): boolean {
    return this.finished !== null;
  }

  start(): GameState {
    this.requireRunning('StartGame');
    if (isStarted(this.current)) {
      throw new InvalidCommandError(`StartGame: already started (${describeState(this.current)})`);
    }
    return this.transitionTo(normalState(this.balls.initBalls));
  }

  launchBall(): GameState {
    this.requireRunning('LaunchBall');
    const state = this.current;
    if (!isStarted(state)) {
      throw new InvalidCommandError('LaunchBall: the game has not been started');
    }
    if (state.balls === 0) {
      throw new InsufficientBallsError(`LaunchBall: no balls left (${describeState(state)})`);
    }

    const next =
      state.mode === 'normal'
        ? this.launchNormal(state.balls - 1)
        : this.launchRush(state, state.balls - 1);
    return this.transitionTo(next);
  }

  /** Valid in any state. Repeated calls report the same final state. */
  finish(): GameState {
    const final = this.finished ?? this.current;
    this.finished = final;
    this.output.finishGame(final);
    return final;
  }

  execute(command: Command): CommandOutcome {
    try {
      switch (command.type) {
        case 'StartGame':
          this.start();
          break;
        case 'LaunchBall':
          this.launchBall();
          break;
        case 'FinishGame':
          this.finish();
          break;
      }
      return { ok: true, state: this.current };
    } catch (error) {
      if (!(error instanceof GameError)) throw error;
      this.output.commandRejected(error, this.current);
      return { ok: false, error, state: this.current };
    }
  }

  runStep(input: UserInput): StepResult {
    if (this.queue.length === 0) {
      const polled = input.waitForInput();
      if (polled === null) {
        this.finish();
        return 'finished';
      }
      this.queue.push(...polled);
    }

    const command = this.queue.shift();
    if (command === undefined) return 'continue';

    this.execute(command);
    return command.type === 'FinishGame' ? 'finished' : 'continue';
  }

  run(input: UserInput): GameState {
    let step: StepResult;
    do {
      step = this.runStep(input);
    } while (step === 'continue');
    return this.finished ?? this.current;
  }

  private launchNormal(balls: number): GameState {
    if (!this.launcher.launch(this.probability.startHole)) {
      this.output.lotteryNormal(NO_EVENT, null);
      return normalState(balls);
    }

    const result = this.lottery.normal();
    this.output.lotteryNormal(result, this.slots.produceFor(result));

    return isWin(result) ? rushState(balls + this.balls.incrementalBalls, 1) : normalState(balls);
  }

  private launchRush(state: RushState, balls: number): GameState {
    const result = this.lottery.rush();
    this.output.lotteryRush(result, this.slots.produceFor(result));
    if (!isWin(result)) return normalState(balls);

    const awarded = balls + this.balls.incrementalRush;
    const cont = this.lottery.rushContinue(state.rushCount);
    this.output.lotteryRushContinue(cont, this.slots.produceFor(cont));

    return isWin(cont) ? rushState(awarded, state.rushCount + 1) : normalState(awarded);
  }

  private transitionTo(next: GameState): GameState {
    const before = this.current;
    this.current = next;
    this.output.transition({ before, after: next });
    return next;
  }

  private requireRunning(command: string): void {
    if (this.finished !== null) {
      throw new InvalidCommandError(`${command}: the game has finished`);
    }
  }
}
