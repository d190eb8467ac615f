import { FinishGame, LaunchBall, StartGame } from './command';
import { Game } from './game';
import { CONFIG_EXAMPLE, type GameConfig, type Sym } from './game-config';
import { normalState } from './game-state';
import { QueuedInput, runQueued } from './queued-input';
import { RecordingOutput } from './recording-output';
import { createMulberry32 } from './rng';

const missAlways: GameConfig<Sym> = {
  ...CONFIG_EXAMPLE,
  probability: { ...CONFIG_EXAMPLE.probability, startHole: 0 },
};

function newGame() {
  return new Game(missAlways, new RecordingOutput<Sym>(), {
    random: createMulberry32(1),
    slotRandom: createMulberry32(2),
  });
}

describe('QueuedInput', () => {
  it('hands out one command per poll', () => {
    const input = new QueuedInput();
    input.push([StartGame, LaunchBall]);

    expect(input.waitForInput()).toEqual([StartGame]);
    expect(input.pending).toBe(1);
    expect(input.waitForInput()).toEqual([LaunchBall]);
    expect(input.waitForInput()).toEqual([]);
  });

  it('drains queued commands before reporting closed', () => {
    const input = new QueuedInput();
    input.push([LaunchBall]);
    input.close();
    input.push([StartGame]);

    expect(input.waitForInput()).toEqual([LaunchBall]);
    expect(input.waitForInput()).toBeNull();
  });

  it('discards what is left', () => {
    const input = new QueuedInput();
    input.push([LaunchBall, LaunchBall]);
    input.discard();
    expect(input.pending).toBe(0);
    expect(input.waitForInput()).toEqual([]);
  });
});

describe('runQueued', () => {
  it('runs queued commands through the game loop', () => {
    const game = newGame();
    const input = new QueuedInput();

    input.push([StartGame, LaunchBall, LaunchBall]);
    expect(runQueued(game, input)).toBe('continue');
    expect(game.state).toEqual(normalState(998));
    expect(input.pending).toBe(0);

    input.push([FinishGame, LaunchBall]);
    expect(runQueued(game, input)).toBe('finished');
    expect(game.finalState).toEqual(normalState(998));
    expect(input.pending).toBe(1);
  });

  it('finishes the game once the input closes', () => {
    const game = newGame();
    const input = new QueuedInput();
    input.push([StartGame]);
    input.close();

    expect(runQueued(game, input)).toBe('finished');
    expect(game.finalState).toEqual(normalState(1000));
    expect(runQueued(game, input)).toBe('finished');
    expect(game.output.drain().filter((e) => e.type === 'finished')).toHaveLength(1);
  });
});
