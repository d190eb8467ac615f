import { InvalidConfigError } from './errors';
import {
  CONFIG_EXAMPLE,
  START_HOLE_PROBABILITY_EXAMPLE,
  decayBy,
  validateConfig,
  type GameConfig,
  type Sym,
} from './game-config';

describe('CONFIG_EXAMPLE', () => {
  it('carries the documented defaults', () => {
    expect(CONFIG_EXAMPLE.balls).toEqual({ initBalls: 1000, incrementalBalls: 15, incrementalRush: 300 });
    expect(CONFIG_EXAMPLE.probability.startHole).toBe(START_HOLE_PROBABILITY_EXAMPLE);
    expect(CONFIG_EXAMPLE.probability.normal).toEqual({ win: 0.16, fakeWin: 0.3, fakeLose: 0.15 });
    expect(CONFIG_EXAMPLE.probability.rush).toEqual({ win: 0.48, fakeWin: 0.2, fakeLose: 0.05 });
    expect(CONFIG_EXAMPLE.probability.rushContinue).toEqual({ win: 0.8, fakeWin: 0.25, fakeLose: 0.1 });
  });

  it('decays continuation as 0.6^(n-1)', () => {
    for (let n = 1; n <= 10; n++) {
      expect(CONFIG_EXAMPLE.probability.rushContinueFn(n)).toBe(Math.pow(0.6, n - 1));
    }
    expect(CONFIG_EXAMPLE.probability.rushContinueFn(1)).toBe(1);
  });

  it('passes validation', () => {
    expect(() => validateConfig(CONFIG_EXAMPLE)).not.toThrow();
  });
});

describe('validateConfig', () => {
  const withBalls = (initBalls: number): GameConfig<Sym> => ({
    ...CONFIG_EXAMPLE,
    balls: { ...CONFIG_EXAMPLE.balls, initBalls },
  });

  it.each([-1, 1.5, Number.NaN])('rejects initBalls = %p', (initBalls) => {
    expect(() => validateConfig(withBalls(initBalls))).toThrow(InvalidConfigError);
  });

  it('accepts zero balls', () => {
    expect(() => validateConfig(withBalls(0))).not.toThrow();
  });

  it.each([-0.01, 1.01, Number.NaN])('rejects startHole = %p', (startHole) => {
    const config = { ...CONFIG_EXAMPLE, probability: { ...CONFIG_EXAMPLE.probability, startHole } };
    expect(() => validateConfig(config)).toThrow('probability.startHole must be within [0, 1]');
  });

  it('names the offending fake probability', () => {
    const config = {
      ...CONFIG_EXAMPLE,
      probability: { ...CONFIG_EXAMPLE.probability, rush: { win: 0.5, fakeWin: 0.2, fakeLose: 2 } },
    };
    expect(() => validateConfig(config)).toThrow('probability.rush.fakeLose must be within [0, 1], got 2');
  });

  it('checks the decay function over its whole domain', () => {
    const config = {
      ...CONFIG_EXAMPLE,
      probability: { ...CONFIG_EXAMPLE.probability, rushContinueFn: (n: number) => (n < 64 ? 1 : -1) },
    };
    expect(() => validateConfig(config)).toThrow('probability.rushContinueFn(64)');
  });

  it('needs at least 2 reels', () => {
    expect(() => validateConfig({ ...CONFIG_EXAMPLE, slot: { reels: 1, symbols: ['Seven', 'Bar'] } })).toThrow(
      'slot.reels must be an integer >= 2',
    );
  });
});

describe('decayBy', () => {
  it('returns 1 on the first round', () => {
    expect(decayBy(0.3)(1)).toBe(1);
    expect(decayBy(0.5)(3)).toBe(0.25);
  });
});
