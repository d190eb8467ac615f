import { Logger } from '@nestjs/common';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigStore, DEFAULT_SETTINGS, toGameConfig } from './config-store';
import { InvalidConfigError } from './errors';
import { CONFIG_EXAMPLE } from './game-config';

describe('ConfigStore', () => {
  it('starts from the example preset', () => {
    const store = new ConfigStore();
    expect(store.get()).toEqual(DEFAULT_SETTINGS);

    const config = store.gameConfig();
    expect(config.balls).toEqual(CONFIG_EXAMPLE.balls);
    for (let n = 1; n <= 5; n++) {
      expect(config.probability.rushContinueFn(n)).toBe(CONFIG_EXAMPLE.probability.rushContinueFn(n));
    }
  });

  it('merges a partial update', () => {
    const store = new ConfigStore();
    const updated = store.set({ probability: { normal: { win: 0.5 } } });
    expect(updated.probability.normal).toEqual({ win: 0.5, fakeWin: 0.3, fakeLose: 0.15 });
    expect(store.gameConfig().probability.normal.win).toBe(0.5);
  });

  it('replaces the symbol list as a whole', () => {
    const store = new ConfigStore();
    expect(store.set({ slot: { symbols: ['Bell', 'Bar'] } }).slot).toEqual({ reels: 3, symbols: ['Bell', 'Bar'] });
  });

  it.each([
    [{ probability: { normal: { win: 2 } } }],
    [{ probability: { rushContinueDecay: 1.5 } }],
    [{ balls: { initBalls: -5 } }],
    [{ balls: { initBalls: '10' } }],
    [{ slot: { symbols: ['Seven'] } }],
    [{ slot: { symbols: ['Joker', 'Seven'] } }],
    [{ slot: { reels: 1 } }],
    [5],
  ])('rejects %p and keeps the current settings', (partial) => {
    const store = new ConfigStore();
    store.set({ balls: { initBalls: 42 } });

    expect(() => store.set(partial)).toThrow(InvalidConfigError);
    expect(store.get().balls.initBalls).toBe(42);
  });

  it('resets to defaults', () => {
    const store = new ConfigStore();
    store.set({ balls: { initBalls: 1 } });
    expect(store.reset()).toEqual(DEFAULT_SETTINGS);
  });

  it('hands out copies', () => {
    const store = new ConfigStore();
    store.get().balls.initBalls = 3;
    expect(store.get().balls.initBalls).toBe(1000);
  });

  describe('with a settings file', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'pachislo-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('writes defaults when the file is missing', () => {
      const file = join(dir, 'nested', 'settings.json');
      new ConfigStore(file);
      expect(existsSync(file)).toBe(true);
      expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual(DEFAULT_SETTINGS);
    });

    it('loads and persists updates', () => {
      const file = join(dir, 'settings.json');
      writeFileSync(file, JSON.stringify({ balls: { initBalls: 77 } }));

      const store = new ConfigStore(file);
      expect(store.get().balls).toEqual({ initBalls: 77, incrementalBalls: 15, incrementalRush: 300 });

      store.set({ balls: { incrementalRush: 100 } });
      expect(new ConfigStore(file).get().balls.incrementalRush).toBe(100);
    });

    it('falls back to defaults on a bad file', () => {
      const file = join(dir, 'settings.json');
      writeFileSync(file, '{ not json');
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      const store = new ConfigStore(file);

      expect(store.get()).toEqual(DEFAULT_SETTINGS);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual(DEFAULT_SETTINGS);
      warn.mockRestore();
    });
  });
});

describe('toGameConfig', () => {
  it('turns the decay ratio into a curve', () => {
    const config = toGameConfig({
      ...DEFAULT_SETTINGS,
      probability: { ...DEFAULT_SETTINGS.probability, rushContinueDecay: 0.5 },
    });
    expect(config.probability.rushContinueFn(3)).toBe(0.25);
    expect(config.probability).not.toHaveProperty('rushContinueDecay');
  });
});
