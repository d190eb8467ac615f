import { Logger } from '@nestjs/common';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { InvalidConfigError } from './errors';
import {
  CONFIG_EXAMPLE,
  SYMBOLS,
  decayBy,
  validateConfig,
  type BallsConfig,
  type GameConfig,
  type SlotProbability,
  type Sym,
} from './game-config';

/** JSON form of a GameConfig; the decay curve is `rushContinueDecay^(n-1)`. */
export interface GameSettings {
  balls: BallsConfig;
  probability: {
    startHole: number;
    normal: SlotProbability;
    rush: SlotProbability;
    rushContinue: SlotProbability;
    rushContinueDecay: number;
  };
  slot: {
    reels: number;
    symbols: Sym[];
  };
}

export const DEFAULT_SETTINGS: GameSettings = {
  balls: { ...CONFIG_EXAMPLE.balls },
  probability: {
    startHole: CONFIG_EXAMPLE.probability.startHole,
    normal: { ...CONFIG_EXAMPLE.probability.normal },
    rush: { ...CONFIG_EXAMPLE.probability.rush },
    rushContinue: { ...CONFIG_EXAMPLE.probability.rushContinue },
    rushContinueDecay: 0.6,
  },
  slot: { reels: CONFIG_EXAMPLE.slot.reels, symbols: [...SYMBOLS] },
};

export function toGameConfig(settings: GameSettings): GameConfig<Sym> {
  const { rushContinueDecay, ...probability } = settings.probability;
  return {
    balls: { ...settings.balls },
    probability: { ...probability, rushContinueFn: decayBy(rushContinueDecay) },
    slot: { reels: settings.slot.reels, symbols: [...settings.slot.symbols] },
  };
}

type JsonObject = Record<string, unknown>;

function isObject(x: unknown): x is JsonObject {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function isSym(x: unknown): x is Sym {
  return SYMBOLS.some((s) => s === x);
}

function requireObject(x: unknown, field: string): JsonObject {
  if (!isObject(x)) throw new InvalidConfigError(`${field} must be an object`);
  return x;
}

function requireNumbers(obj: JsonObject, keys: readonly string[], field: string): void {
  for (const k of keys) {
    if (typeof obj[k] !== 'number') throw new InvalidConfigError(`${field}.${k} must be a number`);
  }
}

const SLOT_PROBABILITY_KEYS = ['win', 'fakeWin', 'fakeLose'] as const;

/** Shape check only; value ranges are left to validateConfig. */
function validateSettings(cfg: unknown): asserts cfg is GameSettings {
  const root = requireObject(cfg, 'settings');

  const balls = requireObject(root.balls, 'balls');
  requireNumbers(balls, ['initBalls', 'incrementalBalls', 'incrementalRush'], 'balls');

  const probability = requireObject(root.probability, 'probability');
  requireNumbers(probability, ['startHole', 'rushContinueDecay'], 'probability');
  for (const mode of ['normal', 'rush', 'rushContinue'] as const) {
    const p = requireObject(probability[mode], `probability.${mode}`);
    requireNumbers(p, SLOT_PROBABILITY_KEYS, `probability.${mode}`);
  }

  const slot = requireObject(root.slot, 'slot');
  requireNumbers(slot, ['reels'], 'slot');
  if (!Array.isArray(slot.symbols)) throw new InvalidConfigError('slot.symbols must be an array');
  for (const s of slot.symbols) {
    if (!isSym(s)) throw new InvalidConfigError(`Invalid symbol "${String(s)}" in slot.symbols`);
  }
}

function mergeDeep(base: unknown, partial: unknown): unknown {
  if (!isObject(base) || !isObject(partial)) return partial;
  const out: JsonObject = { ...base };
  for (const [k, v] of Object.entries(partial)) {
    out[k] = isObject(v) ? mergeDeep(out[k] ?? {}, v) : v;
  }
  return out;
}

export class ConfigStore {
  private readonly logger = new Logger(ConfigStore.name);
  private current: GameSettings = structuredClone(DEFAULT_SETTINGS);

  /** With a null path the store lives in memory only. */
  constructor(private readonly filePath: string | null = null) {
    this.loadFromDisk();
  }

  get(): GameSettings {
    return structuredClone(this.current);
  }

  gameConfig(): GameConfig<Sym> {
    return toGameConfig(this.current);
  }

  set(partial: unknown): GameSettings {
    if (!isObject(partial)) throw new InvalidConfigError('settings must be an object');
    const next = mergeDeep(this.current, partial);
    this.accept(next);
    return this.get();
  }

  reset(): GameSettings {
    this.accept(structuredClone(DEFAULT_SETTINGS));
    return this.get();
  }

  private accept(next: unknown): void {
    validateSettings(next);
    validateConfig(toGameConfig(next));
    this.current = next;
    this.saveToDisk();
  }

  private saveToDisk() {
    if (this.filePath === null) return;
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(this.current, null, 2), 'utf8');
  }

  private loadFromDisk() {
    if (this.filePath === null) return;
    if (!existsSync(this.filePath)) {
      this.saveToDisk(); // write defaults
      return;
    }
    try {
      const raw: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'));
      const merged = mergeDeep(structuredClone(DEFAULT_SETTINGS), raw);
      validateSettings(merged);
      validateConfig(toGameConfig(merged));
      this.current = merged;
    } catch (e) {
      // If bad file, fall back to defaults
      this.logger.warn(
        `Ignoring settings in ${this.filePath}: ${e instanceof Error ? e.message : String(e)}`,
      );
      this.current = structuredClone(DEFAULT_SETTINGS);
      this.saveToDisk();
    }
  }
}
