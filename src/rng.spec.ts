import { ScriptedRandom, chance, createMulberry32, pickOne, randomInt, shuffle } from './rng';

describe('createMulberry32', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createMulberry32(42);
    const b = createMulberry32(42);
    for (let i = 0; i < 100; i++) {
      expect(a.next()).toBe(b.next());
    }
  });

  it('stays within [0, 1)', () => {
    const rng = createMulberry32(7);
    for (let i = 0; i < 10_000; i++) {
      const x = rng.next();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });
});

describe('ScriptedRandom', () => {
  it('replays draws in order and counts what is left', () => {
    const rng = new ScriptedRandom([0.1, 0.2]);
    expect(rng.remaining).toBe(2);
    expect(rng.next()).toBe(0.1);
    expect(rng.next()).toBe(0.2);
    expect(rng.remaining).toBe(0);
  });

  it('throws once exhausted', () => {
    const rng = new ScriptedRandom([]);
    expect(() => rng.next()).toThrow('scripted random exhausted after 0 draws');
  });

  it('rejects draws outside [0, 1)', () => {
    expect(() => new ScriptedRandom([1])).toThrow(RangeError);
    expect(() => new ScriptedRandom([-0.1])).toThrow(RangeError);
  });
});

describe('helpers', () => {
  it('chance compares strictly', () => {
    expect(chance(0.5, new ScriptedRandom([0.5]))).toBe(false);
    expect(chance(0.5, new ScriptedRandom([0.49]))).toBe(true);
    expect(chance(0, new ScriptedRandom([0]))).toBe(false);
    expect(chance(1, new ScriptedRandom([0.999999]))).toBe(true);
  });

  it('randomInt maps draws onto [min, max)', () => {
    const rng = new ScriptedRandom([0, 0.999]);
    expect(randomInt(rng, 2, 5)).toBe(2);
    expect(randomInt(rng, 2, 5)).toBe(4);
  });

  it('pickOne refuses an empty list', () => {
    expect(() => pickOne([], new ScriptedRandom([0.5]))).toThrow(RangeError);
  });

  it('shuffle is a Fisher-Yates pass driven by the source', () => {
    const rng = new ScriptedRandom([0, 0.99]);
    expect(shuffle(['a', 'b', 'c'], rng)).toEqual(['c', 'b', 'a']);
  });

  it('shuffle leaves its input untouched', () => {
    const items = [1, 2, 3, 4];
    shuffle(items, createMulberry32(1));
    expect(items).toEqual([1, 2, 3, 4]);
  });
});
