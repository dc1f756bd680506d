import { describe, expect, it } from "vitest";
import { LRUStore } from "../src/lib";
import { createRandom, runWorkload } from "../src/lib/bench/workload";

describe("createRandom", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = createRandom(7);
    const b = createRandom(7);
    const first = [a(), a(), a()];

    expect([b(), b(), b()]).toEqual(first);
    expect(first.every((n) => n >= 0 && n < 1)).toBe(true);
  });

  it("does not get stuck on a zero seed", () => {
    const next = createRandom(0);
    expect(next()).not.toBe(0);
  });
});

describe("runWorkload", () => {
  const options = { operations: 2_000, readRatio: 0.5, keySpace: 40, seed: 99 };

  it("accounts for every operation", () => {
    const result = runWorkload(new LRUStore<number, number>(10), options);

    expect(result.operations).toBe(2_000);
    expect(result.reads + result.writes).toBe(2_000);
    expect(result.hits + result.misses).toBe(result.reads);
    expect(result.hitRate).toBeGreaterThan(0);
    expect(result.hitRate).toBeLessThan(1);
  });

  it("is deterministic for a seed", () => {
    const first = runWorkload(new LRUStore<number, number>(10), options);
    const second = runWorkload(new LRUStore<number, number>(10), options);

    expect(second.hits).toBe(first.hits);
    expect(second.evictions).toBe(first.evictions);
  });

  it("never overfills the store and counts evictions from writes", () => {
    const store = new LRUStore<number, number>(10);
    const result = runWorkload(store, { ...options, readRatio: 0 });

    expect(result.reads).toBe(0);
    expect(store.filled).toBe(10);
    expect(result.evictions).toBeGreaterThan(0);
  });

  it("never misses when the key space fits", () => {
    const store = new LRUStore<number, number>(8);
    for (let key = 0; key < 8; key++) store.write(key, key);

    const result = runWorkload(store, { ...options, keySpace: 8 });

    expect(result.misses).toBe(0);
    expect(result.evictions).toBe(0);
  });

  it("reports progress at the requested interval", () => {
    const calls: Array<[number, number]> = [];
    runWorkload(new LRUStore<number, number>(4), {
      ...options,
      operations: 250,
      progressEvery: 100,
      onProgress: (done, total) => calls.push([done, total]),
    });

    expect(calls).toEqual([
      [100, 250],
      [200, 250],
    ]);
  });
});
