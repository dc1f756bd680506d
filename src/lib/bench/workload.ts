import { performance } from "node:perf_hooks";
import type { LRUStore } from "../lru";

export interface WorkloadOptions {
  operations: number;
  /** Share of operations that are reads, between 0 and 1 */
  readRatio: number;
  /** Keys are drawn uniformly from [0, keySpace) */
  keySpace: number;
  seed: number;
  onProgress?: (done: number, total: number) => void;
  /** How many operations between progress callbacks */
  progressEvery?: number;
}

export interface WorkloadResult {
  operations: number;
  reads: number;
  writes: number;
  hits: number;
  misses: number;
  evictions: number;
  elapsedMs: number;
  opsPerSec: number;
  hitRate: number;
}

/**
 * xorshift32: deterministic, so two runs with the same seed issue the same
 * operation sequence.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0 || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state / 0x1_0000_0000;
  };
}

/**
 * Drive a store with a random mix of reads and writes. Reads of absent keys
 * count as misses; writes of new keys into a full store count as evictions.
 */
export function runWorkload(
  store: LRUStore<number, number>,
  options: WorkloadOptions,
): WorkloadResult {
  const random = createRandom(options.seed);
  const progressEvery = options.progressEvery ?? 10_000;
  let reads = 0;
  let hits = 0;
  let evictions = 0;

  const started = performance.now();
  for (let i = 0; i < options.operations; i++) {
    const key = Math.floor(random() * options.keySpace);
    if (random() < options.readRatio) {
      reads++;
      if (store.get(key) !== undefined) hits++;
    } else {
      if (!store.contains(key) && store.filled === store.capacity) {
        evictions++;
      }
      store.write(key, i);
    }

    if (options.onProgress && (i + 1) % progressEvery === 0) {
      options.onProgress(i + 1, options.operations);
    }
  }
  const elapsedMs = performance.now() - started;

  return {
    operations: options.operations,
    reads,
    writes: options.operations - reads,
    hits,
    misses: reads - hits,
    evictions,
    elapsedMs,
    opsPerSec: elapsedMs > 0 ? Math.round((options.operations / elapsedMs) * 1000) : 0,
    hitRate: reads > 0 ? hits / reads : 0,
  };
}
