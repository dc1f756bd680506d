import * as os from "node:os";
import * as path from "node:path";

function positiveIntFromEnv(name: string, fallback: number): number {
  const fromEnv = Number.parseInt(process.env[name] ?? "", 10);
  if (Number.isFinite(fromEnv) && fromEnv > 0) return fromEnv;
  return fallback;
}

export const CONFIG = {
  DEFAULT_CAPACITY: positiveIntFromEnv("LRUSTORE_DEFAULT_CAPACITY", 128),
  BENCH_OPERATIONS: positiveIntFromEnv("LRUSTORE_BENCH_OPERATIONS", 100_000),
  // Bench key space is this many times the capacity, so some reads miss.
  BENCH_KEY_SPACE_FACTOR: 4,
  BENCH_READ_RATIO: 0.8,
  BENCH_SEED: 0x2545f491,
};

const HOME = os.homedir();
const GLOBAL_ROOT = path.join(HOME, ".lrustore");

export const PATHS = {
  globalRoot: GLOBAL_ROOT,
  userConfig: path.join(GLOBAL_ROOT, "config.json"),
};
