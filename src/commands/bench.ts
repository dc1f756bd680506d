import { Command } from "commander";
import ora from "ora";
import { CONFIG } from "../config";
import { runWorkload } from "../lib/bench/workload";
import { resolveDefaultCapacity, resolveOutputFormat } from "../lib/config/user-config";
import { LRUStore } from "../lib/lru";
import { formatJson } from "../lib/output/json-formatter";
import { gracefulExit } from "../lib/utils/exit";

interface BenchOptions {
  capacity?: string;
  operations?: string;
  readRatio?: string;
  seed?: string;
  json: boolean;
}

function parseRatio(raw: string | undefined): number {
  if (raw === undefined) return CONFIG.BENCH_READ_RATIO;
  const ratio = Number(raw);
  if (!Number.isFinite(ratio) || ratio < 0 || ratio > 1) {
    throw new Error(`--read-ratio must be between 0 and 1 (got ${raw})`);
  }
  return ratio;
}

function parseCount(raw: string | undefined, fallback: number, flag: string): number {
  if (raw === undefined) return fallback;
  const count = Number(raw);
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`${flag} must be a positive integer (got ${raw})`);
  }
  return count;
}

export const bench = new Command("bench")
  .description("Measure store throughput under a random read/write workload")
  .option("-c, --capacity <n>", "Store capacity (defaults to the configured capacity)")
  .option("-n, --operations <n>", "Number of operations to run")
  .option("-r, --read-ratio <r>", "Share of reads, between 0 and 1")
  .option("--seed <n>", "Seed for the operation sequence")
  .option("--json", "Print the result as JSON", false)
  .action(async (options: BenchOptions) => {
    const spinner = ora({ text: "Preparing workload..." });
    try {
      const capacity = options.capacity !== undefined
        ? Number(options.capacity)
        : resolveDefaultCapacity();
      const store = new LRUStore<number, number>(capacity);
      const operations = parseCount(options.operations, CONFIG.BENCH_OPERATIONS, "--operations");
      const readRatio = parseRatio(options.readRatio);
      const seed = parseCount(options.seed, CONFIG.BENCH_SEED, "--seed");

      spinner.start();
      const result = runWorkload(store, {
        operations,
        readRatio,
        keySpace: capacity * CONFIG.BENCH_KEY_SPACE_FACTOR,
        seed,
        onProgress(done, total) {
          spinner.text = `Running (${done}/${total})`;
        },
      });
      spinner.succeed(`Ran ${operations} operations against capacity ${capacity}`);

      if (options.json || resolveOutputFormat() === "json") {
        console.log(formatJson({ bench: { capacity, ...result } }));
        return;
      }

      console.log(`  Throughput: ${result.opsPerSec} ops/sec (${result.elapsedMs.toFixed(1)} ms)`);
      console.log(`  Reads:      ${result.reads} (${(result.hitRate * 100).toFixed(1)}% hits)`);
      console.log(`  Writes:     ${result.writes}`);
      console.log(`  Evictions:  ${result.evictions}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      if (spinner.isSpinning) {
        spinner.fail("Benchmark failed");
      }
      console.error("Bench failed:", message);
      process.exitCode = 1;
    } finally {
      await gracefulExit();
    }
  });
