import * as fs from "node:fs";
import * as path from "node:path";
import { Command } from "commander";
import { resolveDefaultCapacity, resolveOutputFormat } from "../lib/config/user-config";
import { LRUStore } from "../lib/lru";
import { formatStep, formatStoreSummary } from "../lib/output/formatter";
import { formatJson } from "../lib/output/json-formatter";
import { parseScript } from "../lib/script/parser";
import { runScript } from "../lib/script/runner";
import type { ScriptValue } from "../lib/script/types";
import { gracefulExit } from "../lib/utils/exit";

interface ReplayOptions {
  capacity?: string;
  json: boolean;
  quiet: boolean;
  plain: boolean;
}

export const replay = new Command("replay")
  .description("Run a script of store operations and print each result")
  .argument("<file>", "Script file, one operation per line")
  .option("-c, --capacity <n>", "Store capacity (defaults to the configured capacity)")
  .option("--json", "Print steps and final state as JSON", false)
  .option("-q, --quiet", "Only print the final store state", false)
  .option("--plain", "Disable ANSI colors", false)
  .action(async (file: string, options: ReplayOptions) => {
    try {
      const scriptPath = path.resolve(file);
      if (!fs.existsSync(scriptPath)) {
        console.error(`Script not found: ${scriptPath}`);
        process.exitCode = 1;
        return;
      }

      const lines = parseScript(fs.readFileSync(scriptPath, "utf-8"));
      const capacity =
        options.capacity !== undefined
          ? Number(options.capacity)
          : resolveDefaultCapacity();
      const store = new LRUStore<ScriptValue, ScriptValue>(capacity);
      const steps = runScript(store, lines);

      const asJson = options.json || resolveOutputFormat() === "json";
      if (asJson) {
        console.log(
          formatJson(options.quiet ? { store: store.toJSON() } : { steps, store: store.toJSON() }),
        );
        return;
      }

      if (!options.quiet) {
        for (const step of steps) {
          console.log(formatStep(step, { plain: options.plain }));
        }
      }
      console.log(formatStoreSummary(store, { plain: options.plain }));
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Replay failed:", message);
      process.exitCode = 1;
    } finally {
      await gracefulExit();
    }
  });
