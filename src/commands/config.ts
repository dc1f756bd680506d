import { Command } from "commander";
import * as p from "@clack/prompts";
import { CONFIG } from "../config";
import {
  getConfigFilePath,
  isOutputFormat,
  loadUserConfig,
  resetUserConfig,
  resolveDefaultCapacity,
  resolveOutputFormat,
  updateUserConfig,
} from "../lib/config/user-config";
import { gracefulExit } from "../lib/utils/exit";

export const config = new Command("config")
  .description("Configure lrustore defaults (capacity, output format)")
  .option("--show", "Show current configuration")
  .option("--reset", "Reset configuration to defaults")
  .action(async (options: { show?: boolean; reset?: boolean }) => {
    if (options.show) {
      await showConfig();
      return;
    }

    if (options.reset) {
      await resetConfig();
      return;
    }

    await runConfigWizard();
  });

async function showConfig(): Promise<void> {
  const userConfig = loadUserConfig();

  console.log(`\nConfiguration file: ${getConfigFilePath()}\n`);
  console.log("Store Settings:");
  console.log(
    `  Default capacity: ${resolveDefaultCapacity(userConfig)}${
      userConfig.defaultCapacity === undefined ? " (built-in)" : ""
    }`,
  );
  console.log(`  Output format:    ${resolveOutputFormat(userConfig)}`);

  await gracefulExit();
}

async function resetConfig(): Promise<void> {
  p.intro("Reset Configuration");

  const confirm = await p.confirm({
    message: "Are you sure you want to reset all configuration?",
    initialValue: false,
  });

  if (p.isCancel(confirm) || !confirm) {
    p.cancel("Reset cancelled.");
    await gracefulExit();
    return;
  }

  resetUserConfig();
  p.outro("Configuration reset to defaults.");
  await gracefulExit();
}

async function runConfigWizard(): Promise<void> {
  const current = loadUserConfig();

  p.intro("lrustore Configuration");

  const capacity = await p.text({
    message: "Default store capacity:",
    placeholder: String(CONFIG.DEFAULT_CAPACITY),
    initialValue: String(current.defaultCapacity ?? CONFIG.DEFAULT_CAPACITY),
    validate: (value) => {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1) {
        return "Capacity must be a whole number of at least 1";
      }
      return undefined;
    },
  });

  if (p.isCancel(capacity)) {
    p.cancel("Configuration cancelled.");
    await gracefulExit();
    return;
  }

  const output = await p.select({
    message: "Output format for replay and bench:",
    initialValue: current.output ?? "text",
    options: [
      { value: "text", label: "Text", hint: "default" },
      { value: "json", label: "JSON", hint: "for scripts and pipes" },
    ],
  });

  if (p.isCancel(output) || !isOutputFormat(output)) {
    p.cancel("Configuration cancelled.");
    await gracefulExit();
    return;
  }

  updateUserConfig({ defaultCapacity: Number(capacity), output });
  p.outro(`Config saved to: ${getConfigFilePath()}`);
  await gracefulExit();
}
