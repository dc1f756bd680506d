#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import { program } from "commander";
import { bench } from "./commands/bench";
import { config } from "./commands/config";
import { replay } from "./commands/replay";

program
  .name("lrustore")
  .description("Replay and benchmark a least-recently-used key-value store")
  .version(
    JSON.parse(
      fs.readFileSync(path.join(__dirname, "../package.json"), {
        encoding: "utf-8",
      }),
    ).version,
  );

program.addCommand(replay);
program.addCommand(bench);
program.addCommand(config);

program.parse();
