/**
 * Terminal walkthrough of the custody ledger.
 *
 * Uses the real domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import { banner, renderLine } from "./render.js";
import { runWalkthrough } from "./walkthrough.js";

const DELAY_MS = 400;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function run(): Promise<void> {
  console.log(banner());
  console.log(chalk.gray("  One holder through a full lock cycle, on a manual clock.\n"));

  for (const line of await runWalkthrough()) {
    if (line.kind === "step") {
      await sleep(DELAY_MS);
    }
    console.log(renderLine(line));
  }
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
