/**
 * Terminal rendering for walkthrough lines.
 */

import chalk from "chalk";
import type { DemoLine } from "./walkthrough.js";
import { TOTAL_STEPS } from "./walkthrough.js";

export function banner(): string {
  return [
    "",
    chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"),
    chalk.cyan.bold("  ║") + chalk.white.bold("                      LOCKBOX DEMO                        ") + chalk.cyan.bold("║"),
    chalk.cyan.bold("  ║") + chalk.gray("               Time-locked custody ledger                 ") + chalk.cyan.bold("║"),
    chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"),
    "",
  ].join("\n");
}

export function renderLine(line: DemoLine): string {
  switch (line.kind) {
    case "step": {
      const prefix = chalk.cyan.bold(`  Step ${line.step}/${TOTAL_STEPS}`);
      const rule = chalk.gray("─".repeat(Math.max(0, 50 - line.title.length)));
      return `\n${prefix}  ${chalk.white.bold(line.title)}  ${rule}`;
    }
    case "ok":
      return chalk.green("    ✓ ") + chalk.white(line.message);
    case "info":
      return chalk.gray("    → ") + chalk.gray(line.label.padEnd(16)) + chalk.white(line.value);
    case "warn":
      return chalk.yellow("    ! ") + chalk.yellow(line.message);
  }
}
