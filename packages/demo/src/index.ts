#!/usr/bin/env node
/**
 * @actus-sm/demo: Terminal walkthrough.
 *
 * Loads contract terms (the bundled LAM scenario, or a JSON file given as
 * the first argument), runs every scheduled event through the contract
 * facade and checks the hash-chained history.
 *
 * Usage: npm run demo -- [terms.json]
 */

import chalk from "chalk";
import { createLogger, loadConfig } from "@actus-sm/contract";
import { isActusError } from "@actus-sm/units";
import { formatPayoff, loadScenario, netCashFlow, runScenario } from "./scenario.js";
import type { ScenarioResult } from "./scenario.js";

// =============================================================================
// Helpers
// =============================================================================

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                  ACTUS STATE MACHINE                     ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Contract lifecycle, event by event              ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

const TOTAL_STEPS = 3;

// =============================================================================
// Demo
// =============================================================================

function printTimeline(result: ScenarioResult): void {
  for (const row of result.rows) {
    const matches = row.payoff === row.projected;
    const payoff = formatPayoff(row.payoff).padStart(16);
    console.log(
      chalk.gray(`    ${String(row.sequence).padStart(3)}  `) +
        chalk.white(row.eventType.padEnd(5)) +
        chalk.gray(row.date) +
        "  " +
        (row.payoff !== null && row.payoff < 0n ? chalk.red(payoff) : chalk.green(payoff)) +
        chalk.gray(`  notional ${formatPayoff(row.notional)}`) +
        (matches ? "" : chalk.yellow(`  projected ${formatPayoff(row.projected)}`)),
    );
  }
}

function run(): void {
  const config = loadConfig();
  const logger = createLogger(config);
  const path = process.argv[2];

  banner();

  stepHeader(1, TOTAL_STEPS, "Load Terms");
  const terms = path === undefined ? loadScenario() : loadScenario(path);
  info("contract", terms.contractId);
  info("type / role", `${terms.contractType} / ${terms.contractRole}`);
  info("notional", formatPayoff(terms.notionalPrincipal ?? null));
  ok(path === undefined ? "Bundled scenario loaded" : `Loaded ${path}`);

  stepHeader(2, TOTAL_STEPS, "Apply Events");
  const result = runScenario(terms, { logger, maxScheduleEvents: config.MAX_SCHEDULE_EVENTS });
  printTimeline(result);
  const mismatches = result.rows.filter((row) => row.payoff !== row.projected).length;
  if (mismatches === 0) {
    ok(`${result.rows.length} events applied, every payoff matches the projection`);
  } else {
    warn(`${mismatches} payoff(s) differ from the projection`);
  }

  stepHeader(3, TOTAL_STEPS, "Verify History");
  info("final stage", result.finalState.stage);
  info("net cash flow", `${formatPayoff(netCashFlow(result.rows))} ${result.currency}`);
  if (result.historyHead !== undefined) {
    hashLine("history head", result.historyHead);
  }
  if (result.verification.valid) {
    ok(chalk.green.bold("HISTORY VALID") + ": every record chains to its predecessor");
  } else {
    for (const error of result.verification.errors) {
      warn(`#${error.sequence}: ${error.reason}`);
    }
  }
  console.log();
}

try {
  run();
} catch (err: unknown) {
  const detail = isActusError(err) ? `${err.code}: ${err.message}` : err;
  console.error(chalk.red("\n  Demo failed:"), detail);
  process.exit(1);
}
