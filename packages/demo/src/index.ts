#!/usr/bin/env node
/**
 * @coffer/demo - CLI walkthrough.
 *
 * Runs a vault through its lifecycle in your terminal:
 * approve -> deposit -> early withdrawal (refused) -> wait -> withdraw ->
 * fee change (refused above the cap) -> pause -> emergency withdrawal ->
 * event log and hash chain check
 *
 * Uses the domain packages directly on a manual clock (no HTTP server).
 */

import chalk from "chalk";
import {
  InMemoryTokenLedger,
  ManualClock,
  Vault,
  VaultError,
  formatUnits,
  parseUnits,
} from "@coffer/vault";
import type { VaultLogEntry } from "@coffer/vault";
import { InMemoryEventStore } from "@coffer/event-store";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                      COFFER DEMO                         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Custodial vault with fees and timelocks           ") + chalk.cyan.bold("║"));
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

function refused(msg: string): void {
  console.log(chalk.red("    ✗ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.yellow(short));
}

/**
 * Run a call that should be refused and print the vault's reason.
 * Anything other than a VaultError is a real failure and propagates.
 */
async function expectRefusal(label: string, call: () => unknown): Promise<void> {
  try {
    await call();
  } catch (error) {
    if (error instanceof VaultError) {
      refused(`${label}: ${chalk.yellow(error.code)} ${chalk.gray(error.message)}`);
      return;
    }
    throw error;
  }
  throw new Error(`${label} was expected to be refused`);
}

const TOTAL_STEPS = 8;

// Accounts
const OWNER = "0x00000000000000000000000000000000000a11ce";
const DEPOSITOR = "0x000000000000000000000000000000000000d0e0";
const FEES = "0x0000000000000000000000000000000000000fee";
const VAULT = "0xc0ffe00000000000000000000000000000000001";

const DECIMALS = 18;
const SYMBOL = "CFR";

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of a vault's lifecycle on a manual clock."));
  console.log(chalk.gray("  Every step uses the real domain packages.\n"));

  const amount = (value: bigint): string => `${formatUnits(value, DECIMALS)} ${SYMBOL}`;

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const clock = new ManualClock();
  const ledger = new InMemoryTokenLedger();
  const events = new InMemoryEventStore({ now: () => new Date(clock.now() * 1000) });
  const log: VaultLogEntry[] = [];

  ledger.credit(DEPOSITOR, parseUnits("2000", DECIMALS));

  const vault = new Vault(
    {
      name: "Demo Reserve",
      address: VAULT,
      token: { ledgerId: "sandbox", symbol: SYMBOL, decimals: DECIMALS },
      owner: OWNER,
      feeCollector: FEES,
      feePercentage: 100,
      withdrawalLimit: parseUnits("10000", DECIMALS),
      withdrawalTimelock: 86_400,
    },
    { ledger, clock, events, logFn: (entry) => log.push(entry) },
  );

  ok(`Vault "${vault.name}" initialized`);
  info("owner", OWNER);
  info("fee", `${vault.feePercentage} bps`);
  info("withdrawal limit", amount(vault.withdrawalLimit));
  info("timelock", `${vault.withdrawalTimelock}s`);
  info("depositor funds", amount(await ledger.balanceOf(DEPOSITOR)));

  await sleep(DELAY_MS);

  // ─── Step 2: Deposit ────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Approve and Deposit");

  const depositAmount = parseUnits("1000", DECIMALS);
  await ledger.approve(DEPOSITOR, VAULT, depositAmount);
  ok(`Depositor approved the vault for ${amount(depositAmount)}`);

  const deposit = await vault.deposit(DEPOSITOR, depositAmount);
  ok(`Deposited ${amount(deposit.amount)}`);
  info("total deposited", amount(deposit.totalDeposited));
  info("vault holds", amount(await vault.vaultBalance()));

  await sleep(DELAY_MS);

  // ─── Step 3: Early withdrawal ───────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Withdraw Inside the Timelock");

  const withdrawAmount = parseUnits("500", DECIMALS);
  info("clock", `t=${clock.now()}`);
  info("eligible in", `${vault.timeUntilWithdrawal(DEPOSITOR)}s`);
  await expectRefusal("Withdrawal", () => vault.withdraw(DEPOSITOR, withdrawAmount));

  await sleep(DELAY_MS);

  // ─── Step 4: Withdrawal ─────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Wait and Withdraw");

  clock.advance(86_401);
  info("clock", `t=${clock.now()}`);

  const withdrawal = await vault.withdraw(DEPOSITOR, withdrawAmount);
  ok(`Withdrew ${amount(withdrawal.grossAmount)}`);
  info("fee", amount(withdrawal.fee));
  info("net to depositor", amount(withdrawal.net));
  info("fee collector", amount(await ledger.balanceOf(FEES)));
  info("total deposited", amount(withdrawal.totalDeposited));
  info("last withdrawal", `t=${vault.lastWithdrawalTime(DEPOSITOR)}`);

  await sleep(DELAY_MS);

  // ─── Step 5: Fee cap ────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Fee Above the Cap");

  const versionBefore = vault.version;
  await expectRefusal("setFeePercentage(501)", () => vault.setFeePercentage(OWNER, 501));
  info("version", `${versionBefore} -> ${vault.version} (unchanged)`);

  vault.setFeePercentage(OWNER, 250);
  ok(`Fee set to ${vault.feePercentage} bps (version ${vault.version})`);

  await sleep(DELAY_MS);

  // ─── Step 6: Pause ──────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Pause");

  vault.pause(OWNER);
  ok("Vault paused");
  await expectRefusal("Deposit while paused", () => vault.deposit(DEPOSITOR, 1n));

  await sleep(DELAY_MS);

  // ─── Step 7: Emergency withdrawal ───────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Emergency Withdrawal");

  const remaining = await vault.vaultBalance();
  info("limit", "bypassed");
  info("timelock", "bypassed");
  info("pause", "bypassed");
  const emergency = await vault.emergencyWithdraw(OWNER, remaining);
  ok(`Owner recovered ${amount(emergency.amount)}`);
  info("owner holds", amount(await ledger.balanceOf(OWNER)));
  info("total deposited", amount(emergency.totalDeposited));

  await sleep(DELAY_MS);

  // ─── Step 8: Event log ──────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Event Log");

  const stored = events.readAll();
  for (const se of stored) {
    const line = JSON.stringify({ type: se.event.type, payload: se.event.payload });
    console.log(chalk.gray(`    ${String(se.globalPosition).padStart(2)} `) + chalk.dim(line));
  }

  const integrity = events.verifyIntegrity();
  const last = stored.at(-1);
  if (last !== undefined) {
    hashLine("head", last.hash);
  }
  if (integrity.valid) {
    ok(chalk.green.bold("CHAIN VALID") + ` (${integrity.lastVerifiedPosition} events)`);
  } else {
    refused(`Chain broken: ${integrity.errors.length} errors`);
  }

  const rejected = log.filter((entry) => entry.outcome === "rejected").length;

  console.log();
  console.log(chalk.white("    Calls committed:     ") + chalk.cyan.bold(String(log.length - rejected)));
  console.log(chalk.white("    Calls refused:       ") + chalk.cyan.bold(String(rejected)));
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(stored.length)));
  console.log();
  console.log(chalk.gray("    A refused call changes nothing and records nothing."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
