// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
/**
 * CLI command definitions registered on the Commander program.
 */

import type { Command } from "commander";
import { startDailyExtensionJob } from "../coverage/horizon.js";
import { addMs, DAY_MS, startOfUtcDay } from "../duration.js";
import type { EscalationEngine } from "../engine.js";
import { EscalationEventBus } from "../events.js";
import { logger } from "../logger.js";
import type { AlertStatus } from "../types.js";
import {
  applyLogFile,
  attachProgress,
  createEngine,
  formatAlertLine,
  formatAlertReport,
  formatRunStatus,
  loadConfigFromOpts,
  parseAlertId,
  parseDate,
  parseDays,
  parseStatus,
  readAlertFile,
} from "./helpers.js";

const DEFAULT_ACTOR = process.env["USER"] ?? "cli";

/** Register all CLI commands on the given Commander program. */
export function registerCommands(program: Command): void {
  registerRun(program);
  registerResume(program);
  registerServe(program);
  registerStatus(program);
  registerList(program);
  registerAck(program);
  registerResolve(program);
  registerEscalate(program);
  registerExtendHorizon(program);
}

function fail(what: string, err: unknown): never {
  logger.error({ err }, `${what} failed`);
  console.error(`❌ ${what} failed:`, err instanceof Error ? err.message : err);
  process.exit(1);
}

/** Wait for the run to finish in this process and print how it ended. */
async function waitAndReport(engine: EscalationEngine, alertId: string): Promise<void> {
  const run = await engine.waitForCompletion(alertId);
  const { alert } = await engine.status(alertId);
  console.log(`\n🏁 Run ${alertId}: ${formatRunStatus(run)}`);
  if (run.status === "completed") {
    console.log(`  Outcome: ${JSON.stringify(run.output)}`);
  }
  if (alert) {
    console.log(`  Alert status: ${alert.status}`);
  }
}

// --- run ---
function registerRun(program: Command): void {
  program
    .command("run")
    .description("Submit an alert and escalate it until it is handled or exhausted")
    .requiredOption("--alert <file>", "Path to an alert JSON document")
    .option("--detach", "Create the run and exit; `serve` or `resume` continues it", false)
    .action(async (opts: { alert: string; detach: boolean }) => {
      try {
        const config = loadConfigFromOpts(program.opts<{ config?: string }>().config);
        const alert = readAlertFile(opts.alert);
        const events = new EscalationEventBus();
        attachProgress(events);
        const engine = createEngine(config, events);
        try {
          const run = await engine.submit(alert);
          console.log(`🚨 Escalation started for ${run.instanceId}`);
          if (!opts.detach) {
            await waitAndReport(engine, run.instanceId);
          }
        } finally {
          await engine.stop();
        }
      } catch (err: unknown) {
        fail("Run", err);
      }
    });
}

// --- resume ---
function registerResume(program: Command): void {
  program
    .command("resume")
    .description("Resume interrupted and waiting runs, then wait for them to finish")
    .action(async () => {
      try {
        const config = loadConfigFromOpts(program.opts<{ config?: string }>().config);
        const events = new EscalationEventBus();
        attachProgress(events);
        const engine = createEngine(config, events);
        try {
          const { dispatched, scheduled } = await engine.resumePending();
          const ids = [...dispatched, ...scheduled];
          if (ids.length === 0) {
            console.log("✅ No runs to resume.");
            return;
          }
          console.log(`▶️  Resuming ${dispatched.length} run(s), ${scheduled.length} waiting on a timer`);
          for (const id of ids) {
            await waitAndReport(engine, id);
          }
        } finally {
          await engine.stop();
        }
      } catch (err: unknown) {
        fail("Resume", err);
      }
    });
}

// --- serve ---
function registerServe(program: Command): void {
  program
    .command("serve")
    .description("Keep resuming runs and extend schedules daily until interrupted")
    .action(async () => {
      try {
        const config = loadConfigFromOpts(program.opts<{ config?: string }>().config);
        applyLogFile(config);
        const events = new EscalationEventBus();
        attachProgress(events);
        const engine = createEngine(config, events);

        const { dispatched, scheduled } = await engine.resumePending();
        console.log(`🛰️  Serving: ${dispatched.length} run(s) resumed, ${scheduled.length} waiting on a timer`);

        let job: { stop(): void } | null = null;
        if (engine.horizon) {
          await engine.horizon.runDailyExtension();
          job = startDailyExtensionJob(engine.horizon);
        }

        const shutdown = (signal: string): void => {
          console.log(`\n🛑 ${signal} received, stopping...`);
          job?.stop();
          engine.stop().then(
            () => process.exit(0),
            (err: unknown) => fail("Shutdown", err),
          );
        };
        process.once("SIGINT", () => shutdown("SIGINT"));
        process.once("SIGTERM", () => shutdown("SIGTERM"));
      } catch (err: unknown) {
        fail("Serve", err);
      }
    });
}

// --- status ---
function registerStatus(program: Command): void {
  program
    .command("status")
    .description("Show an alert, its timeline and its escalation run")
    .requiredOption("--alert <id>", "Alert id", parseAlertId)
    .action(async (opts: { alert: string }) => {
      try {
        const config = loadConfigFromOpts(program.opts<{ config?: string }>().config);
        const engine = createEngine(config);
        const { alert, run } = await engine.status(opts.alert);
        if (!alert) {
          console.log(`❓ Alert ${opts.alert} not found.`);
          return;
        }
        console.log(formatAlertReport(alert, run));
      } catch (err: unknown) {
        fail("Status", err);
      }
    });
}

// --- list ---
function registerList(program: Command): void {
  program
    .command("list")
    .description("List stored alerts")
    .option("--status <status>", "Only alerts in this status", parseStatus)
    .action(async (opts: { status?: AlertStatus }) => {
      try {
        const config = loadConfigFromOpts(program.opts<{ config?: string }>().config);
        const alerts = await createEngine(config).listAlerts(opts.status);
        if (alerts.length === 0) {
          console.log("📭 No alerts.");
          return;
        }
        for (const alert of alerts) {
          console.log(formatAlertLine(alert));
        }
      } catch (err: unknown) {
        fail("List", err);
      }
    });
}

// --- ack ---
function registerAck(program: Command): void {
  program
    .command("ack")
    .description("Acknowledge an alert; its escalation stops at the next check")
    .requiredOption("--alert <id>", "Alert id", parseAlertId)
    .option("--actor <name>", "Who is acknowledging", DEFAULT_ACTOR)
    .action(async (opts: { alert: string; actor: string }) => {
      try {
        const config = loadConfigFromOpts(program.opts<{ config?: string }>().config);
        const alert = await createEngine(config).acknowledge(opts.alert, opts.actor);
        console.log(`✅ Alert ${alert.id} acknowledged by ${opts.actor}`);
      } catch (err: unknown) {
        fail("Acknowledge", err);
      }
    });
}

// --- resolve ---
function registerResolve(program: Command): void {
  program
    .command("resolve")
    .description("Resolve an alert")
    .requiredOption("--alert <id>", "Alert id", parseAlertId)
    .option("--actor <name>", "Who is resolving", DEFAULT_ACTOR)
    .action(async (opts: { alert: string; actor: string }) => {
      try {
        const config = loadConfigFromOpts(program.opts<{ config?: string }>().config);
        const alert = await createEngine(config).resolve(opts.alert, opts.actor);
        console.log(`✅ Alert ${alert.id} resolved by ${opts.actor}`);
      } catch (err: unknown) {
        fail("Resolve", err);
      }
    });
}

// --- escalate ---
function registerEscalate(program: Command): void {
  program
    .command("escalate")
    .description("Request a manual escalation and start a new run if none is active")
    .requiredOption("--alert <id>", "Alert id", parseAlertId)
    .option("--actor <name>", "Who is requesting", DEFAULT_ACTOR)
    .option("--detach", "Create the run and exit; `serve` or `resume` continues it", false)
    .action(async (opts: { alert: string; actor: string; detach: boolean }) => {
      try {
        const config = loadConfigFromOpts(program.opts<{ config?: string }>().config);
        const events = new EscalationEventBus();
        attachProgress(events);
        const engine = createEngine(config, events);
        try {
          const run = await engine.escalate(opts.alert, opts.actor);
          console.log(`📣 Manual escalation recorded for ${opts.alert}`);
          if (run && !opts.detach) {
            await waitAndReport(engine, opts.alert);
          }
        } finally {
          await engine.stop();
        }
      } catch (err: unknown) {
        fail("Escalate", err);
      }
    });
}

// --- extend-horizon ---
function registerExtendHorizon(program: Command): void {
  program
    .command("extend-horizon")
    .description("Generate schedule slices ahead of time")
    .option("--customer <id>", "Extend one customer only")
    .option("--from <date>", "Start of the range (default: today, UTC)", parseDate)
    .option("--days <number>", "Length of the range in days (default: roster.horizon_days)", parseDays)
    .action(async (opts: { customer?: string; from?: Date; days?: number }) => {
      try {
        const config = loadConfigFromOpts(program.opts<{ config?: string }>().config);
        const events = new EscalationEventBus();
        attachProgress(events);
        const { horizon } = createEngine(config, events);
        if (!horizon) throw new Error("Horizon extension is not configured");

        if (!opts.customer) {
          const summary = await horizon.runDailyExtension(new Date());
          console.log(
            `✅ Horizon extended for ${summary.extended} customer(s), ${summary.skipped} skipped, ${summary.errors} error(s)`,
          );
          if (summary.errors > 0) process.exit(1);
          return;
        }

        const from = opts.from ?? startOfUtcDay(new Date());
        const to = addMs(from, (opts.days ?? config.roster.horizon_days) * DAY_MS);
        const count = await horizon.extendHorizon(opts.customer, from, to);
        console.log(`✅ ${count} slice(s) written for ${opts.customer} through ${to.toISOString()}`);
      } catch (err: unknown) {
        fail("Horizon extension", err);
      }
    });
}
