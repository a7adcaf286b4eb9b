#!/usr/bin/env node
// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.

/**
 * Escalation Engine CLI: durable on-call escalation for alerts.
 *
 * Usage:
 *   escalation-engine run --alert <file> [--detach]
 *   escalation-engine resume
 *   escalation-engine serve
 *   escalation-engine status --alert <id>
 *   escalation-engine list [--status <status>]
 *   escalation-engine ack --alert <id> [--actor <name>]
 *   escalation-engine resolve --alert <id> [--actor <name>]
 *   escalation-engine escalate --alert <id> [--actor <name>] [--detach]
 *   escalation-engine extend-horizon [--customer <id>] [--from <date>] [--days <n>]
 */

import { Command } from "commander";
import { registerCommands } from "./cli/commands.js";
import { DEFAULT_CONFIG_FILE } from "./config.js";

const program = new Command();

program
  .name("escalation-engine")
  .description("Durable alert escalation across on-call rosters")
  .version("0.1.0")
  .option("--config <path>", `Path to config file (default: ${DEFAULT_CONFIG_FILE})`);

registerCommands(program);

await program.parseAsync();
