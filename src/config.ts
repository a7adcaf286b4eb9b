// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
// Config loader: parse escalation-engine.config.yaml with Zod validation

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { parseDuration } from "./duration.js";
import { ConfigError, formatIssues } from "./errors.js";
import { ALERT_STATUSES, type AlertStatus, type EscalationPolicy } from "./types.js";

export const DEFAULT_CONFIG_FILE = "escalation-engine.config.yaml";

// --- Zod Schemas ---

const DurationSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    try {
      return parseDuration(value);
    } catch (err: unknown) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

const EngineSchema = z.object({
  data_dir: z.string().min(1).default(".escalation-engine"),
  max_concurrent_runs: z.number().int().min(1).max(256).default(8),
  handled_statuses: z
    .array(z.enum(ALERT_STATUSES))
    .min(1)
    .default(["Accepted", "Resolved"]),
});

const DefaultPolicySchema = z.object({
  ack_timeout: DurationSchema.default("5m"),
  max_attempts_per_tier: z.number().int().min(0).default(3),
  retry_delay: DurationSchema.default("5m"),
});

const EscalationSchema = z.object({
  default_policy: DefaultPolicySchema.default({}),
});

const RosterSchema = z.object({
  path: z.string().min(1).default("roster.yaml"),
  horizon_days: z.number().int().min(1).max(366).default(45),
});

const ChannelSchema = z.object({
  enabled: z.boolean().default(false),
  url: z.string().url().optional(),
  headers: z.record(z.string(), z.string()).default({}),
  timeout_ms: z.number().int().min(1).default(10_000),
}).refine((c) => !c.enabled || c.url !== undefined, {
  message: "url is required when the channel is enabled",
  path: ["url"],
});

const NotificationsSchema = z.object({
  sender: z.string().min(1).default("Escalation Engine"),
  email: ChannelSchema.default({}),
  sms: ChannelSchema.default({}),
});

const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
});

export const ConfigFileSchema = z.object({
  engine: EngineSchema.default({}),
  escalation: EscalationSchema.default({}),
  roster: RosterSchema.default({}),
  notifications: NotificationsSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type ChannelConfig = ConfigFile["notifications"]["email"];

/** Convert the configured default policy to the runtime shape. */
export function defaultPolicyFrom(config: ConfigFile): EscalationPolicy {
  const p = config.escalation.default_policy;
  return {
    ackTimeoutMs: p.ack_timeout,
    maxAttemptsPerTier: p.max_attempts_per_tier,
    retryDelayMs: p.retry_delay,
  };
}

export function handledStatusesFrom(config: ConfigFile): ReadonlySet<AlertStatus> {
  return new Set(config.engine.handled_statuses);
}

// --- Environment variable substitution ---

/** Replace `${VAR}` placeholders with values from process.env */
export function substituteEnvVars(text: string): string {
  return text.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      return "";
    }
    return value;
  });
}

// --- Loader ---

/** Parse config text (already read from disk). An empty document yields all defaults. */
export function parseConfig(text: string): ConfigFile {
  const substituted = substituteEnvVars(text);
  const parsed: unknown = parseYaml(substituted, { customTags: [] });
  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration — ${issues}`);
  }
  return result.data;
}

/**
 * Load and validate escalation-engine.config.yaml.
 * @param configPath - absolute or relative path to YAML config file.
 *   Defaults to `escalation-engine.config.yaml` in the current working directory.
 *   A missing default file yields the built-in defaults; a missing explicit path is an error.
 */
export function loadConfig(configPath?: string): ConfigFile {
  const resolvedPath = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    if (configPath === undefined) {
      return parseConfig("");
    }
    throw new ConfigError(`Config file not found: ${resolvedPath}`);
  }

  return parseConfig(fs.readFileSync(resolvedPath, "utf-8"));
}
