import { describe, it, expect, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  defaultPolicyFrom,
  handledStatusesFrom,
  loadConfig,
  parseConfig,
  substituteEnvVars,
} from "../src/config.js";
import { ConfigError } from "../src/errors.js";

function writeTmpConfig(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-test-"));
  const file = path.join(dir, "escalation-engine.config.yaml");
  fs.writeFileSync(file, content, "utf-8");
  return file;
}

const VALID_YAML = `
engine:
  data_dir: "/var/lib/escalation"
  max_concurrent_runs: 4
  handled_statuses: ["Accepted", "Resolved", "Failed"]

escalation:
  default_policy:
    ack_timeout: "10m"
    max_attempts_per_tier: 2
    retry_delay: "1m30s"

roster:
  path: "ops/roster.yaml"
  horizon_days: 30

notifications:
  sender: "Ops Pager"
  email:
    enabled: true
    url: "https://relay.example.com/email"
    headers:
      Authorization: "Bearer \${RELAY_TOKEN}"
  sms:
    enabled: false

logging:
  level: "debug"
`;

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("loadConfig", () => {
  it("loads and validates a complete config file", () => {
    vi.stubEnv("RELAY_TOKEN", "test-secret");
    const config = loadConfig(writeTmpConfig(VALID_YAML));

    expect(config.engine.data_dir).toBe("/var/lib/escalation");
    expect(config.engine.max_concurrent_runs).toBe(4);
    expect(config.escalation.default_policy.ack_timeout).toBe(600_000);
    expect(config.escalation.default_policy.retry_delay).toBe(90_000);
    expect(config.roster.path).toBe("ops/roster.yaml");
    expect(config.roster.horizon_days).toBe(30);
    expect(config.notifications.sender).toBe("Ops Pager");
    expect(config.notifications.email.url).toBe("https://relay.example.com/email");
    expect(config.notifications.email.headers).toEqual({ Authorization: "Bearer test-secret" });
    expect(config.notifications.email.timeout_ms).toBe(10_000);
    expect(config.notifications.sms.enabled).toBe(false);
    expect(config.logging.level).toBe("debug");
  });

  it("throws for a missing explicit path", () => {
    const missing = path.join(os.tmpdir(), "does-not-exist", "escalation-engine.config.yaml");
    expect(() => loadConfig(missing)).toThrow(ConfigError);
    expect(() => loadConfig(missing)).toThrow(`Config file not found: ${missing}`);
  });
});

describe("parseConfig", () => {
  it("fills every section with defaults for an empty document", () => {
    const config = parseConfig("");

    expect(config.engine).toEqual({
      data_dir: ".escalation-engine",
      max_concurrent_runs: 8,
      handled_statuses: ["Accepted", "Resolved"],
    });
    expect(config.escalation.default_policy).toEqual({
      ack_timeout: 300_000,
      max_attempts_per_tier: 3,
      retry_delay: 300_000,
    });
    expect(config.roster).toEqual({ path: "roster.yaml", horizon_days: 45 });
    expect(config.notifications.sender).toBe("Escalation Engine");
    expect(config.notifications.email.enabled).toBe(false);
    expect(config.logging.level).toBe("info");
  });

  it("requires a url for an enabled channel", () => {
    expect(() => parseConfig("notifications:\n  sms:\n    enabled: true\n")).toThrow(
      "Invalid configuration — notifications.sms.url: url is required when the channel is enabled",
    );
  });

  it("reports an invalid duration with its field path", () => {
    expect(() => parseConfig("escalation:\n  default_policy:\n    ack_timeout: soon\n")).toThrow(
      /escalation\.default_policy\.ack_timeout: Invalid duration: "soon"/,
    );
  });

  it("rejects an unknown handled status", () => {
    expect(() => parseConfig("engine:\n  handled_statuses: [Acknowledged]\n")).toThrow(
      /engine\.handled_statuses\.0:/,
    );
  });

  it("rejects a negative attempt cap", () => {
    expect(() => parseConfig("escalation:\n  default_policy:\n    max_attempts_per_tier: -1\n")).toThrow(
      ConfigError,
    );
  });
});

describe("config conversions", () => {
  it("maps the default policy to milliseconds", () => {
    const config = parseConfig("escalation:\n  default_policy:\n    ack_timeout: 2m\n    max_attempts_per_tier: 0\n");
    expect(defaultPolicyFrom(config)).toEqual({ ackTimeoutMs: 120_000, maxAttemptsPerTier: 0, retryDelayMs: 300_000 });
  });

  it("exposes handled statuses as a set", () => {
    const config = parseConfig("engine:\n  handled_statuses: [Resolved]\n");
    expect([...handledStatusesFrom(config)]).toEqual(["Resolved"]);
  });
});

describe("substituteEnvVars", () => {
  it("replaces known variables and blanks unknown ones", () => {
    vi.stubEnv("PAGER_URL", "https://relay.example.com");
    expect(substituteEnvVars("url: ${PAGER_URL}/sms")).toBe("url: https://relay.example.com/sms");
    expect(substituteEnvVars("token: '${ESCALATION_TEST_UNSET_VAR}'")).toBe("token: ''");
  });
});
