// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import * as path from "node:path";
import { AlertService } from "./alerts/alert-service.js";
import { FileAlertStore, type AlertStore } from "./alerts/alert-store.js";
import { defaultPolicyFrom, handledStatusesFrom, type ChannelConfig, type ConfigFile } from "./config.js";
import { HorizonExtender, WholeTeamDailyGenerator } from "./coverage/horizon.js";
import { RosterCoverageResolver, type CoverageResolver } from "./coverage/resolver.js";
import { YamlRosterStore } from "./coverage/roster-store.js";
import { systemClock, type Clock } from "./durable/clock.js";
import { InstanceAlreadyRunningError } from "./durable/errors.js";
import { FileJournalStore } from "./durable/file-journal-store.js";
import { ACTIVE_RUN_STATUSES, type JournalStore, type RunRecord } from "./durable/journal.js";
import { DurableRuntime } from "./durable/runtime.js";
import { registerEscalationActivities } from "./escalation/activities.js";
import {
  createAlertOrchestration,
  type AlertOrchestrationResult,
} from "./escalation/orchestrator.js";
import type { OrchestrationDefinition } from "./durable/definitions.js";
import { EscalationEventBus } from "./events.js";
import { logger } from "./logger.js";
import { ChannelNotificationDispatcher, type NotificationDispatcher } from "./notifications/dispatcher.js";
import { WebhookTransport } from "./notifications/webhook.js";
import type { Alert, AlertStatus } from "./types.js";

export interface EscalationEngineOptions {
  alertStore: AlertStore;
  journalStore: JournalStore;
  coverage: CoverageResolver;
  dispatcher: NotificationDispatcher;
  /** Sender name in notification subjects. */
  sender?: string;
  handledStatuses?: ReadonlySet<AlertStatus>;
  maxConcurrentRuns?: number;
  autoStart?: boolean;
  clock?: Clock;
  events?: EscalationEventBus;
  horizon?: HorizonExtender;
}

export interface AlertStatusReport {
  alert: Alert | null;
  run: RunRecord | null;
}

/** One escalation run per alert, keyed by the alert id. */
export class EscalationEngine {
  readonly events: EscalationEventBus;
  readonly alerts: AlertService;
  readonly runtime: DurableRuntime;
  readonly orchestration: OrchestrationDefinition<Alert, AlertOrchestrationResult>;
  readonly horizon?: HorizonExtender;

  private readonly store: AlertStore;
  private readonly log = logger.child({ component: "engine" });

  constructor(options: EscalationEngineOptions) {
    const clock = options.clock ?? systemClock;
    this.events = options.events ?? new EscalationEventBus();
    this.store = options.alertStore;
    this.alerts = new AlertService(options.alertStore, clock, this.events);
    this.horizon = options.horizon;
    this.runtime = new DurableRuntime({
      store: options.journalStore,
      clock,
      maxConcurrentRuns: options.maxConcurrentRuns,
      autoStart: options.autoStart,
      events: this.events,
      onRunFailed: (record, error) => this.failAlert(record, error),
    });
    this.orchestration = createAlertOrchestration({ handledStatuses: options.handledStatuses });

    registerEscalationActivities(this.runtime, {
      alerts: this.alerts,
      coverage: options.coverage,
      dispatcher: options.dispatcher,
      sender: options.sender ?? "Escalation Engine",
    });
    this.runtime.registerOrchestration(this.orchestration);
  }

  /**
   * Start escalating an alert. The alert is stored first if it is new;
   * a stored alert wins over the submitted copy.
   */
  async submit(alert: Alert): Promise<RunRecord> {
    const stored = (await this.store.get(alert.id)) ?? (await this.store.create(alert));
    this.log.info({ alertId: stored.id, status: stored.status }, "alert submitted for escalation");
    return this.runtime.startNew(this.orchestration, stored.id, stored);
  }

  /**
   * Manual re-escalation: records the request on the alert and starts a
   * fresh run unless one is still active, in which case that run is returned.
   */
  async escalate(alertId: string, actor: string): Promise<RunRecord | null> {
    const alert = await this.alerts.requestManualEscalation(alertId, actor);
    try {
      return await this.runtime.startNew(this.orchestration, alert.id, alert);
    } catch (err: unknown) {
      if (!(err instanceof InstanceAlreadyRunningError)) throw err;
      this.log.info({ alertId }, "escalation already running, request recorded on the alert");
      return this.runtime.getStatus(alertId);
    }
  }

  acknowledge(alertId: string, actor: string): Promise<Alert> {
    return this.alerts.acknowledge(alertId, actor);
  }

  resolve(alertId: string, actor: string): Promise<Alert> {
    return this.alerts.resolve(alertId, actor);
  }

  async status(alertId: string): Promise<AlertStatusReport> {
    const [alert, run] = await Promise.all([this.store.get(alertId), this.runtime.getStatus(alertId)]);
    return { alert, run };
  }

  /** Every stored alert, optionally narrowed to one status, oldest first. */
  async listAlerts(status?: AlertStatus): Promise<Alert[]> {
    const alerts = await this.store.list();
    return alerts
      .filter((a) => status === undefined || a.status === status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id));
  }

  async isActive(alertId: string): Promise<boolean> {
    const run = await this.runtime.getStatus(alertId);
    return run !== null && ACTIVE_RUN_STATUSES.has(run.status);
  }

  resumePending(): Promise<{ dispatched: string[]; scheduled: string[] }> {
    return this.runtime.resumePending();
  }

  waitForCompletion(alertId: string): Promise<RunRecord> {
    return this.runtime.waitForCompletion(alertId);
  }

  stop(): Promise<void> {
    return this.runtime.stop();
  }

  /** A run that failed outside the orchestration's own error handling still fails its alert. */
  private async failAlert(record: RunRecord, error: string): Promise<void> {
    if (record.orchestration !== this.orchestration.name) return;
    const alert = await this.store.get(record.instanceId);
    if (!alert || alert.status === "Failed") return;
    await this.alerts.markFailed(alert.id, `Orchestration failed: ${error}`);
  }
}

function webhookFor(channel: ChannelConfig): WebhookTransport | null {
  if (!channel.enabled || channel.url === undefined) return null;
  return new WebhookTransport({ url: channel.url, headers: channel.headers, timeoutMs: channel.timeout_ms });
}

/** Wire the file-backed stores, YAML roster and webhook transports from config. */
export function createEngineFromConfig(
  config: ConfigFile,
  options: { baseDir?: string; clock?: Clock; events?: EscalationEventBus; autoStart?: boolean } = {},
): EscalationEngine {
  const baseDir = options.baseDir ?? process.cwd();
  const dataDir = path.resolve(baseDir, config.engine.data_dir);
  const clock = options.clock ?? systemClock;
  const events = options.events ?? new EscalationEventBus();

  const roster = new YamlRosterStore({
    rosterPath: path.resolve(baseDir, config.roster.path),
    slicesPath: path.join(dataDir, "slices.json"),
  });

  return new EscalationEngine({
    alertStore: new FileAlertStore(dataDir),
    journalStore: new FileJournalStore(dataDir),
    coverage: new RosterCoverageResolver(roster, roster, roster, defaultPolicyFrom(config)),
    dispatcher: new ChannelNotificationDispatcher(
      webhookFor(config.notifications.email),
      webhookFor(config.notifications.sms),
    ),
    sender: config.notifications.sender,
    handledStatuses: handledStatusesFrom(config),
    maxConcurrentRuns: config.engine.max_concurrent_runs,
    autoStart: options.autoStart,
    clock,
    events,
    horizon: new HorizonExtender({
      bindings: roster,
      slices: roster,
      generator: new WholeTeamDailyGenerator(),
      horizonDays: config.roster.horizon_days,
      clock,
      events,
    }),
  });
}
