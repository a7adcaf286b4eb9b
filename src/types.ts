// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
// Shared type definitions for the escalation engine

import { z } from "zod";

// --- Alerts ---

export const ALERT_STATUSES = [
  "Received",
  "Checking",
  "Pending",
  "Escalated",
  "Accepted",
  "Resolved",
  "Failed",
] as const;

export const ALERT_SEVERITIES = ["Critical", "High", "Medium", "Low", "Info"] as const;

export const AlertStatusSchema = z.enum(ALERT_STATUSES);
export const AlertSeveritySchema = z.enum(ALERT_SEVERITIES);

export type AlertStatus = z.infer<typeof AlertStatusSchema>;
export type AlertSeverity = z.infer<typeof AlertSeveritySchema>;

const IsoDateString = z.string().refine((s) => !isNaN(new Date(s).getTime()), {
  message: "must be a valid ISO date string",
});

export const TimelineEntrySchema = z.object({
  actor: z.string().min(1),
  comment: z.string(),
  previousStatus: AlertStatusSchema,
  newStatus: AlertStatusSchema,
  timestamp: IsoDateString,
});

export type TimelineEntry = z.infer<typeof TimelineEntrySchema>;

export const AlertSchema = z.object({
  id: z.string().min(1),
  customerId: z.string().min(1),
  resourceId: z.string().min(1),
  status: AlertStatusSchema.default("Received"),
  severity: AlertSeveritySchema.default("Medium"),
  title: z.string().default("Alert"),
  description: z.string().nullable().default(null),
  escalationAttempts: z.number().int().min(0).default(0),
  currentEscalationTarget: z.string().nullable().default(null),
  timeline: z.array(TimelineEntrySchema).default([]),
  createdAt: IsoDateString,
  updatedAt: IsoDateString,
  resolvedAt: IsoDateString.nullable().default(null),
  metadata: z.record(z.string(), z.string()).default({}),
});

export type Alert = z.infer<typeof AlertSchema>;

// --- On-call coverage ---

export type EscalationTier = "primary" | "backup";

export const OnCallMemberSchema = z.object({
  userId: z.string().min(1),
  displayName: z.string(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
});

export type OnCallMember = z.infer<typeof OnCallMemberSchema>;

export const EscalationPolicySchema = z.object({
  ackTimeoutMs: z.number().int().min(0),
  maxAttemptsPerTier: z.number().int().min(0),
  /** Reserved: not used by the wait logic. */
  retryDelayMs: z.number().int().min(0),
});

export type EscalationPolicy = z.infer<typeof EscalationPolicySchema>;

export const OnCallCoverageSchema = z.object({
  primaryTier: z.array(OnCallMemberSchema),
  backupTier: z.array(OnCallMemberSchema),
  policy: EscalationPolicySchema,
  planId: z.string().nullable(),
});

export type OnCallCoverage = z.infer<typeof OnCallCoverageSchema>;

// --- Notifications ---

export const NotificationResultSchema = z.object({
  emailSent: z.boolean(),
  smsSent: z.boolean(),
  error: z.string().optional(),
});

export type NotificationResult = z.infer<typeof NotificationResultSchema>;

// --- Roster ---

export type SliceRole = "on-hours" | "off-hours" | "backup";

/** Materialized on-call slice: who covers a role for one time window. */
export interface ScheduleSlice {
  id: string;
  customerId: string;
  planId: string;
  role: SliceRole;
  memberIds: string[];
  startUtc: Date;
  endUtc: Date;
  generatedAtUtc: Date;
}

export interface DirectoryUser {
  id: string;
  displayName: string;
  email: string | null;
  phone: string | null;
}

export interface OnCallPlan {
  id: string;
  escalation: EscalationPolicy;
}

/** Customer bound to a plan with fixed primary and backup teams. */
export interface CustomerBinding {
  customerId: string;
  planId: string;
  primaryMemberIds: string[];
  backupMemberIds: string[];
}
