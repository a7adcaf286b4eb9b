// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import { logger } from "../logger.js";
import type { DeliveryReceipt, EmailTransport, SmsTransport } from "./dispatcher.js";

export interface WebhookConfig {
  url: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Hands a message to an HTTP relay (mail or SMS gateway) as JSON
 * `{ channel, to, subject?, body }`. Non-2xx responses are failed deliveries.
 */
export class WebhookTransport implements EmailTransport, SmsTransport {
  private readonly log = logger.child({ component: "webhook" });

  constructor(private readonly config: WebhookConfig) {}

  sendEmail(to: string, subject: string, body: string): Promise<DeliveryReceipt> {
    return this.post({ channel: "email", to, subject, body });
  }

  sendSms(to: string, text: string): Promise<DeliveryReceipt> {
    return this.post({ channel: "sms", to, body: text });
  }

  private async post(payload: { channel: string; to: string; subject?: string; body: string }): Promise<DeliveryReceipt> {
    const res = await fetch(this.config.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.config.headers },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.config.timeoutMs ?? 10_000),
    });
    if (!res.ok) {
      this.log.warn({ status: res.status, channel: payload.channel }, "webhook delivery rejected");
      return { succeeded: false, error: `${payload.channel} relay responded ${res.status}` };
    }
    return { succeeded: true };
  }
}
