// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import { errorMessage } from "../errors.js";
import { logger, type Logger } from "../logger.js";
import type { NotificationResult } from "../types.js";

export interface NotificationRequest {
  alertId: string;
  userId: string;
  email: string | null;
  phone: string | null;
  subject: string;
  body: string;
  smsText: string;
}

/** Sends one notification attempt to one user over every channel they have. */
export interface NotificationDispatcher {
  send(request: NotificationRequest): Promise<NotificationResult>;
}

export interface DeliveryReceipt {
  succeeded: boolean;
  error?: string;
}

export interface EmailTransport {
  sendEmail(to: string, subject: string, body: string): Promise<DeliveryReceipt>;
}

export interface SmsTransport {
  sendSms(to: string, text: string): Promise<DeliveryReceipt>;
}

/**
 * Dispatches over email and SMS independently. A channel with no address or
 * no transport counts as not sent; the first channel error is reported.
 */
export class ChannelNotificationDispatcher implements NotificationDispatcher {
  private readonly log = logger.child({ component: "dispatcher" });

  constructor(
    private readonly email: EmailTransport | null,
    private readonly sms: SmsTransport | null,
  ) {}

  async send(request: NotificationRequest): Promise<NotificationResult> {
    const log = this.log.child({ alertId: request.alertId, userId: request.userId });
    const errors: string[] = [];

    const emailSent = await this.attempt("email", request.email, this.email, log, errors, (transport, to) =>
      transport.sendEmail(to, request.subject, request.body),
    );
    const smsSent = await this.attempt("sms", request.phone, this.sms, log, errors, (transport, to) =>
      transport.sendSms(to, request.smsText),
    );

    log.info({ emailSent, smsSent }, "notification dispatched");
    const [error] = errors;
    return error === undefined ? { emailSent, smsSent } : { emailSent, smsSent, error };
  }

  private async attempt<T>(
    channel: "email" | "sms",
    address: string | null,
    transport: T | null,
    log: Logger,
    errors: string[],
    deliver: (transport: T, to: string) => Promise<DeliveryReceipt>,
  ): Promise<boolean> {
    if (!address || address.trim() === "") {
      log.warn({ channel }, "no address for channel");
      return false;
    }
    if (!transport) {
      log.debug({ channel }, "channel not configured");
      return false;
    }
    try {
      const receipt = await deliver(transport, address);
      if (!receipt.succeeded) {
        log.warn({ channel, error: receipt.error }, "channel delivery failed");
        errors.push(receipt.error ?? `${channel} delivery failed`);
      }
      return receipt.succeeded;
    } catch (err: unknown) {
      log.error({ channel, err: errorMessage(err) }, "channel delivery error");
      errors.push(errorMessage(err));
      return false;
    }
  }
}
