import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { WebhookTransport } from "../../src/notifications/webhook.js";

describe("WebhookTransport", () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response(null, { status: 202 }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts an email as JSON with the configured headers", async () => {
    const transport = new WebhookTransport({
      url: "https://relay.example.com/email",
      headers: { Authorization: "Bearer test-token" },
    });

    const receipt = await transport.sendEmail("a@example.com", "Subject", "Body");

    expect(receipt).toEqual({ succeeded: true });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0] ?? [];
    expect(url).toBe("https://relay.example.com/email");
    expect(init).toMatchObject({
      method: "POST",
      headers: { "Content-Type": "application/json", Authorization: "Bearer test-token" },
      body: JSON.stringify({ channel: "email", to: "a@example.com", subject: "Subject", body: "Body" }),
    });
  });

  it("posts an SMS without a subject", async () => {
    const transport = new WebhookTransport({ url: "https://relay.example.com/sms" });

    await transport.sendSms("+15550100", "[P] High: Disk");

    const [, init] = fetchSpy.mock.calls[0] ?? [];
    expect(init).toMatchObject({
      body: JSON.stringify({ channel: "sms", to: "+15550100", body: "[P] High: Disk" }),
    });
  });

  it("reports a non-2xx response as a failed delivery", async () => {
    fetchSpy.mockResolvedValue(new Response("busy", { status: 503 }));
    const transport = new WebhookTransport({ url: "https://relay.example.com/sms" });

    expect(await transport.sendSms("+15550100", "text")).toEqual({
      succeeded: false,
      error: "sms relay responded 503",
    });
  });

  it("lets network errors propagate", async () => {
    fetchSpy.mockRejectedValue(new TypeError("fetch failed"));
    const transport = new WebhookTransport({ url: "https://relay.example.com/email" });

    await expect(transport.sendEmail("a@example.com", "s", "b")).rejects.toThrow("fetch failed");
  });
});
