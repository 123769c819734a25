import { describe, it, expect } from "vitest";
import pino from "pino";
import { dispatchDigest } from "./dispatcher";
import type { DeliveryDestination } from "./delivery";
import { createRecordingDestination } from "../test-utils/fixtures";

const logger = pino({ level: "silent" });
const message = { subject: "S", text: "T", html: "<p>H</p>" };

describe("dispatchDigest", () => {
  it("should deliver to every destination", async () => {
    const webhook = createRecordingDestination("webhook");
    const email = createRecordingDestination("email", { success: true, messageId: "m-1" });

    const report = await dispatchDigest([webhook, email], message, logger);

    expect(report).toEqual({
      status: "delivered",
      outcomes: [
        { destination: "webhook", result: { success: true, messageId: null } },
        { destination: "email", result: { success: true, messageId: "m-1" } },
      ],
    });
    expect(webhook.received).toEqual([message]);
    expect(email.received).toEqual([message]);
  });

  it("should still attempt the second destination when the first fails", async () => {
    const webhook = createRecordingDestination("webhook", { success: false, error: "HTTP 500: Internal Server Error" });
    const email = createRecordingDestination("email");

    const report = await dispatchDigest([webhook, email], message, logger);

    expect(report.status).toBe("partial");
    expect(email.received).toHaveLength(1);
  });

  it("should convert a throwing destination into a failed outcome", async () => {
    const throwing: DeliveryDestination = {
      name: "webhook",
      deliver: async () => {
        throw new Error("boom");
      },
    };

    const report = await dispatchDigest([throwing], message, logger);

    expect(report).toEqual({
      status: "failed",
      outcomes: [{ destination: "webhook", result: { success: false, error: "boom" } }],
    });
  });

  it("should fail when no destination is configured", async () => {
    const report = await dispatchDigest([], message, logger);

    expect(report).toEqual({ status: "failed", outcomes: [] });
  });
});
