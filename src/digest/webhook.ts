// pattern: Imperative Shell
import type { Logger } from "pino";
import type { DeliveryDestination, DigestMessage, SendResult } from "./delivery";

/**
 * Creates a destination that POSTs `{ "text": ... }` to a Slack-compatible
 * incoming webhook. Only the status code is inspected.
 */
export function createWebhookSender(
  webhookUrl: string,
  timeoutMs: number,
): DeliveryDestination {
  const host = new URL(webhookUrl).host;

  return {
    name: "webhook",
    async deliver(message: DigestMessage, logger: Logger): Promise<SendResult> {
      try {
        const response = await fetch(webhookUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ text: message.text }),
          signal: AbortSignal.timeout(timeoutMs),
        });
        await response.body?.cancel();

        if (!response.ok) {
          const error = `HTTP ${response.status}: ${response.statusText}`;
          logger.error({ host, error }, "webhook delivery failed");
          return { success: false, error };
        }

        logger.info({ host, status: response.status }, "digest posted to webhook");
        return { success: true, messageId: null };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ host, error: message }, "webhook delivery failed");
        return { success: false, error: message };
      }
    },
  };
}
