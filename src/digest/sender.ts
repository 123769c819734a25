// pattern: Imperative Shell
import Mailgun from "mailgun.js";
import FormData from "form-data";
import type { Logger } from "pino";
import type { DeliveryDestination, DigestMessage, SendResult } from "./delivery";

export type MailgunSettings = {
  readonly apiKey: string;
  readonly domain: string;
  readonly from: string;
  readonly to: ReadonlyArray<string>;
  readonly timeoutMs: number;
};

/**
 * Creates the email destination backed by Mailgun.
 *
 * @returns A destination that sends the digest subject, text and HTML; errors
 *          are caught and returned in the result.
 */
export function createMailgunSender(settings: MailgunSettings): DeliveryDestination {
  const mailgun = new Mailgun(FormData);
  const mg = mailgun.client({
    username: "api",
    key: settings.apiKey,
    timeout: settings.timeoutMs,
  });

  return {
    name: "email",
    async deliver(message: DigestMessage, logger: Logger): Promise<SendResult> {
      try {
        const result = await mg.messages.create(settings.domain, {
          from: settings.from,
          to: [...settings.to],
          subject: message.subject,
          text: message.text,
          html: message.html,
        });

        logger.info(
          { messageId: result.id, recipients: settings.to },
          "digest email sent",
        );
        return { success: true, messageId: result.id ?? null };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(
          { recipients: settings.to, error: message },
          "digest email send failed",
        );
        return { success: false, error: message };
      }
    },
  };
}
