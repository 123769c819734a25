import type { Logger } from "pino";
import type { AppConfig, AppEnvironment } from "../config";
import type { DeliveryDestination } from "./delivery";
import { createWebhookSender } from "./webhook";
import { createMailgunSender } from "./sender";

/**
 * Builds the configured destinations from the environment: the webhook when
 * `SLACK_WEBHOOK_URL` is set, email when every Mailgun and address variable is.
 */
export function buildDestinations(
  env: AppEnvironment,
  config: AppConfig,
  logger: Logger,
): ReadonlyArray<DeliveryDestination> {
  const destinations: Array<DeliveryDestination> = [];

  if (env.SLACK_WEBHOOK_URL) {
    destinations.push(
      createWebhookSender(env.SLACK_WEBHOOK_URL, config.delivery.timeoutMs),
    );
  } else {
    logger.warn("SLACK_WEBHOOK_URL not set, webhook delivery disabled");
  }

  const { MAILGUN_API_KEY, MAILGUN_DOMAIN, EMAIL_FROM, EMAIL_TO } = env;
  if (MAILGUN_API_KEY && MAILGUN_DOMAIN && EMAIL_FROM && EMAIL_TO) {
    destinations.push(
      createMailgunSender({
        apiKey: MAILGUN_API_KEY,
        domain: MAILGUN_DOMAIN,
        from: EMAIL_FROM,
        to: EMAIL_TO,
        timeoutMs: config.delivery.timeoutMs,
      }),
    );
  } else {
    logger.info(
      "MAILGUN_API_KEY, MAILGUN_DOMAIN, EMAIL_FROM or EMAIL_TO not set, email delivery disabled",
    );
  }

  return destinations;
}
