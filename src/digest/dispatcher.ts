// pattern: Imperative Shell
import type { Logger } from "pino";
import type { DeliveryDestination, DigestMessage, SendResult } from "./delivery";

export type DeliveryOutcome = Readonly<{
  destination: string;
  result: SendResult;
}>;

export type DeliveryStatus = "delivered" | "partial" | "failed" | "skipped";

export type DeliveryReport = Readonly<{
  status: DeliveryStatus;
  outcomes: ReadonlyArray<DeliveryOutcome>;
}>;

async function attempt(
  destination: DeliveryDestination,
  message: DigestMessage,
  logger: Logger,
): Promise<DeliveryOutcome> {
  try {
    return {
      destination: destination.name,
      result: await destination.deliver(message, logger),
    };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    logger.error(
      { destination: destination.name, error },
      "destination threw during delivery",
    );
    return { destination: destination.name, result: { success: false, error } };
  }
}

/**
 * Sends the digest to every destination independently. One destination
 * failing never prevents the others from being attempted.
 * With no destinations the report is `failed`.
 */
export async function dispatchDigest(
  destinations: ReadonlyArray<DeliveryDestination>,
  message: DigestMessage,
  logger: Logger,
): Promise<DeliveryReport> {
  if (destinations.length === 0) {
    logger.error("no delivery destinations configured");
    return { status: "failed", outcomes: [] };
  }

  const outcomes = await Promise.all(
    destinations.map((destination) => attempt(destination, message, logger)),
  );

  const delivered = outcomes.filter((outcome) => outcome.result.success).length;
  const status: DeliveryStatus =
    delivered === outcomes.length ? "delivered" : delivered === 0 ? "failed" : "partial";

  logger.info({ status, destinations: outcomes.length, delivered }, "delivery complete");
  return { status, outcomes };
}
