export { createDigestRunner, resolveRunStatus } from "./orchestrator";
export type {
  DigestResult,
  DigestRunner,
  RunStage,
  RunStatus,
  TriggerOutcome,
  TriggerSource,
} from "./orchestrator";
export { formatDigestText } from "./formatter";
export { renderDigestHtml } from "./renderer";
export { buildSubject, toDigestContent } from "./content";
export type { DigestContent, DigestEntry } from "./content";
export { dispatchDigest } from "./dispatcher";
export type { DeliveryReport, DeliveryOutcome } from "./dispatcher";
export { buildDestinations } from "./destinations";
export { createWebhookSender } from "./webhook";
export { createMailgunSender } from "./sender";
export type { DeliveryDestination, DigestMessage, SendResult } from "./delivery";
