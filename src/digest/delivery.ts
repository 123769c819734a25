import type { Logger } from "pino";

/**
 * The digest in every form a destination may need.
 */
export type DigestMessage = Readonly<{
  subject: string;
  text: string;
  html: string;
}>;

/**
 * Discriminated union result of one delivery attempt.
 */
export type SendResult =
  | { readonly success: true; readonly messageId: string | null }
  | { readonly success: false; readonly error: string };

/**
 * A channel the digest is delivered to. `deliver` never throws; errors are
 * returned in the result.
 */
export type DeliveryDestination = {
  readonly name: string;
  readonly deliver: (message: DigestMessage, logger: Logger) => Promise<SendResult>;
};
