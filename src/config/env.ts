import { z } from "zod";
import { formatIssues } from "./issues";

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const recipientsSchema = optionalString.pipe(
  z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((address) => address.trim())
        .filter((address) => address.length > 0),
    )
    .pipe(z.array(z.string().email()).min(1))
    .optional(),
);

const environmentSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  SLACK_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  EMAIL_FROM: optionalString,
  EMAIL_TO: recipientsSchema,
  MAILGUN_API_KEY: optionalString,
  MAILGUN_DOMAIN: optionalString,
});

export type AppEnvironment = z.infer<typeof environmentSchema>;

/**
 * Validates the process environment variables the service reads.
 * Blank values are treated as unset. `EMAIL_TO` is a comma-separated list.
 */
export function loadEnvironment(
  env: Readonly<Record<string, string | undefined>>,
): AppEnvironment {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`invalid environment:\n${formatIssues(result.error)}`);
  }
  return result.data;
}
