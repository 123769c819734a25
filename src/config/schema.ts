import { z } from "zod";

const feedSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
});

function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const timeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected a time of day as HH:MM");

export const appConfigSchema = z.object({
  llm: z.object({
    provider: z.enum(["anthropic", "openai", "gemini", "ollama", "lmstudio"]),
    model: z.string().min(1),
  }),
  feeds: z
    .array(feedSourceSchema)
    .min(1)
    .refine(
      (feeds) => new Set(feeds.map((feed) => feed.name)).size === feeds.length,
      "feed names must be unique",
    ),
  schedule: z
    .object({
      time: timeOfDaySchema.default("08:00"),
      timezone: z
        .string()
        .min(1)
        .refine(isTimeZone, "expected an IANA time zone such as Europe/Berlin")
        .optional(),
    })
    .default({}),
  selection: z
    .object({
      lookbackHours: z.number().positive().default(24),
      maxArticles: z.number().int().positive().default(12),
      maxPerFeed: z.number().int().positive().optional(),
    })
    .default({}),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(10000),
      maxItemsPerFeed: z.number().int().positive().optional(),
    })
    .default({}),
  summarizer: z
    .object({
      maxInputChars: z.number().int().positive().default(4000),
      maxSummaryChars: z.number().int().positive().default(1200),
      maxRetries: z.number().int().min(0).max(2).default(1),
      timeoutMs: z.number().int().positive().default(30000),
      maxConcurrency: z.number().int().positive().default(2),
    })
    .default({}),
  delivery: z
    .object({
      timeoutMs: z.number().int().positive().default(10000),
      sendEmptyDigest: z.boolean().default(true),
    })
    .default({}),
  digest: z
    .object({
      title: z.string().min(1).default("Daily Digest"),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type FeedSource = AppConfig["feeds"][number];
