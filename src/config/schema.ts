import { z } from "zod";

const subscriptionSeedSchema = z.object({
  sourceId: z.string().min(1),
  title: z.string().min(1).optional(),
});

const retryPolicySchema = z.object({
  attempts: z.number().int().positive().default(3),
  minDelayMs: z.number().int().nonnegative().default(4000),
  maxDelayMs: z.number().int().nonnegative().default(10000),
});

export const appConfigSchema = z.object({
  feed: z
    .object({
      baseUrl: z.string().url().default("https://www.reddit.com"),
      userAgent: z.string().min(1).default("feed-mirror/0.1 (incremental sync)"),
      pacingDelayMs: z.number().int().nonnegative().default(100),
      requestTimeoutMs: z.number().int().positive().default(15000),
      defaultLimit: z.number().int().positive().default(100),
    })
    .default({}),
  subscriptions: z.array(subscriptionSeedSchema).default([]),
  media: z
    .object({
      directory: z.string().min(1).default("./media"),
      maxSizeBytes: z
        .number()
        .int()
        .positive()
        .default(50 * 1024 * 1024),
      maxConcurrentDownloads: z.number().int().positive().default(5),
      requestTimeoutMs: z.number().int().positive().default(30000),
      itemDeadlineMs: z.number().int().positive().default(120000),
      userAgent: z.string().min(1).default("feed-mirror/0.1 (media fetcher)"),
      retry: retryPolicySchema.default({}),
    })
    .default({}),
  sync: z
    .object({
      maxItemsPerRun: z.number().int().positive().optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type RetryPolicy = z.infer<typeof retryPolicySchema>;
