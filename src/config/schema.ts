import { z } from "zod";

const mailingListConfigSchema = z.object({
  name: z.string().min(1),
  archiveUrl: z.string().url(),
});

const redditConfigSchema = z.object({
  subreddit: z.string().min(1),
  listing: z.enum(["top", "hot", "new"]).default("top"),
  timeFilter: z
    .enum(["hour", "day", "week", "month", "year", "all"])
    .default("day"),
  limit: z.number().int().positive().max(100).default(10),
});

const feedConfigSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  enabled: z.boolean().default(true),
});

export const appConfigSchema = z
  .object({
    telegram: z.object({
      chatId: z.union([z.string().min(1), z.number().int()]),
    }),
    mailingList: mailingListConfigSchema.optional(),
    reddit: redditConfigSchema.optional(),
    feeds: z.array(feedConfigSchema).default([]),
    email: z
      .object({
        recipient: z.string().email(),
      })
      .optional(),
    schedule: z
      .object({
        mail: z.string().min(1).default("*/15 * * * *"),
        reddit: z.string().min(1).default("0 9 * * *"),
        feeds: z.string().min(1).default("0 * * * *"),
      })
      .default({}),
    polling: z
      .object({
        maxConcurrency: z.number().int().positive().default(2),
        timeoutMs: z.number().int().positive().default(15000),
      })
      .default({}),
  })
  .refine(
    (config) =>
      config.mailingList !== undefined ||
      config.reddit !== undefined ||
      config.feeds.length > 0,
    {
      message: "at least one of mailingList, reddit or feeds must be configured",
      path: ["feeds"],
    },
  );

export type AppConfig = z.infer<typeof appConfigSchema>;
export type MailingListConfig = z.infer<typeof mailingListConfigSchema>;
export type RedditConfig = z.infer<typeof redditConfigSchema>;
export type FeedConfig = z.infer<typeof feedConfigSchema>;
