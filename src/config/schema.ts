import { z } from "zod";

const seedFeedSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  pattern: z.string().min(1),
  enabled: z.boolean().default(true),
  checkIntervalMinutes: z.number().int().optional(),
});

export const appConfigSchema = z.object({
  transmission: z.object({
    url: z.string().url(),
    username: z.string().optional(),
    password: z.string().optional(),
    timeoutMs: z.number().int().positive().default(10_000),
  }),
  schedule: z
    .object({
      poll: z.string().min(1).default("*/15 * * * *"),
    })
    .default({}),
  polling: z
    .object({
      defaultCheckIntervalMinutes: z.number().int().positive().default(15),
      fetchTimeoutMs: z.number().int().positive().default(30_000),
      maxConcurrentFeeds: z.number().int().positive().default(1),
    })
    .default({}),
  feeds: z.array(seedFeedSchema).default([]),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type SeedFeedConfig = z.infer<typeof seedFeedSchema>;
