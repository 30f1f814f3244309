import cron from "node-cron";
import { z } from "zod";

const topicConfigSchema = z.object({
  name: z.string().min(1),
  queryTerms: z.array(z.string()).default([]),
  categories: z.array(z.string()).default([]),
});

export const appConfigSchema = z.object({
  arxiv: z
    .object({
      endpoint: z.string().url().default("http://export.arxiv.org/api/query"),
      userAgent: z
        .string()
        .min(1)
        .default("arxiv-digest/1.0 (contact: maintainer@example.com)"),
      requestTimeoutSeconds: z.number().positive().default(30),
      maxResultsPerTopic: z.number().int().positive().default(200),
      interQuerySleepSeconds: z.number().nonnegative().default(3.1),
    })
    .default({}),
  selection: z
    .object({
      lookbackHours: z.number().min(1).default(36),
      recentWindowDays: z.number().int().min(1).default(7),
      maxRecentItemsPerTopic: z.number().int().nonnegative().default(5),
      maxEducationalItemsPerTopic: z.number().int().nonnegative().default(1),
      randomSeed: z.number().int().optional(),
    })
    .default({}),
  ledger: z
    .object({
      driver: z.enum(["json", "sqlite"]).default("json"),
      path: z.string().min(1).default("state/ledger.json"),
      maxDeliveredIds: z.number().int().positive().default(20000),
    })
    .default({}),
  discord: z
    .object({
      maxContentLength: z.number().int().positive().default(2000),
      requestTimeoutSeconds: z.number().positive().default(30),
      titleMaxLength: z.number().int().positive().default(120),
      headerTemplate: z.string().min(1).default("arXiv Daily Digest ({date})"),
      skipEmptyDigest: z.boolean().default(false),
    })
    .default({}),
  report: z
    .object({
      timezone: z.string().min(1).default("Asia/Tokyo"),
    })
    .default({}),
  schedule: z
    .object({
      cron: z
        .string()
        .refine((expr) => cron.validate(expr), "invalid cron expression")
        .optional(),
    })
    .default({}),
  topics: z.array(topicConfigSchema).min(1, "at least one topic is required"),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type TopicConfig = z.infer<typeof topicConfigSchema>;
