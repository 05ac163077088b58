import { z } from "zod";
import { CATEGORIES, CategorySchema } from "./artifact.js";

// ─── Stage Config ───────────────────────────────────────────────────────────

const CountRangeSchema = z
  .tuple([z.number().int().min(0), z.number().int().positive()])
  .refine(([min, max]) => min <= max, {
    message: "range minimum must not exceed its maximum",
  });

export type CountRange = z.infer<typeof CountRangeSchema>;

export const StageConfigSchema = z.object({
  maxRetriesPerStage: z.number().int().min(0).default(2),
  subheadingCountRange: CountRangeSchema.default([2, 5]),
  tagCountRange: CountRangeSchema.default([2, 5]),
  perStageTimeoutMs: z.number().int().positive().default(120_000),
  retryBackoffMs: z.number().int().min(0).default(1_000),
  categories: z.array(CategorySchema).min(1).default([...CATEGORIES]),
  researchConcurrency: z.number().int().positive().default(3),
  maxSearchResults: z.number().int().positive().max(20).default(5),
  imageDimensions: z
    .object({
      width: z.number().int().min(256).max(2048).default(1024),
      height: z.number().int().min(256).max(2048).default(1024),
    })
    .default({}),
});

export type StageConfig = z.infer<typeof StageConfigSchema>;
export type StageConfigInput = z.input<typeof StageConfigSchema>;

export function resolveStageConfig(input: StageConfigInput = {}): StageConfig {
  return StageConfigSchema.parse(input);
}

// ─── App Config ─────────────────────────────────────────────────────────────

export const LlmProviderSchema = z.enum(["auto", "anthropic", "openrouter"]);

export type LlmProvider = z.infer<typeof LlmProviderSchema>;

export const AppConfigSchema = z.object({
  paths: z
    .object({
      inboxDir: z.string().default("./inbox"),
      outputDir: z.string().default("./output"),
      imagesDir: z.string().default("./images"),
      templatesDir: z.string().default("./templates"),
    })
    .default({}),
  pipeline: StageConfigSchema.default({}),
  llm: z
    .object({
      provider: LlmProviderSchema.default("auto"),
      model: z.string().optional(),
      temperature: z.number().min(0).max(2).default(0.7),
      maxTokens: z.number().int().positive().max(8192).default(4000),
      requestsPerMinute: z.number().int().positive().default(60),
    })
    .default({}),
  search: z
    .object({
      endpoint: z
        .string()
        .url()
        .default("https://api.search.brave.com/res/v1/web/search"),
      country: z.string().default("us"),
      safesearch: z.enum(["off", "moderate", "strict"]).default("moderate"),
    })
    .default({}),
  image: z
    .object({
      model: z
        .string()
        .default(
          "stability-ai/sdxl:39ed52f2a78e934b3ba6e2a89f5b1c712de7dfea535525255b1aa35c5565e08b"
        ),
      pollIntervalMs: z.number().int().positive().default(2_000),
      maxWaitMs: z.number().int().positive().default(300_000),
    })
    .default({}),
  cache: z
    .object({
      backend: z.enum(["memory", "redis"]).default("memory"),
      ttlSeconds: z.number().int().positive().optional(),
    })
    .default({}),
  batch: z
    .object({
      concurrency: z.number().int().positive().default(1),
    })
    .default({}),
  output: z
    .object({
      draft: z.boolean().default(true),
      overwrite: z.boolean().default(false),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
