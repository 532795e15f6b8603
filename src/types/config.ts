/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const DocumentConfigSchema = z.object({
  input: z.string(), // Source catalogue
  output: z.string(), // Enriched catalogue (also the checkpoint target)
  indent: z.number().int().nonnegative(),
});

export const SourceConfigSchema = z.object({
  // Downloaded to document.input when that file is missing
  url: z.string().nullable(),
  timeout: z.number().int().positive(), // In milliseconds
});

export const TranslationConfigSchema = z.object({
  sourceLanguage: z.string(),
  targetLanguage: z.string(),
  serviceUrls: z.array(z.string()).min(1),
  timeout: z.number().int().positive(), // In milliseconds
  // Politeness pause after every request, picked uniformly in [min, max]
  delay: z.object({
    min: z.number().int().nonnegative(),
    max: z.number().int().nonnegative(),
  }),
  concurrency: z.number().int().positive(),
});

export const ImagesConfigSchema = z.object({
  directory: z.string(), // Relative to the output document's directory
  timeout: z.number().int().positive(), // In milliseconds
  maxSize: z.number().int().positive(), // In bytes (default: 10MB)
  concurrency: z.number().int().positive(),
  userAgent: z.string(),
});

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().nonnegative(),
  baseDelay: z.number().int().nonnegative(),
  maxDelay: z.number().int().nonnegative(),
});

export const CheckpointConfigSchema = z.object({
  interval: z.number().int().positive(),
});

export const StatsConfigSchema = z.object({
  export: z.boolean(),
  filename: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const EnrichConfigSchema = z.object({
  document: DocumentConfigSchema,
  source: SourceConfigSchema,
  translation: TranslationConfigSchema,
  images: ImagesConfigSchema,
  retry: RetryConfigSchema,
  checkpoint: CheckpointConfigSchema,
  stats: StatsConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialEnrichConfigSchema = z.object({
  document: DocumentConfigSchema.partial().optional(),
  source: SourceConfigSchema.partial().optional(),
  translation: TranslationConfigSchema.partial().optional(),
  images: ImagesConfigSchema.partial().optional(),
  retry: RetryConfigSchema.partial().optional(),
  checkpoint: CheckpointConfigSchema.partial().optional(),
  stats: StatsConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type DocumentConfig = z.infer<typeof DocumentConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type TranslationConfig = z.infer<typeof TranslationConfigSchema>;
export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type CheckpointConfig = z.infer<typeof CheckpointConfigSchema>;
export type StatsConfig = z.infer<typeof StatsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type EnrichConfig = z.infer<typeof EnrichConfigSchema>;
export type PartialEnrichConfig = z.infer<typeof PartialEnrichConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
