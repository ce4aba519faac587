import { z } from 'zod';

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().nonnegative().default(500)
});

export const PipelineConfigSchema = z.object({
  inputDir: z.string().min(1),
  outputDir: z.string().min(1),
  destinationDir: z.string().min(1),
  maxLinesPerChunk: z.number().int().positive().default(20),
  concurrency: z.number().int().positive().default(1),
  model: z.string().min(1),
  speaker: z.string().min(1),
  language: z.string().min(1).optional(),
  retry: RetryConfigSchema.default({})
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
