/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import * as dotenv from 'dotenv';
import type { PipelineConfigInput } from '../models/PipelineConfig';

// z.coerce.boolean() treats "false" as true
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true');

export const DEFAULT_TTS_MODEL = 'tts_models/en/vctk/vits';

export const envSchema = z.object({
  // ===== TTS Backend =====
  TTS_PROVIDER: z.enum(['coqui', 'docker']).default('coqui'),
  TTS_COQUI_URL: z.string().url().default('http://localhost:5002'),
  TTS_MODEL: z.string().min(1).default(DEFAULT_TTS_MODEL),
  TTS_SPEAKER: z.string().min(1).default('p230'), // VCTK speaker ID
  TTS_LANGUAGE: z.string().min(1).optional(),

  // Docker backend: container with the Coqui CLI and a shared output volume
  TTS_DOCKER_CONTAINER: z.string().min(1).default('coqui-tts'),
  TTS_DOCKER_OUTPUT_DIR: z.string().min(1).default('/output'),
  TTS_DOCKER_USE_CUDA: booleanFlag(true),

  // ===== Pipeline =====
  NARRATOR_WORK_DIR: z.string().min(1).default(path.join(os.homedir(), '.md-narrator')),
  MAX_LINES_PER_CHUNK: z.coerce.number().int().positive().default(20),
  CHUNK_CONCURRENCY: z.coerce.number().int().positive().default(1),
  AUDIO_TEMPO: z.coerce.number().min(0.5).max(2).default(0.78),
  SYNTHESIS_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  SYNTHESIS_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(500),

  // ===== External tools =====
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPLAY_PATH: z.string().min(1).default('ffplay'),
  DOCKER_PATH: z.string().min(1).default('docker'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
});

export type Env = z.infer<typeof envSchema>;

export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Environment validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Parse and validate environment variables
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}

/**
 * Load .env from the working directory, then parse
 */
export function loadEnv(): Env {
  dotenv.config();
  return parseEnv(process.env);
}

export function inputDir(env: Env): string {
  return path.join(env.NARRATOR_WORK_DIR, 'input');
}

export function outputDir(env: Env): string {
  return path.join(env.NARRATOR_WORK_DIR, 'output');
}

/**
 * Pipeline settings for one invocation. The final track goes to `cwd`.
 */
export function pipelineConfigFromEnv(env: Env, cwd: string = process.cwd()): PipelineConfigInput {
  return {
    inputDir: inputDir(env),
    outputDir: outputDir(env),
    destinationDir: cwd,
    maxLinesPerChunk: env.MAX_LINES_PER_CHUNK,
    concurrency: env.CHUNK_CONCURRENCY,
    model: env.TTS_MODEL,
    speaker: env.TTS_SPEAKER,
    language: env.TTS_LANGUAGE,
    retry: {
      maxAttempts: env.SYNTHESIS_MAX_ATTEMPTS,
      baseDelayMs: env.SYNTHESIS_RETRY_DELAY_MS
    }
  };
}
