/**
 * Environment Variable Validation
 *
 * Every variable the voice pipeline reads is declared here with its default.
 * Parsing happens once, in ./index.ts; the rest of the code reads the typed
 * `config` object instead of process.env.
 */

import { z } from 'zod';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const PositiveIntSchema = z.coerce.number().int().positive();

/**
 * Optional string that treats an empty value as unset, so `FOO=` in a shell
 * falls back to the default.
 */
const OptionalStringSchema = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const EnvSchema = z.object({
  NODE_ENV: NodeEnvSchema.default('development'),

  LOG_LEVEL: LogLevelSchema.optional(),
  LOG_FORMAT: LogFormatSchema.optional(),

  // Transcription service (multipart WAV upload)
  TRANSCRIPTION_URL: z.string().url().default('http://localhost:8080/transcribe'),
  TRANSCRIPTION_TIMEOUT_MS: PositiveIntSchema.default(60_000),

  // Speech synthesis service (POST {url}/generate)
  SYNTHESIS_URL: z.string().url().default('http://localhost:8000'),
  SYNTHESIS_TIMEOUT_MS: PositiveIntSchema.default(120_000),
  SYNTHESIS_VOICE_REF: z.string().min(1).default('magnus'),
  COMMENTATOR_VOICE_REF: OptionalStringSchema,
  PERSONA_NAME: z.string().min(1).default('Magnus'),

  // Commentary (OpenAI-compatible chat completions)
  COMMENTARY_URL: z.string().url().default('http://localhost:8000/v1/chat/completions'),
  COMMENTARY_MODEL: z.string().min(1).default('qwen3-30b-a3b-thinking-fp8'),
  COMMENTARY_API_KEY: OptionalStringSchema,
  COMMENTARY_TIMEOUT_MS: PositiveIntSchema.default(15_000),
  COMMENTARY_MAX_TOKENS: PositiveIntSchema.default(2048),

  // UCI engine
  STOCKFISH_PATH: z.string().min(1).default('./stockfish/stockfish'),
  ENGINE_MOVETIME_MS: PositiveIntSchema.default(1000),
  ENGINE_SKILL: z.coerce.number().int().min(0).max(20).default(15),

  // Capture
  CAPTURE_MAX_DURATION_MS: PositiveIntSchema.default(10_000),
  CAPTURE_SILENCE_TIMEOUT_MS: PositiveIntSchema.default(1200),
  SAMPLE_RATE: PositiveIntSchema.default(16_000),
  AUDIO_INPUT_COMMAND: OptionalStringSchema,
  AUDIO_PLAYER: OptionalStringSchema,
});

export type RawEnv = z.infer<typeof EnvSchema>;

export type EnvValidationResult =
  | { success: true; env: RawEnv }
  | { success: false; errors: Array<{ path: string; message: string }> };

export function parseEnv(source: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(source);
  if (result.success) {
    return { success: true, env: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
