/**
 * Typed, frozen view of the environment.
 *
 * Usage:
 *   import { config } from '../config';
 *   config.transcription.url
 */

import { ConfigError } from '../../shared/errors';
import { type LogFormat, type LogLevel, type NodeEnv, type RawEnv, isProduction, isTest, parseEnv } from './env';

export interface AppConfig {
  nodeEnv: NodeEnv;
  isProduction: boolean;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  transcription: {
    url: string;
    timeoutMs: number;
  };
  synthesis: {
    url: string;
    timeoutMs: number;
    voiceRefs: {
      engine: string;
      player: string;
      commentator: string;
    };
  };
  personaName: string;
  commentary: {
    url: string;
    model: string;
    apiKey: string | undefined;
    timeoutMs: number;
    maxTokens: number;
  };
  engine: {
    path: string;
    movetimeMs: number;
    skill: number;
  };
  capture: {
    maxDurationMs: number;
    silenceTimeoutMs: number;
    sampleRate: number;
    inputCommand: string | undefined;
    player: string | undefined;
  };
}

export function buildConfig(env: RawEnv): AppConfig {
  const production = isProduction(env.NODE_ENV);
  const test = isTest(env.NODE_ENV);
  const voice = env.SYNTHESIS_VOICE_REF;

  return {
    nodeEnv: env.NODE_ENV,
    isProduction: production,
    isTest: test,
    logging: {
      level: env.LOG_LEVEL ?? (production ? 'info' : test ? 'error' : 'debug'),
      format: env.LOG_FORMAT ?? (production ? 'json' : 'pretty'),
    },
    transcription: {
      url: env.TRANSCRIPTION_URL,
      timeoutMs: env.TRANSCRIPTION_TIMEOUT_MS,
    },
    synthesis: {
      url: env.SYNTHESIS_URL,
      timeoutMs: env.SYNTHESIS_TIMEOUT_MS,
      voiceRefs: {
        engine: voice,
        player: voice,
        commentator: env.COMMENTATOR_VOICE_REF ?? voice,
      },
    },
    personaName: env.PERSONA_NAME,
    commentary: {
      url: env.COMMENTARY_URL,
      model: env.COMMENTARY_MODEL,
      apiKey: env.COMMENTARY_API_KEY,
      timeoutMs: env.COMMENTARY_TIMEOUT_MS,
      maxTokens: env.COMMENTARY_MAX_TOKENS,
    },
    engine: {
      path: env.STOCKFISH_PATH,
      movetimeMs: env.ENGINE_MOVETIME_MS,
      skill: env.ENGINE_SKILL,
    },
    capture: {
      maxDurationMs: env.CAPTURE_MAX_DURATION_MS,
      silenceTimeoutMs: env.CAPTURE_SILENCE_TIMEOUT_MS,
      sampleRate: env.SAMPLE_RATE,
      inputCommand: env.AUDIO_INPUT_COMMAND,
      player: env.AUDIO_PLAYER,
    },
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object') {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Parses and freezes the configuration. Throws ConfigError listing every
 * invalid variable.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): Readonly<AppConfig> {
  const parsed = parseEnv(source);
  if (!parsed.success) {
    const summary = parsed.errors.map((error) => `${error.path}: ${error.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${summary}`, {
      errors: parsed.errors,
    });
  }
  return deepFreeze(buildConfig(parsed.env));
}

export const config: Readonly<AppConfig> = loadConfig();

export { EnvSchema, parseEnv } from './env';
export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
