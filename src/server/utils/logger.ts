/**
 * Application logger.
 *
 * Winston with JSON output in production and a single colourised line per
 * entry otherwise. Metadata passes through {@link maskSensitiveData} so API
 * keys and authorization values never reach a transport in clear.
 */

import winston from 'winston';
import { config } from '../config';

const SENSITIVE_KEY_PATTERN =
  /(password|secret|token|api[-_]?key|authorization|bearer|credential|private[-_]?key|access[-_]?key|cookie)/i;

const REDACTED = '[REDACTED]';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function maskValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string') {
    return value.length > 8 ? `${value.slice(0, 4)}...${REDACTED}` : REDACTED;
  }
  return REDACTED;
}

/**
 * Returns a copy of `data` with values under sensitive keys masked. Strings
 * longer than eight characters keep their first four for correlation.
 * Objects and arrays are walked up to `maxDepth` levels.
 */
export function maskSensitiveData(data: unknown, maxDepth = 8): unknown {
  if (maxDepth <= 0) {
    return data;
  }
  if (Array.isArray(data)) {
    return data.map((item) => maskSensitiveData(item, maxDepth - 1));
  }
  if (data instanceof Error) {
    return { name: data.name, message: data.message, ...(data.stack && { stack: data.stack }) };
  }
  if (!isRecord(data)) {
    return data;
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEY_PATTERN.test(key) && (typeof value !== 'object' || value === null)) {
      masked[key] = maskValue(value);
    } else {
      masked[key] = maskSensitiveData(value, maxDepth - 1);
    }
  }
  return masked;
}

const maskFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    const value = info[key];
    info[key] = SENSITIVE_KEY_PATTERN.test(key) ? maskValue(value) : maskSensitiveData(value);
  }
  return info;
});

const prettyFormat = winston.format.printf((info) => {
  const { timestamp, level, message, service: _service, ...meta } = info;
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}: ${String(message)}${rest}`;
});

export const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: { service: 'voice-chess' },
  format:
    config.logging.format === 'json'
      ? winston.format.combine(maskFormat(), winston.format.timestamp(), winston.format.json())
      : winston.format.combine(
          maskFormat(),
          winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
          winston.format.colorize(),
          prettyFormat
        ),
  transports: [
    new winston.transports.Console({
      // Keep stdout free for the board and prompts.
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});
