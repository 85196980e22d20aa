import { z } from 'zod';
import { validateFen } from 'chess.js';
import { ConfigError } from '../../shared/errors';
import { generateSessionSeed } from '../../shared/utils/rng';

const ProbabilitySchema = z.number().min(0).max(1);

export const SessionConfigSchema = z
  .object({
    mode: z.enum(['pve', 'pvp']).default('pve'),
    /** Colour the human plays in PvE; ignored in PvP. */
    humanColor: z.enum(['white', 'black']).default('white'),
    /** Attempts per turn before the turn is abandoned. */
    retryBudget: z.number().int().min(1).max(10).default(3),
    commentaryEnabled: z.boolean().default(false),
    /** Chance that a given move gets a commentary sentence. */
    commentaryProbability: ProbabilitySchema.default(1),
    /** Switch to typed input after a turn runs out of attempts. */
    manualEntryFallback: z.boolean().default(false),
    /** Chance the engine accepts a draw offer in PvE. */
    drawAcceptProbability: ProbabilitySchema.default(0.3),
    seed: z.number().int().nonnegative().optional(),
    maxCaptureMs: z.number().int().positive().default(10_000),
    silenceTimeoutMs: z.number().int().positive().default(1200),
    engineMovetimeMs: z.number().int().positive().default(1000),
    personaName: z.string().min(1).default('Magnus'),
    startFen: z.string().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.startFen !== undefined) {
      const check = validateFen(value.startFen);
      if (!check.ok) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['startFen'],
          message: check.error ?? 'Invalid FEN',
        });
      }
    }
    if (value.silenceTimeoutMs >= value.maxCaptureMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['silenceTimeoutMs'],
        message: 'silenceTimeoutMs must be shorter than maxCaptureMs',
      });
    }
  });

export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

export type SessionConfig = Readonly<
  Omit<z.output<typeof SessionConfigSchema>, 'seed'> & { seed: number }
>;

/**
 * Validates session options and freezes the result. A missing seed is drawn
 * once here so the whole session replays from the recorded value.
 */
export function createSessionConfig(input: SessionConfigInput = {}): SessionConfig {
  const parsed = SessionConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid session configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { issues }
    );
  }

  return Object.freeze({
    ...parsed.data,
    seed: parsed.data.seed ?? generateSessionSeed(),
  });
}
