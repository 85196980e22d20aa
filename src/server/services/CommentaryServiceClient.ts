import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../config';
import { type CancellationToken } from '../../shared/utils/cancellation';
import { logger } from '../utils/logger';
import { CircuitBreaker } from './CircuitBreaker';
import { httpErrorSummary } from './httpErrors';
import { signalFromToken } from './requestSignal';

export const COMMENTATOR_SYSTEM_PROMPT =
  'You are a chess commentator. Given the current board position in a string representation, ' +
  'provide a very short comment of the game. Provide your response in exactly one sentence ' +
  'in the shortest possible way. Please provide your answer between <answer> and </answer> tags.';

export interface CommentaryRequest {
  fen: string;
  recentMoves: readonly string[];
  lastMove: string;
}

export interface CommentaryClient {
  /** One sentence, or null when the service produced nothing usable. */
  comment(request: CommentaryRequest, token?: CancellationToken): Promise<string | null>;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

const ANSWER_PATTERN = /<answer\s*>([\s\S]*?)<\/answer\s*>/gi;

/**
 * Pulls the sentence out of a reasoning model's reply. With a think block,
 * only answers after the last `</think>` count and the last one wins;
 * without one, the first answer is taken.
 */
export function extractCommentaryAnswer(text: string): string | null {
  const thinkEnds = [...text.matchAll(/<\/think\s*>/gi)];
  const lastThink = thinkEnds[thinkEnds.length - 1];

  let answer: string | undefined;
  if (lastThink?.index !== undefined) {
    const tail = text.slice(lastThink.index + lastThink[0].length);
    const answers = [...tail.matchAll(ANSWER_PATTERN)];
    answer = answers[answers.length - 1]?.[1];
  } else {
    answer = [...text.matchAll(ANSWER_PATTERN)][0]?.[1];
  }

  const trimmed = answer?.trim();
  return trimmed ? trimmed : null;
}

export function buildCommentaryPrompt(request: CommentaryRequest): string {
  const moves = request.recentMoves.length > 0 ? request.recentMoves.join(' ') : '(none)';
  return [
    `Board (FEN): ${request.fen}`,
    `Recent moves: ${moves}`,
    `Last move: ${request.lastMove}`,
  ].join('\n');
}

export interface CommentaryServiceClientOptions {
  url?: string;
  model?: string;
  apiKey?: string;
  timeoutMs?: number;
  maxTokens?: number;
  circuitBreaker?: CircuitBreaker;
}

/**
 * OpenAI-compatible chat-completions client for one-sentence commentary.
 * Never throws for service failures: commentary is optional.
 */
export class CommentaryServiceClient implements CommentaryClient {
  private readonly client: AxiosInstance;
  private readonly url: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(options: CommentaryServiceClientOptions = {}) {
    this.url = options.url ?? config.commentary.url;
    this.model = options.model ?? config.commentary.model;
    this.maxTokens = options.maxTokens ?? config.commentary.maxTokens;
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker({ name: 'commentary' });

    const apiKey = options.apiKey ?? config.commentary.apiKey;
    this.client = axios.create({
      timeout: options.timeoutMs ?? config.commentary.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(apiKey && { Authorization: `Bearer ${apiKey}` }),
      },
    });
  }

  async comment(request: CommentaryRequest, token?: CancellationToken): Promise<string | null> {
    if (token?.isCanceled) {
      return null;
    }

    const { signal, dispose } = signalFromToken(token);
    try {
      return await this.circuitBreaker.execute(async () => {
        const response = await this.client.post<unknown>(
          this.url,
          {
            model: this.model,
            messages: [
              { role: 'system', content: COMMENTATOR_SYSTEM_PROMPT },
              { role: 'user', content: buildCommentaryPrompt(request) },
            ],
            max_tokens: this.maxTokens,
            temperature: 0.2,
            top_p: 1.0,
          },
          { signal }
        );

        const parsed = ChatCompletionSchema.safeParse(response.data);
        const content = parsed.success ? parsed.data.choices[0].message.content : null;
        const answer = content ? extractCommentaryAnswer(content) : null;
        logger.debug('Commentary received', { answered: answer !== null });
        return answer;
      });
    } catch (error) {
      logger.debug('Commentary unavailable', httpErrorSummary(error));
      return null;
    } finally {
      dispose();
    }
  }

  getCircuitBreakerStatus(): { isOpen: boolean; failureCount: number } {
    return this.circuitBreaker.getStatus();
  }
}
