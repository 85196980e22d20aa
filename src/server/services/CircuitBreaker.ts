import { logger } from '../utils/logger';

export interface CircuitBreakerOptions {
  /** Consecutive failures before the breaker opens. */
  threshold?: number;
  /** Cooldown before an open breaker lets a call through again. */
  cooldownMs?: number;
  now?: () => number;
  name?: string;
}

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Circuit breaker is open - ${name} temporarily unavailable`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Circuit breaker to stop calling a service that keeps failing.
 */
export class CircuitBreaker {
  private failureCount = 0;
  private lastFailureTime = 0;
  private isOpen = false;
  private readonly threshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly name: string;

  constructor(options: CircuitBreakerOptions = {}) {
    this.threshold = options.threshold ?? 5;
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.now = options.now ?? Date.now;
    this.name = options.name ?? 'service';
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.isOpen) {
      if (this.now() - this.lastFailureTime > this.cooldownMs) {
        this.reset(); // half-open: let one call through
        logger.info('Circuit breaker transitioning from open to half-open', { name: this.name });
      } else {
        throw new CircuitOpenError(this.name);
      }
    }

    try {
      const result = await fn();
      this.reset();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    if (this.failureCount >= this.threshold && !this.isOpen) {
      this.isOpen = true;
      logger.warn('Circuit breaker opened after repeated failures', {
        name: this.name,
        failureCount: this.failureCount,
        threshold: this.threshold,
      });
    }
  }

  private reset(): void {
    if (this.failureCount > 0 || this.isOpen) {
      logger.info('Circuit breaker reset', {
        name: this.name,
        previousFailures: this.failureCount,
        wasOpen: this.isOpen,
      });
    }
    this.failureCount = 0;
    this.isOpen = false;
  }

  getStatus(): { isOpen: boolean; failureCount: number } {
    return { isOpen: this.isOpen, failureCount: this.failureCount };
  }
}
