/**
 * Error handling and retry logic utilities
 */

import { logger } from './Logger';
import { TransportError } from './AnalysisErrors';

/**
 * Retry configuration
 */
export interface RetryConfig {
  maxAttempts: number;
  delayMs: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
}

/**
 * Execute function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
  context: string = 'operation'
): Promise<T> {
  const {
    maxAttempts,
    delayMs,
    backoffMultiplier = 2,
    shouldRetry = isRecoverableError,
    onRetry,
  } = config;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error)) {
        logger.debug(`${context} failed with a non-retryable error`, {
          error: parseErrorMessage(error),
        });
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(`${context} failed after ${maxAttempts} attempts`, {
          error: parseErrorMessage(error),
        });
        throw error;
      }

      const delay = delayMs * Math.pow(backoffMultiplier, attempt - 1);

      logger.warn(`${context} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`, {
        error: parseErrorMessage(error),
      });

      if (onRetry) {
        onRetry(attempt, error);
      }

      await sleep(delay);
    }
  }
}

/**
 * Reject with a TransportError when the promise does not settle in time
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  context: string,
  transport: string = 'unknown'
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransportError(`${context} timed out after ${timeoutMs}ms`, transport)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorProperty(error: unknown, key: 'code' | 'status' | 'message' | 'reason'): unknown {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  return Reflect.get(error, key);
}

function lowerMessage(error: unknown): string {
  return parseErrorMessage(error).toLowerCase();
}

/**
 * Check if error is a network error
 */
export function isNetworkError(error: unknown): boolean {
  const networkErrorCodes = [
    'ECONNREFUSED',
    'ENOTFOUND',
    'ETIMEDOUT',
    'ECONNRESET',
    'ECONNABORTED',
    'NETWORK_ERROR',
    'TIMEOUT',
  ];

  const code = errorProperty(error, 'code');
  const message = lowerMessage(error);

  return (
    (typeof code === 'string' && networkErrorCodes.includes(code)) ||
    message.includes('network') ||
    message.includes('timeout') ||
    message.includes('timed out')
  );
}

/**
 * Check if error is a rate limit error
 */
export function isRateLimitError(error: unknown): boolean {
  const message = lowerMessage(error);

  return (
    errorProperty(error, 'status') === 429 ||
    message.includes('status code 429') ||
    message.includes('rate limit') ||
    message.includes('too many requests')
  );
}

/**
 * Check if error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  return isNetworkError(error) || isRateLimitError(error);
}

/**
 * Parse error message from various error types
 */
export function parseErrorMessage(error: unknown): string {
  if (typeof error === 'string') return error;

  const message = errorProperty(error, 'message');
  if (typeof message === 'string' && message) return message;

  const reason = errorProperty(error, 'reason');
  if (typeof reason === 'string' && reason) return reason;

  return 'Unknown error';
}

/**
 * Token bucket rate limiter
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private maxTokens: number,
    private refillRate: number // tokens per second
  ) {
    if (maxTokens <= 0 || refillRate <= 0) {
      throw new Error('RateLimiter requires positive capacity and refill rate');
    }
    this.tokens = maxTokens;
    this.lastRefill = Date.now();
  }

  async acquire(cost: number = 1): Promise<void> {
    this.refill();

    while (this.tokens < cost) {
      const waitTime = ((cost - this.tokens) / this.refillRate) * 1000;
      await sleep(waitTime);
      this.refill();
    }

    this.tokens -= cost;
  }

  private refill(): void {
    const now = Date.now();
    const timePassed = (now - this.lastRefill) / 1000;
    const tokensToAdd = timePassed * this.refillRate;

    this.tokens = Math.min(this.maxTokens, this.tokens + tokensToAdd);
    this.lastRefill = now;
  }
}
