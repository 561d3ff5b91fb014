import { createLogger } from './logger.js';

const logger = createLogger('retry');

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_BACKOFF_OPTIONS: BackoffOptions = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Exponential backoff with up to 10% jitter, capped at `maxDelayMs`.
 * `retryIndex` is zero-based: the first retry waits roughly `baseDelayMs`.
 */
export function computeBackoffDelay(retryIndex: number, options: Partial<BackoffOptions> = {}): number {
  const opts = { ...DEFAULT_BACKOFF_OPTIONS, ...options };
  const baseDelay = opts.baseDelayMs * Math.pow(opts.backoffMultiplier, retryIndex);
  const jitter = Math.random() * baseDelay * 0.1;
  return Math.round(Math.min(baseDelay + jitter, opts.maxDelayMs));
}

export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/**
 * Resolves after `ms`, or rejects with AbortError as soon as `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message?: string) {
    super(message ?? `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export interface TimeoutOptions {
  timeoutMs: number;
  message?: string;
}

export async function withTimeout<T>(
  fn: () => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, message } = options;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(timeoutMs, message));
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = fn();
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }

    pending
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
}

export interface RateLimiter {
  /** Rejects with AbortError if `signal` fires while waiting for a slot. */
  acquire(signal?: AbortSignal): Promise<void>;
  reset(): void;
  readonly pending: number;
}

export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const { maxRequests, windowMs } = options;
  const timestamps: number[] = [];
  let pendingCount = 0;

  function cleanup(): void {
    const cutoff = Date.now() - windowMs;
    while (timestamps.length > 0 && timestamps[0] < cutoff) {
      timestamps.shift();
    }
  }

  async function acquire(signal?: AbortSignal): Promise<void> {
    pendingCount++;
    try {
      while (true) {
        if (signal?.aborted) throw new AbortError();
        cleanup();

        if (timestamps.length < maxRequests) {
          timestamps.push(Date.now());
          return;
        }

        // Wait until the oldest request leaves the window
        const waitTime = timestamps[0] + windowMs - Date.now() + 1;

        if (waitTime > 0) {
          logger.debug(`Rate limiter: waiting ${waitTime}ms`, {
            currentRequests: timestamps.length,
            maxRequests,
          });
          await sleep(waitTime, signal);
        }
      }
    } finally {
      pendingCount--;
    }
  }

  function reset(): void {
    timestamps.length = 0;
  }

  return {
    acquire,
    reset,
    get pending() {
      return pendingCount;
    },
  };
}

export interface ConcurrencyLimiter {
  /** A queued call whose `signal` fires leaves the queue and rejects with AbortError. */
  run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T>;
  readonly active: number;
  readonly queued: number;
}

/**
 * Caps how many async operations run at once. Waiters are served FIFO.
 */
export function createConcurrencyLimiter(maxConcurrent: number): ConcurrencyLimiter {
  if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
    throw new Error(`maxConcurrent must be a positive integer, got: ${maxConcurrent}`);
  }

  let activeCount = 0;
  const waiters: Array<() => void> = [];

  function release(): void {
    const next = waiters.shift();
    if (next) {
      // Hand the slot straight to the next waiter
      next();
    } else {
      activeCount--;
    }
  }

  async function acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new AbortError();
    if (activeCount < maxConcurrent) {
      activeCount++;
      return;
    }
    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = waiters.indexOf(grant);
        if (index !== -1) waiters.splice(index, 1);
        reject(new AbortError());
      };
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  async function run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  return {
    run,
    get active() {
      return activeCount;
    },
    get queued() {
      return waiters.length;
    },
  };
}
