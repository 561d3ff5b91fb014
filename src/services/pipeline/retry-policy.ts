// Bounded retries around a single stage invocation. This is the only place in
// the engine where a stage call is repeated.

import { createLogger } from '../../utils/logger.js';
import {
  AbortError,
  computeBackoffDelay,
  sleep,
  TimeoutError,
  withTimeout,
  type BackoffOptions,
} from '../../utils/retry.js';
import { classifyLLMError } from '../ai/errors.js';
import {
  permanentFailure,
  transientFailure,
  type PayloadValidator,
  type StageAdapter,
  type StageOutcome,
  type StageRequest,
} from '../stages/types.js';
import { RunAbortedError, type StageFailure, type StageFailureKind } from './errors.js';

const logger = createLogger('pipeline:retry');

export interface RetryPolicyOptions {
  /** Extra attempts after a transient failure. */
  retryCount: number;
  stageTimeoutSeconds: number;
  backoff?: Partial<BackoffOptions>;
  signal?: AbortSignal;
}

export type StageResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; failure: StageFailure };

function throwIfAborted(signal: AbortSignal | undefined, request: StageRequest): void {
  if (signal?.aborted) {
    throw new RunAbortedError(request.stage);
  }
}

async function invokeOnce(
  adapter: StageAdapter,
  request: StageRequest,
  missingKeys: string[] | undefined,
  attempt: number,
  options: RetryPolicyOptions,
): Promise<StageOutcome> {
  const timeoutMs = Math.round(options.stageTimeoutSeconds * 1000);
  const attemptController = new AbortController();
  const abortAttempt = () => attemptController.abort();
  options.signal?.addEventListener('abort', abortAttempt, { once: true });

  try {
    return await withTimeout(
      () => adapter.invoke(request, { missingKeys, attempt, signal: attemptController.signal }),
      { timeoutMs, message: `${request.stage} stage timed out after ${options.stageTimeoutSeconds}s` },
    );
  } catch (error) {
    if (error instanceof TimeoutError) {
      attemptController.abort();
    }
    throwIfAborted(options.signal, request);
    const classification = classifyLLMError(error);
    return classification.kind === 'transient'
      ? transientFailure(classification.reason)
      : permanentFailure(classification.reason);
  } finally {
    options.signal?.removeEventListener('abort', abortAttempt);
  }
}

/**
 * Invoke a stage and validate its payload.
 *
 * - transient failure: up to `retryCount` more attempts with exponential backoff
 * - invalid payload: one immediate re-prompt naming the missing keys
 * - permanent failure: returned at once
 *
 * Throws RunAbortedError when the signal fires; a result that lands after the
 * abort is discarded.
 */
export async function invokeWithRetry<T>(
  adapter: StageAdapter,
  request: StageRequest,
  validate: PayloadValidator<T>,
  options: RetryPolicyOptions,
): Promise<StageResult<T>> {
  const log = logger.withData({ stage: request.stage });
  let attempts = 0;
  let transientRetries = 0;
  let reprompted = false;
  let missingKeys: string[] | undefined;

  const fail = (kind: StageFailureKind, reason: string, keys: string[] = []): StageResult<T> => ({
    ok: false,
    failure: { stage: request.stage, kind, reason, missingKeys: keys, attempts },
  });

  while (true) {
    throwIfAborted(options.signal, request);
    attempts++;

    const outcome = await invokeOnce(adapter, request, missingKeys, attempts, options);
    throwIfAborted(options.signal, request);

    switch (outcome.kind) {
      case 'success': {
        const validation = validate(outcome.payload);
        if (validation.valid) {
          if (attempts > 1) {
            log.info('Stage succeeded after retry', { attempts });
          }
          return { ok: true, value: validation.value, attempts };
        }

        if (!reprompted) {
          reprompted = true;
          missingKeys = validation.missingKeys;
          log.warn('Stage payload failed validation, re-prompting', { missingKeys });
          continue;
        }

        return fail(
          'schema_invalid',
          `Payload missing or empty: ${validation.missingKeys.join(', ')}`,
          validation.missingKeys,
        );
      }

      case 'transient_failure': {
        if (transientRetries >= options.retryCount) {
          log.warn('Stage retries exhausted', { attempts, reason: outcome.reason });
          return fail('transient', outcome.reason, missingKeys);
        }

        const delayMs = computeBackoffDelay(transientRetries, options.backoff);
        transientRetries++;
        log.warn(`Transient failure, retrying in ${delayMs}ms`, {
          attempt: attempts,
          retry: transientRetries,
          retryCount: options.retryCount,
          reason: outcome.reason,
        });

        try {
          await sleep(delayMs, options.signal);
        } catch (error) {
          if (error instanceof AbortError) {
            throw new RunAbortedError(request.stage);
          }
          throw error;
        }
        continue;
      }

      case 'permanent_failure':
        log.warn('Stage failed permanently', { attempts, reason: outcome.reason });
        return fail('permanent', outcome.reason, missingKeys);
    }
  }
}
