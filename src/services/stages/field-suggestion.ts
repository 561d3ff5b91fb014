import { createLogger } from '../../utils/logger.js';
import type { BackoffOptions } from '../../utils/retry.js';
import { withLLMContext } from '../ai/call-context.js';
import { StageFailureError } from '../pipeline/errors.js';
import { invokeWithRetry } from '../pipeline/retry-policy.js';
import { validateSuggestion } from './schemas.js';
import type { ProductBrief } from '../../types/index.js';
import type { StageAdapter } from './types.js';

const logger = createLogger('stages:field-suggestion');

export interface SuggestOptions {
  retryCount: number;
  stageTimeoutSeconds: number;
  backoff?: Partial<BackoffOptions>;
  signal?: AbortSignal;
}

/**
 * Suggest a value for one brief field from the fields already filled in.
 * Runs outside any plan generation; a blank reply counts as invalid and is
 * re-prompted once.
 */
export async function suggest(
  adapter: StageAdapter,
  fieldName: string,
  values: Partial<ProductBrief>,
  options: SuggestOptions,
): Promise<string> {
  const field = fieldName.trim();
  if (!field) {
    throw new Error('fieldName must not be empty');
  }

  const result = await withLLMContext({ purpose: 'field-suggestion', stage: 'field_suggestion' }, () =>
    invokeWithRetry(adapter, { stage: 'field_suggestion', fieldName: field, values }, validateSuggestion, options),
  );

  if (!result.ok) {
    logger.warn('Field suggestion failed', { field, ...result.failure });
    throw new StageFailureError(result.failure);
  }

  logger.debug('Field suggestion ready', { field, length: result.value.length });
  return result.value;
}
