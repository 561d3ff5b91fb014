// Structured record of every LLM call, tagged with the active call context.
// Never throws.

import { createLogger, errorMessage } from '../../utils/logger.js';
import { llmCallContext } from './call-context.js';

const logger = createLogger('ai:calls');

export interface LogCallData {
  provider: string;
  model: string;
  promptLength: number;
  responseLength?: number;
  inputTokens?: number;
  outputTokens?: number;
  cachedTokens?: number;
  latencyMs?: number;
  success: boolean;
  errorMessage?: string;
  finishReason?: string;
}

export function logCall(data: LogCallData): void {
  try {
    const ctx = llmCallContext.getStore();
    const entry = {
      ...data,
      purpose: ctx?.purpose ?? 'unknown',
      briefId: ctx?.briefId,
      runId: ctx?.runId,
      iteration: ctx?.iteration,
      stage: ctx?.stage,
    };

    if (data.success) {
      logger.debug('LLM call', entry);
    } else {
      logger.warn('LLM call failed', entry);
    }
  } catch (err) {
    logger.warn('Failed to log LLM call', { model: data.model, error: errorMessage(err) });
  }
}
