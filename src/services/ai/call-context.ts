// AsyncLocalStorage-based context for tagging LLM calls with the run they
// belong to, without threading ids through every function signature.

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LLMCallContext {
  purpose: string;
  briefId?: string;
  runId?: string;
  iteration?: number;
  stage?: string;
}

export const llmCallContext = new AsyncLocalStorage<LLMCallContext>();

/**
 * Run `fn` with `ctx` merged over any context already active, so a stage
 * scope nested in a run scope keeps the run's ids.
 */
export function withLLMContext<T>(ctx: LLMCallContext, fn: () => Promise<T>): Promise<T> {
  const parent = llmCallContext.getStore();
  return llmCallContext.run({ ...parent, ...ctx }, fn);
}

export function getLLMContext(): LLMCallContext | undefined {
  return llmCallContext.getStore();
}
