// Composition root: the one place that turns environment configuration into
// wired services.

import { apiKeyForProvider, config, validateConfig } from './config.js';
import { createLLMClient } from './services/ai/clients.js';
import type { LLMClient } from './services/ai/types.js';
import { createPlanService, type PlanService } from './services/pipeline/service.js';
import { createLLMStageAdapter } from './services/stages/llm-adapter.js';
import type { GenerationOptions } from './types/index.js';

export interface Engine {
  client: LLMClient;
  service: PlanService;
}

export function defaultGenerationOptions(): GenerationOptions {
  return { ...config.generation };
}

export function createEngine(): Engine {
  validateConfig();

  const client = createLLMClient({
    provider: config.llm.provider,
    model: config.llm.model,
    apiKey: apiKeyForProvider(config.llm.provider),
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    maxConcurrentCalls: config.llm.maxConcurrentCalls,
    requestsPerMinute: config.llm.requestsPerMinute,
  });

  const service = createPlanService({
    adapter: createLLMStageAdapter(client),
    defaults: defaultGenerationOptions(),
    backoff: { ...config.backoff },
  });

  return { client, service };
}
