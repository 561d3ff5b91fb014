import 'dotenv/config';
import { createLogger } from './utils/logger.js';

const logger = createLogger('config');

function env(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function envInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer, got: ${value}`);
  }
  return parsed;
}

function envFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

function envBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') return defaultValue;
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw new Error(`Environment variable ${key} must be a boolean, got: ${value}`);
  }
}

export type LLMProvider = 'gemini' | 'claude';

function envProvider(key: string, defaultValue: LLMProvider): LLMProvider {
  const value = (process.env[key]?.trim() || defaultValue).toLowerCase();
  if (value === 'gemini' || value === 'claude') return value;
  throw new Error(`Environment variable ${key} must be "gemini" or "claude", got: ${value}`);
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  gemini: 'gemini-2.5-flash',
  claude: 'claude-sonnet-4-5',
};

const provider = envProvider('LLM_PROVIDER', 'gemini');

export const config = {
  apiKeys: {
    anthropic: env('ANTHROPIC_API_KEY', ''),
    googleAi: env('GOOGLE_AI_API_KEY', ''),
  },

  llm: {
    provider,
    model: env('LLM_MODEL', '') || DEFAULT_MODELS[provider],
    maxTokens: envInt('LLM_MAX_TOKENS', 8192),
    temperature: envFloat('LLM_TEMPERATURE', 0.7),
    maxConcurrentCalls: envInt('LLM_MAX_CONCURRENCY', 4),
    requestsPerMinute: envInt('LLM_REQUESTS_PER_MINUTE', 60),
  },

  generation: {
    autoIterate: envBool('AUTO_ITERATE', true),
    maxIterations: envInt('MAX_ITERATIONS', 3),
    qualityThreshold: envFloat('QUALITY_THRESHOLD', 7.0),
    retryCount: envInt('RETRY_COUNT', 2),
    stageTimeoutSeconds: envFloat('STAGE_TIMEOUT_SECONDS', 60),
  },

  backoff: {
    baseDelayMs: envInt('RETRY_BASE_DELAY_MS', 1000),
    maxDelayMs: envInt('RETRY_MAX_DELAY_MS', 30000),
    backoffMultiplier: 2,
  },
} as const;

export function apiKeyForProvider(llmProvider: LLMProvider): string {
  return llmProvider === 'claude' ? config.apiKeys.anthropic : config.apiKeys.googleAi;
}

export function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (!config.apiKeys.anthropic && config.llm.provider === 'claude') {
    errors.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER=claude');
  }
  if (!config.apiKeys.googleAi && config.llm.provider === 'gemini') {
    errors.push('GOOGLE_AI_API_KEY is required when LLM_PROVIDER=gemini');
  }

  if (config.llm.maxConcurrentCalls < 1) {
    errors.push('LLM_MAX_CONCURRENCY must be at least 1');
  }
  if (config.llm.requestsPerMinute < 1) {
    errors.push('LLM_REQUESTS_PER_MINUTE must be at least 1');
  }
  if (config.backoff.baseDelayMs > config.backoff.maxDelayMs) {
    warnings.push('RETRY_BASE_DELAY_MS exceeds RETRY_MAX_DELAY_MS; every retry waits the maximum');
  }
  if (config.generation.maxIterations > 5) {
    warnings.push(`MAX_ITERATIONS=${config.generation.maxIterations}; each iteration is a full pipeline run`);
  }

  for (const warning of warnings) {
    logger.warn(warning);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }
}
