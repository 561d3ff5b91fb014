import type { LLMProvider } from '../../config.js';

export type { LLMProvider } from '../../config.js';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  cachedTokens?: number;
}

export interface AIResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  finishReason?: string;
  latencyMs?: number;
}

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  /** Ask the provider for a JSON body where it supports a response MIME type. */
  json?: boolean;
  signal?: AbortSignal;
}

export interface ModelUsageStats {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  requestCount: number;
  errorCount: number;
  totalLatencyMs: number;
}

export interface UsageStats {
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  totalCachedTokens: number;
  requestCount: number;
  errorCount: number;
  totalLatencyMs: number;
  avgLatencyMs: number;
  byModel: Record<string, ModelUsageStats>;
}

export interface LLMClientConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  maxTokens: number;
  temperature: number;
  maxConcurrentCalls: number;
  requestsPerMinute: number;
  /** Transport-level timeout; the stage timeout in the retry policy is usually tighter. */
  requestTimeoutMs?: number;
}

export interface LLMClient {
  readonly provider: LLMProvider;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<AIResponse>;
  getUsage(): UsageStats;
}

export type LLMErrorKind = 'transient' | 'permanent';

export interface LLMErrorClassification {
  kind: LLMErrorKind;
  reason: string;
  status?: number;
}
