import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenAI } from '@google/genai';
import { createLogger, errorMessage } from '../../utils/logger.js';
import { createConcurrencyLimiter, createRateLimiter } from '../../utils/retry.js';
import { logCall } from './call-logger.js';
import type {
  AIResponse,
  GenerateOptions,
  LLMClient,
  LLMClientConfig,
  ModelUsageStats,
  TokenUsage,
  UsageStats,
} from './types.js';

const logger = createLogger('ai-clients');

const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

// ---------------------------------------------------------------------------
// Usage tracker
// ---------------------------------------------------------------------------

function emptyStats(): UsageStats {
  return {
    totalInputTokens: 0,
    totalOutputTokens: 0,
    totalTokens: 0,
    totalCachedTokens: 0,
    requestCount: 0,
    errorCount: 0,
    totalLatencyMs: 0,
    avgLatencyMs: 0,
    byModel: {},
  };
}

function emptyModelStats(): ModelUsageStats {
  return {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
    requestCount: 0,
    errorCount: 0,
    totalLatencyMs: 0,
  };
}

export class UsageTracker {
  private stats: UsageStats = emptyStats();

  private modelStats(model: string): ModelUsageStats {
    const existing = this.stats.byModel[model];
    if (existing) return existing;
    const created = emptyModelStats();
    this.stats.byModel[model] = created;
    return created;
  }

  track(model: string, usage: TokenUsage, latencyMs: number): void {
    this.stats.totalInputTokens += usage.inputTokens;
    this.stats.totalOutputTokens += usage.outputTokens;
    this.stats.totalTokens += usage.totalTokens;
    this.stats.totalCachedTokens += usage.cachedTokens ?? 0;
    this.stats.requestCount++;
    this.stats.totalLatencyMs += latencyMs;
    this.stats.avgLatencyMs = Math.round(this.stats.totalLatencyMs / this.stats.requestCount);

    const modelStats = this.modelStats(model);
    modelStats.inputTokens += usage.inputTokens;
    modelStats.outputTokens += usage.outputTokens;
    modelStats.totalTokens += usage.totalTokens;
    modelStats.requestCount++;
    modelStats.totalLatencyMs += latencyMs;
  }

  trackError(model: string): void {
    this.stats.errorCount++;
    this.modelStats(model).errorCount++;
  }

  getStats(): UsageStats {
    const byModel: Record<string, ModelUsageStats> = {};
    for (const [model, stats] of Object.entries(this.stats.byModel)) {
      byModel[model] = { ...stats };
    }
    return { ...this.stats, byModel };
  }

  reset(): void {
    this.stats = emptyStats();
  }
}

// ---------------------------------------------------------------------------
// Provider calls
// ---------------------------------------------------------------------------

type ProviderCall = (prompt: string, options: GenerateOptions) => Promise<Omit<AIResponse, 'latencyMs'>>;

function claudeCall(clientConfig: LLMClientConfig): ProviderCall {
  // Retries belong to the stage retry policy; the SDK must not add its own.
  const client = new Anthropic({
    apiKey: clientConfig.apiKey,
    maxRetries: 0,
    timeout: clientConfig.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
  });

  return async (prompt, options) => {
    const response = await client.messages.create(
      {
        model: clientConfig.model,
        max_tokens: options.maxTokens ?? clientConfig.maxTokens,
        temperature: options.temperature ?? clientConfig.temperature,
        ...(options.systemPrompt ? { system: options.systemPrompt } : {}),
        messages: [{ role: 'user', content: prompt }],
      },
      { signal: options.signal },
    );

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      text,
      model: clientConfig.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        cachedTokens: response.usage.cache_read_input_tokens ?? 0,
      },
      finishReason: response.stop_reason ?? undefined,
    };
  };
}

function geminiCall(clientConfig: LLMClientConfig): ProviderCall {
  const client = new GoogleGenAI({ apiKey: clientConfig.apiKey });

  return async (prompt, options) => {
    const response = await client.models.generateContent({
      model: clientConfig.model,
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      config: {
        maxOutputTokens: options.maxTokens ?? clientConfig.maxTokens,
        temperature: options.temperature ?? clientConfig.temperature,
        ...(options.systemPrompt ? { systemInstruction: options.systemPrompt } : {}),
        ...(options.json ? { responseMimeType: 'application/json' } : {}),
        ...(options.signal ? { abortSignal: options.signal } : {}),
      },
    });

    const usageMeta = response.usageMetadata;
    return {
      text: response.text ?? '',
      model: clientConfig.model,
      usage: {
        inputTokens: usageMeta?.promptTokenCount ?? 0,
        outputTokens: usageMeta?.candidatesTokenCount ?? 0,
        totalTokens: usageMeta?.totalTokenCount ?? 0,
        cachedTokens: usageMeta?.cachedContentTokenCount ?? 0,
      },
      finishReason: response.candidates?.[0]?.finishReason ?? undefined,
    };
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/**
 * Build an LLM client for one provider and model. Calls share a request-rate
 * limiter and a concurrency ceiling across every run in the process.
 */
export function createLLMClient(clientConfig: LLMClientConfig): LLMClient {
  if (!clientConfig.apiKey) {
    throw new Error(`No API key configured for LLM provider "${clientConfig.provider}"`);
  }

  const call = clientConfig.provider === 'claude' ? claudeCall(clientConfig) : geminiCall(clientConfig);
  const rateLimiter = createRateLimiter({ maxRequests: clientConfig.requestsPerMinute, windowMs: 60_000 });
  const concurrency = createConcurrencyLimiter(clientConfig.maxConcurrentCalls);
  const usageTracker = new UsageTracker();
  const { provider, model } = clientConfig;

  async function generate(prompt: string, options: GenerateOptions = {}): Promise<AIResponse> {
    return concurrency.run(async () => {
      await rateLimiter.acquire(options.signal);

      logger.debug(`${provider} call`, { model, promptLength: prompt.length });
      const startTime = performance.now();

      try {
        const response = await call(prompt, options);
        const latencyMs = Math.round(performance.now() - startTime);

        usageTracker.track(model, response.usage, latencyMs);
        logCall({
          provider,
          model,
          promptLength: prompt.length,
          responseLength: response.text.length,
          inputTokens: response.usage.inputTokens,
          outputTokens: response.usage.outputTokens,
          cachedTokens: response.usage.cachedTokens,
          latencyMs,
          success: true,
          finishReason: response.finishReason,
        });

        return { ...response, latencyMs };
      } catch (error) {
        usageTracker.trackError(model);
        logCall({
          provider,
          model,
          promptLength: prompt.length,
          latencyMs: Math.round(performance.now() - startTime),
          success: false,
          errorMessage: errorMessage(error),
        });
        throw error;
      }
    }, options.signal);
  }

  return {
    provider,
    model,
    generate,
    getUsage: () => usageTracker.getStats(),
  };
}
