import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createLLMStageAdapter } from '../../../src/services/stages/llm-adapter.js';
import { getLLMContext } from '../../../src/services/ai/call-context.js';
import type { AIResponse, GenerateOptions, LLMClient } from '../../../src/services/ai/types.js';
import { testBrief } from '../../helpers/fixtures.js';

function response(text: string, finishReason?: string): AIResponse {
  return {
    text,
    model: 'test-model',
    usage: { inputTokens: 10, outputTokens: 20, totalTokens: 30 },
    finishReason,
  };
}

const generate = vi.fn<(prompt: string, options?: GenerateOptions) => Promise<AIResponse>>();

const client: LLMClient = {
  provider: 'gemini',
  model: 'test-model',
  generate,
  getUsage: vi.fn(),
};

const adapter = createLLMStageAdapter(client);

describe('createLLMStageAdapter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('parses fenced JSON into the payload', async () => {
    generate.mockResolvedValue(response('```json\n{"marketAnalysis": "Growing"}\n```'));

    const outcome = await adapter.invoke({ stage: 'research', brief: testBrief });

    expect(outcome).toEqual({ kind: 'success', payload: { marketAnalysis: 'Growing' } });
  });

  it('passes the system prompt, temperature and JSON mode to the client', async () => {
    generate.mockResolvedValue(response('{}'));

    await adapter.invoke({ stage: 'research', brief: testBrief });

    const options = generate.mock.calls[0][1];
    expect(options?.json).toBe(true);
    expect(options?.temperature).toBe(0.7);
    expect(options?.systemPrompt).toContain('market research analyst');
  });

  it('wraps an unparseable reply as raw content so validation rejects it', async () => {
    generate.mockResolvedValue(response('Sorry, I cannot help with that plan.'));

    const outcome = await adapter.invoke({ stage: 'research', brief: testBrief });

    expect(outcome).toEqual({
      kind: 'success',
      payload: { rawContent: 'Sorry, I cannot help with that plan.' },
    });
  });

  it('returns field suggestions as plain text', async () => {
    generate.mockResolvedValue(response('Drinkware'));

    const outcome = await adapter.invoke({ stage: 'field_suggestion', fieldName: 'productCategory', values: {} });

    expect(outcome).toEqual({ kind: 'success', payload: 'Drinkware' });
  });

  it('names missing keys in the re-prompt', async () => {
    generate.mockResolvedValue(response('{}'));

    await adapter.invoke({ stage: 'research', brief: testBrief }, { missingKeys: ['personas', 'swotAnalysis'] });

    expect(generate.mock.calls[0][0]).toContain('missing or left empty these keys: personas, swotAnalysis.');
  });

  it('maps a rate limit to a transient failure', async () => {
    generate.mockRejectedValue(Object.assign(new Error('Too many requests'), { status: 429 }));

    const outcome = await adapter.invoke({ stage: 'research', brief: testBrief });

    expect(outcome).toEqual({ kind: 'transient_failure', reason: 'HTTP 429: Too many requests' });
  });

  it('maps an auth error to a permanent failure', async () => {
    generate.mockRejectedValue(Object.assign(new Error('invalid x-api-key'), { status: 401 }));

    const outcome = await adapter.invoke({ stage: 'research', brief: testBrief });

    expect(outcome).toEqual({ kind: 'permanent_failure', reason: 'HTTP 401: invalid x-api-key' });
  });

  it('treats a blocked response as permanent', async () => {
    generate.mockResolvedValue(response('', 'SAFETY'));

    const outcome = await adapter.invoke({ stage: 'research', brief: testBrief });

    expect(outcome).toEqual({ kind: 'permanent_failure', reason: 'Provider blocked the response (SAFETY)' });
  });

  it('tags the call with the stage in the LLM context', async () => {
    let stage: string | undefined;
    generate.mockImplementation(async () => {
      stage = getLLMContext()?.stage;
      return response('{}');
    });

    await adapter.invoke({ stage: 'research', brief: testBrief });

    expect(stage).toBe('research');
  });
});
