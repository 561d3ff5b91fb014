import { createLogger } from '../../utils/logger.js';
import { extractJSON } from '../../utils/json.js';
import { withLLMContext } from '../ai/call-context.js';
import { classifyLLMError } from '../ai/errors.js';
import type { AIResponse, LLMClient } from '../ai/types.js';
import { buildStagePrompt } from './prompts.js';
import {
  permanentFailure,
  success,
  transientFailure,
  type StageAdapter,
  type StageInvokeOptions,
  type StageOutcome,
  type StageRequest,
} from './types.js';

const logger = createLogger('stages:llm');

// Finish reasons that mean the provider refused to answer; asking again gets the same.
const BLOCKED_FINISH_REASONS = new Set([
  'refusal',
  'SAFETY',
  'PROHIBITED_CONTENT',
  'BLOCKLIST',
  'SPII',
  'RECITATION',
]);

/**
 * Stage adapter backed by an LLM client. Transport errors become transient
 * or permanent failures; a reply that holds no JSON is passed on as
 * `{ rawContent }` so that validation rejects it and the retry policy can
 * re-prompt.
 */
export function createLLMStageAdapter(client: LLMClient): StageAdapter {
  async function invoke(request: StageRequest, options: StageInvokeOptions = {}): Promise<StageOutcome> {
    const stagePrompt = buildStagePrompt(request, options);

    let response: AIResponse;
    try {
      response = await withLLMContext(
        { purpose: `stage:${request.stage}`, stage: request.stage },
        () => client.generate(stagePrompt.prompt, {
          systemPrompt: stagePrompt.systemPrompt,
          temperature: stagePrompt.temperature,
          json: stagePrompt.json,
          signal: options.signal,
        }),
      );
    } catch (error) {
      const classification = classifyLLMError(error);
      logger.warn('Stage call failed', {
        stage: request.stage,
        attempt: options.attempt,
        kind: classification.kind,
        reason: classification.reason,
      });
      return classification.kind === 'transient'
        ? transientFailure(classification.reason)
        : permanentFailure(classification.reason);
    }

    if (response.finishReason && BLOCKED_FINISH_REASONS.has(response.finishReason)) {
      return permanentFailure(`Provider blocked the response (${response.finishReason})`);
    }

    if (request.stage === 'field_suggestion') {
      return success(response.text);
    }

    const parsed = extractJSON(response.text);
    if (parsed === undefined) {
      logger.warn('Stage response held no parseable JSON', {
        stage: request.stage,
        responseLength: response.text.length,
        finishReason: response.finishReason,
      });
      return success({ rawContent: response.text });
    }

    return success(parsed);
  }

  return { invoke };
}
