// Minimal structural checks for stage payloads. These confirm that the keys the
// next stage or the aggregator depend on are present and carry content; they
// do not judge the content itself.

import { z } from 'zod';
import { hasContent, isJsonObject, isJsonValue, type JsonValue } from '../../utils/json.js';
import { buildScorecard, clampScore } from '../quality/scorecard.js';
import type {
  EvaluationScorecard,
  ResearchPayload,
  StrategyPayload,
} from '../../types/index.js';
import type { PayloadValidator, StageName, ValidationResult } from './types.js';

const content = z.custom<JsonValue>(
  (value) => isJsonValue(value) && hasContent(value),
  'missing or empty',
);

const contentList = z.custom<JsonValue[]>(
  (value) => Array.isArray(value) && isJsonValue(value) && hasContent(value),
  'missing or empty list',
);

const score = z.preprocess(
  (value) => (isJsonObject(value) && 'score' in value ? value.score : value),
  z.union([
    z.number().finite(),
    z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number),
  ]),
).transform(clampScore);

function itemToText(item: unknown): string {
  if (typeof item === 'string') return item.trim();
  if (typeof item === 'number' || typeof item === 'boolean') return String(item);
  if (Array.isArray(item)) return item.map(itemToText).filter(Boolean).join(', ');
  if (isJsonObject(item)) return Object.values(item).map(itemToText).filter(Boolean).join(' - ');
  return '';
}

const textList = z
  .array(z.unknown())
  .transform((items) => items.map(itemToText).filter((text) => text.length > 0))
  .refine((items) => items.length > 0, 'missing or empty list');

export const ResearchPayloadSchema = z.object({
  marketAnalysis: content,
  personas: contentList,
  swotAnalysis: content,
});

export const StrategyPayloadSchema = z.object({
  missionVisionValue: content,
  positioning: content,
  marketingGoals: content,
  marketingMix: content,
  actionPlan: content,
  budget: content,
  monitoring: content,
  risks: content,
  launchStrategy: content,
});

export const EvaluationPayloadSchema = z.object({
  criterionScores: z.object({
    consistency: score,
    quality: score,
    originality: score,
    feasibility: score,
    completeness: score,
    ethics: score,
  }),
  strengths: textList,
  weaknesses: textList,
  recommendations: textList,
});

export const REQUIRED_KEYS: Record<Exclude<StageName, 'field_suggestion'>, readonly string[]> = {
  research: Object.keys(ResearchPayloadSchema.shape),
  strategy: Object.keys(StrategyPayloadSchema.shape),
  evaluation: Object.keys(EvaluationPayloadSchema.shape),
};

function validateWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  requiredKeys: readonly string[],
): PayloadValidator<T> {
  return (payload: unknown): ValidationResult<T> => {
    if (!isJsonObject(payload)) {
      return { valid: false, missingKeys: [...requiredKeys] };
    }

    const result = schema.safeParse(payload);
    if (result.success) {
      return { valid: true, value: result.data };
    }

    const missingKeys = new Set(result.error.issues.map((issue) => issue.path.join('.') || '(root)'));
    return { valid: false, missingKeys: [...missingKeys] };
  };
}

export const validateResearchPayload: PayloadValidator<ResearchPayload> =
  validateWith(ResearchPayloadSchema, REQUIRED_KEYS.research);

export const validateStrategyPayload: PayloadValidator<StrategyPayload> =
  validateWith(StrategyPayloadSchema, REQUIRED_KEYS.strategy);

const validateEvaluationShape = validateWith(EvaluationPayloadSchema, REQUIRED_KEYS.evaluation);

export const validateEvaluationPayload: PayloadValidator<EvaluationScorecard> = (payload) => {
  const result = validateEvaluationShape(payload);
  if (!result.valid) return result;
  return { valid: true, value: buildScorecard(result.value) };
};

export const validateSuggestion: PayloadValidator<string> = (payload) => {
  if (typeof payload === 'string' && payload.trim().length > 0) {
    return { valid: true, value: payload.trim() };
  }
  return { valid: false, missingKeys: ['suggestion'] };
};
