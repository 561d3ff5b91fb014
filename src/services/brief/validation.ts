import { z } from 'zod';
import { isJsonObject } from '../../utils/json.js';
import {
  formatValidationIssues,
  toValidationIssues,
  type ValidationIssue,
} from '../../utils/validation.js';
import type { ProductBrief } from '../../types/index.js';

const MAX_FIELD_LENGTH = 10_000;

const text = z.string().trim().max(MAX_FIELD_LENGTH);

// Lists may arrive as arrays or as one comma-separated string.
const textList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (typeof value === 'string' ? value.split(',') : value))
  .transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0));

const briefFields = {
  productCategory: text.optional(),
  productFeatures: text.optional(),
  productUsp: text.optional(),
  productBranding: text.optional(),
  productVariants: text.optional(),
  targetPrimary: text.optional(),
  targetSecondary: text.optional(),
  targetDemographics: text.optional(),
  targetPsychographics: text.optional(),
  targetPersonas: text.optional(),
  targetProblems: text.optional(),
  marketSize: text.optional(),
  competitors: text.optional(),
  competitorPricing: text.optional(),
  competitorDistribution: text.optional(),
  marketBenchmarks: text.optional(),
  productionCost: text.optional(),
  desiredMargin: text.optional(),
  suggestedPrice: text.optional(),
  priceElasticity: text.optional(),
  marketingChannels: textList.optional(),
  historicalCampaigns: text.optional(),
  marketingBudget: text.optional(),
  toneOfVoice: text.optional(),
  distributionChannels: textList.optional(),
  logistics: text.optional(),
  seasonality: text.optional(),
  launchDate: text.optional(),
  seasonalFactors: text.optional(),
  campaignTimeline: text.optional(),
  salesGoals: text.optional(),
  marketShareGoals: text.optional(),
  brandAwarenessGoals: text.optional(),
  successMetrics: text.optional(),
};

export const ProductBriefSchema = z.object({
  briefId: z.string().trim().min(1, 'briefId is required').max(200),
  productName: z.string().trim().min(1, 'productName is required').max(500),
  ...briefFields,
});

export const BriefValuesSchema = z.object({
  briefId: z.string().trim().optional(),
  productName: text.optional(),
  ...briefFields,
});

export class BriefValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`Invalid product brief: ${formatValidationIssues(issues)}`);
    this.name = 'BriefValidationError';
    this.issues = issues;
  }
}

function camelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

/**
 * Accept snake_case keys (`product_name`) alongside camelCase ones. Null
 * values are dropped, as are blank strings. A camelCase key wins when both
 * spellings are present.
 */
export function normalizeBriefInput(input: unknown): unknown {
  if (!isJsonObject(input)) return input;

  const normalized: Record<string, unknown> = {};
  const entries = Object.entries(input).sort(([a], [b]) => Number(a.includes('_')) - Number(b.includes('_')));
  for (const [key, value] of entries) {
    if (value === null) continue;
    if (typeof value === 'string' && value.trim() === '') continue;
    const target = camelCase(key);
    if (!(target in normalized)) {
      normalized[target] = value;
    }
  }
  return normalized;
}

export interface ParseBriefOptions {
  /** Used when the input carries no briefId of its own. */
  defaultBriefId?: string;
}

export function parseProductBrief(input: unknown, options: ParseBriefOptions = {}): ProductBrief {
  const normalized = normalizeBriefInput(input);
  const withId = isJsonObject(normalized) && options.defaultBriefId && !('briefId' in normalized)
    ? { ...normalized, briefId: options.defaultBriefId }
    : normalized;

  const result = ProductBriefSchema.strip().safeParse(withId);
  if (!result.success) {
    throw new BriefValidationError(toValidationIssues(result.error));
  }
  return result.data;
}

/** Partial brief for the field assistant: every field optional. */
export function parseBriefValues(input: unknown): Partial<ProductBrief> {
  const result = BriefValuesSchema.strip().safeParse(normalizeBriefInput(input ?? {}));
  if (!result.success) {
    throw new BriefValidationError(toValidationIssues(result.error));
  }
  return result.data;
}
