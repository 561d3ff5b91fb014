import { EVALUATION_CRITERIA, type ProductBrief } from '../../src/types/index.js';
import type { JsonObject } from '../../src/utils/json.js';
import type { GenerationOptions } from '../../src/types/index.js';
import type { ValidationResult } from '../../src/services/stages/types.js';

export const testBrief: ProductBrief = {
  briefId: 'brief-001',
  productName: 'EcoBottle',
  productCategory: 'Drinkware',
  productFeatures: 'Insulated steel bottle that keeps drinks cold for 24 hours',
  productUsp: 'Made from 90% recycled steel',
  targetPrimary: 'Urban commuters aged 25-40',
  competitors: 'HydroFlask, S\'well',
  marketingChannels: ['Instagram', 'TikTok'],
  marketingBudget: '50,000 EUR',
};

export function researchPayload(): JsonObject {
  return {
    marketAnalysis: {
      currentSituation: 'Reusable bottles are a crowded but growing category.',
      trends: ['Plastic bans', 'Refill stations'],
    },
    personas: [
      { name: 'Commuter Carla', profile: 'Office worker who cycles to work' },
    ],
    swotAnalysis: {
      strengths: ['Recycled materials'],
      weaknesses: ['Unknown brand'],
      opportunities: ['Corporate gifting'],
      threats: ['Cheap imports'],
    },
  };
}

export function strategyPayload(): JsonObject {
  return {
    missionVisionValue: { mission: 'Make reuse the default.', vision: 'No more single-use bottles.' },
    positioning: { statement: 'The bottle for people who care where their steel comes from.' },
    marketingGoals: { goals: ['10,000 units in year one'] },
    marketingMix: { product: 'Two sizes, five colours', price: '34 EUR' },
    actionPlan: [{ phase: 'Pre-launch', timing: 'Month 1', activities: ['Creator seeding'] }],
    budget: { total: '50,000 EUR' },
    monitoring: { metrics: ['Conversion rate'], reviewCadence: 'Monthly' },
    risks: [{ risk: 'Supply delays', mitigation: 'Second supplier' }],
    launchStrategy: { launch: ['Pop-up at central station'] },
  };
}

/** Evaluation payload whose six criteria all equal `score`, so the overall score is `score`. */
export function evaluationPayload(score: number, overrides: Partial<Record<'weaknesses' | 'recommendations', string[]>> = {}): JsonObject {
  const criterionScores: JsonObject = {};
  for (const criterion of EVALUATION_CRITERIA) {
    criterionScores[criterion] = score;
  }
  return {
    criterionScores,
    strengths: ['Clear positioning'],
    weaknesses: overrides.weaknesses ?? ['Budget lacks detail'],
    recommendations: overrides.recommendations ?? ['Break the budget down by channel'],
  };
}

export const fastOptions: GenerationOptions = {
  autoIterate: true,
  maxIterations: 3,
  qualityThreshold: 7,
  retryCount: 2,
  stageTimeoutSeconds: 5,
};

export const noBackoff = { baseDelayMs: 1, maxDelayMs: 1 };

/** Unwrap a validation result, failing the test when the payload is invalid. */
export function validated<T>(result: ValidationResult<T>): T {
  if (!result.valid) {
    throw new Error(`Fixture payload invalid, missing: ${result.missingKeys.join(', ')}`);
  }
  return result.value;
}
