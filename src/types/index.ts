// Centralized type definitions for the marketing plan engine

import type { JsonValue } from '../utils/json.js';

export type { JsonValue, JsonObject } from '../utils/json.js';

// ---------------------------------------------------------------------------
// Brief
// ---------------------------------------------------------------------------

export interface ProductBrief {
  readonly briefId: string;
  readonly productName: string;
  // Product
  readonly productCategory?: string;
  readonly productFeatures?: string;
  readonly productUsp?: string;
  readonly productBranding?: string;
  readonly productVariants?: string;
  // Target audience
  readonly targetPrimary?: string;
  readonly targetSecondary?: string;
  readonly targetDemographics?: string;
  readonly targetPsychographics?: string;
  readonly targetPersonas?: string;
  readonly targetProblems?: string;
  // Market & competition
  readonly marketSize?: string;
  readonly competitors?: string;
  readonly competitorPricing?: string;
  readonly competitorDistribution?: string;
  readonly marketBenchmarks?: string;
  // Pricing
  readonly productionCost?: string;
  readonly desiredMargin?: string;
  readonly suggestedPrice?: string;
  readonly priceElasticity?: string;
  // Promotion
  readonly marketingChannels?: readonly string[];
  readonly historicalCampaigns?: string;
  readonly marketingBudget?: string;
  readonly toneOfVoice?: string;
  // Distribution
  readonly distributionChannels?: readonly string[];
  readonly logistics?: string;
  readonly seasonality?: string;
  // Timing
  readonly launchDate?: string;
  readonly seasonalFactors?: string;
  readonly campaignTimeline?: string;
  // Goals
  readonly salesGoals?: string;
  readonly marketShareGoals?: string;
  readonly brandAwarenessGoals?: string;
  readonly successMetrics?: string;
}

export type BriefField = Exclude<keyof ProductBrief, 'briefId'>;

// ---------------------------------------------------------------------------
// Stage payloads
// ---------------------------------------------------------------------------

export interface ResearchPayload {
  marketAnalysis: JsonValue;
  personas: JsonValue[];
  swotAnalysis: JsonValue;
}

export interface StrategyPayload {
  missionVisionValue: JsonValue;
  positioning: JsonValue;
  marketingGoals: JsonValue;
  marketingMix: JsonValue;
  actionPlan: JsonValue;
  budget: JsonValue;
  monitoring: JsonValue;
  risks: JsonValue;
  launchStrategy: JsonValue;
}

export const EVALUATION_CRITERIA = [
  'consistency',
  'quality',
  'originality',
  'feasibility',
  'completeness',
  'ethics',
] as const;

export type EvaluationCriterion = (typeof EVALUATION_CRITERIA)[number];

export type CriterionScores = Record<EvaluationCriterion, number>;

export interface EvaluationScorecard {
  criterionScores: CriterionScores;
  /** Mean of the six criterion scores, rounded to one decimal. */
  overallScore: number;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
}

// ---------------------------------------------------------------------------
// Plan
// ---------------------------------------------------------------------------

export type SectionId =
  | 'executive_summary'
  | 'mission_vision_value'
  | 'situation_market_analysis'
  | 'swot_analysis'
  | 'target_audience_positioning'
  | 'marketing_goals_kpis'
  | 'strategy_marketing_mix'
  | 'tactics_action_plan'
  | 'budget_resources'
  | 'monitoring_evaluation'
  | 'risks_mitigation'
  | 'launch_strategy';

export type SourceStage = 'research' | 'strategy' | 'aggregate';

export interface SectionDraft {
  id: SectionId;
  title: string;
  content: string;
  sourceStage: SourceStage;
  degraded: boolean;
}

export type PlanStatus = 'completed' | 'completed_degraded';

export type PipelineStage = 'research' | 'strategy' | 'evaluation';

export interface StageTimestamps {
  startedAt: string;
  completedAt?: string;
  attempts?: number;
}

export type IterationOutcome = 'scored' | 'unscored' | 'failed';

export interface IterationRecord {
  iteration: number;
  qualityScore: number | null;
  regeneratedSections: SectionId[];
  startedAt: string;
  completedAt: string;
  outcome: IterationOutcome;
}

export interface PlanMetadata {
  /** Number of pipeline runs performed for this request. */
  iterationCount: number;
  /** Iteration whose output this plan is. */
  selectedIteration: number;
  qualityScore: number | null;
  generatedAt: string;
  status: PlanStatus;
  degradedSections: SectionId[];
  stageTimestamps: Partial<Record<PipelineStage, StageTimestamps>>;
  iterations: IterationRecord[];
  version: string;
}

export interface MarketingPlan {
  briefId: string;
  productName: string;
  sections: SectionDraft[];
  evaluation: EvaluationScorecard | null;
  metadata: PlanMetadata;
}

// ---------------------------------------------------------------------------
// Generation options
// ---------------------------------------------------------------------------

export interface GenerationOptions {
  autoIterate: boolean;
  maxIterations: number;
  qualityThreshold: number;
  retryCount: number;
  stageTimeoutSeconds: number;
}

export interface IterationFeedback {
  fromIteration: number;
  previousScore: number;
  weaknesses: string[];
  recommendations: string[];
}

// ---------------------------------------------------------------------------
// Pipeline steps
// ---------------------------------------------------------------------------

export type PipelineState = 'research' | 'strategy' | 'evaluate' | 'aggregate' | 'done' | 'failed';

export interface PipelineStep {
  step: PipelineState;
  status: 'running' | 'complete' | 'failed';
  startedAt: string;
  completedAt?: string;
  attempts?: number;
  detail?: string;
}
