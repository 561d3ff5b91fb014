// Public API of the marketing plan engine.

export * from './types/index.js';

export {
  createPlanService,
  type GeneratePlanOptions,
  type PlanService,
  type PlanServiceDependencies,
  type SuggestFieldOptions,
} from './services/pipeline/service.js';
export { generateWithIterations, buildFeedback } from './services/pipeline/iteration.js';
export { runPipeline, type GenerationContext, type PipelineRunResult } from './services/pipeline/orchestrator.js';
export { aggregatePlan, EVALUATION_UNAVAILABLE } from './services/pipeline/aggregator.js';
export { invokeWithRetry, type RetryPolicyOptions, type StageResult } from './services/pipeline/retry-policy.js';
export {
  GenerationOptionsError,
  resolveGenerationOptions,
  type GenerationOptionsOverrides,
} from './services/pipeline/options.js';
export {
  ConcurrentRunConflictError,
  PipelineRunError,
  RunAbortedError,
  StageFailureError,
  type StageFailure,
  type StageFailureKind,
} from './services/pipeline/errors.js';

export { createLLMStageAdapter } from './services/stages/llm-adapter.js';
export { suggest } from './services/stages/field-suggestion.js';
export {
  validateEvaluationPayload,
  validateResearchPayload,
  validateStrategyPayload,
  validateSuggestion,
} from './services/stages/schemas.js';
export type {
  PayloadValidator,
  StageAdapter,
  StageInvokeOptions,
  StageOutcome,
  StageRequest,
  ValidationResult,
} from './services/stages/types.js';

export { createLLMClient, UsageTracker } from './services/ai/clients.js';
export { classifyLLMError } from './services/ai/errors.js';
export type { LLMClient, LLMClientConfig, UsageStats } from './services/ai/types.js';

export { BriefValidationError, parseBriefValues, parseProductBrief } from './services/brief/validation.js';
export { renderPlanMarkdown } from './services/plan/markdown.js';
export { PLAN_SECTIONS } from './services/plan/sections.js';
export { computeOverallScore } from './services/quality/scorecard.js';
