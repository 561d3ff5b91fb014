import type {
  IterationFeedback,
  ProductBrief,
  ResearchPayload,
  StrategyPayload,
} from '../../types/index.js';

// ---------------------------------------------------------------------------
// Requests: a closed set of stage variants
// ---------------------------------------------------------------------------

export interface ResearchRequest {
  stage: 'research';
  brief: ProductBrief;
  feedback?: IterationFeedback;
}

export interface StrategyRequest {
  stage: 'strategy';
  brief: ProductBrief;
  research: ResearchPayload;
  feedback?: IterationFeedback;
}

export interface EvaluationRequest {
  stage: 'evaluation';
  brief: ProductBrief;
  research: ResearchPayload;
  strategy: StrategyPayload;
}

export interface FieldSuggestionRequest {
  stage: 'field_suggestion';
  fieldName: string;
  values: Partial<ProductBrief>;
}

export type StageRequest = ResearchRequest | StrategyRequest | EvaluationRequest | FieldSuggestionRequest;

export type StageName = StageRequest['stage'];

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type StageOutcome =
  | { kind: 'success'; payload: unknown }
  | { kind: 'transient_failure'; reason: string }
  | { kind: 'permanent_failure'; reason: string };

export const success = (payload: unknown): StageOutcome => ({ kind: 'success', payload });
export const transientFailure = (reason: string): StageOutcome => ({ kind: 'transient_failure', reason });
export const permanentFailure = (reason: string): StageOutcome => ({ kind: 'permanent_failure', reason });

export interface StageInvokeOptions {
  /**
   * Keys the previous response lacked. When set, the adapter must tell the
   * stage explicitly which keys to return.
   */
  missingKeys?: string[];
  attempt?: number;
  signal?: AbortSignal;
}

/**
 * Uniform contract for every generation capability. Implementations must be
 * free of side effects for a given request, so that the caller can retry.
 */
export interface StageAdapter {
  invoke(request: StageRequest, options?: StageInvokeOptions): Promise<StageOutcome>;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; missingKeys: string[] };

export type PayloadValidator<T> = (payload: unknown) => ValidationResult<T>;
