// Plan Service: admits at most one generation run per brief and exposes the
// engine's two operations.

import { createLogger, errorMessage } from '../../utils/logger.js';
import type { BackoffOptions } from '../../utils/retry.js';
import { suggest as suggestField } from '../stages/field-suggestion.js';
import type { StageAdapter } from '../stages/types.js';
import { ConcurrentRunConflictError } from './errors.js';
import { generateWithIterations } from './iteration.js';
import { resolveGenerationOptions } from './options.js';
import type {
  GenerationOptions,
  IterationRecord,
  MarketingPlan,
  ProductBrief,
} from '../../types/index.js';

const logger = createLogger('pipeline:service');

export interface PlanServiceDependencies {
  adapter: StageAdapter;
  /** Process-wide defaults; per-request overrides are layered on top. */
  defaults: GenerationOptions;
  backoff?: Partial<BackoffOptions>;
  now?: () => Date;
}

export interface GeneratePlanOptions {
  /** Partial GenerationOptions; validated before the run is admitted. */
  overrides?: unknown;
  signal?: AbortSignal;
  onIterationComplete?: (record: IterationRecord) => void;
}

export interface SuggestFieldOptions {
  signal?: AbortSignal;
}

export interface PlanService {
  generate(brief: ProductBrief, options?: GeneratePlanOptions): Promise<MarketingPlan>;
  suggest(fieldName: string, values: Partial<ProductBrief>, options?: SuggestFieldOptions): Promise<string>;
  isRunning(briefId: string): boolean;
  readonly activeRuns: number;
}

export function createPlanService(deps: PlanServiceDependencies): PlanService {
  const runningBriefs = new Set<string>();

  async function generate(brief: ProductBrief, options: GeneratePlanOptions = {}): Promise<MarketingPlan> {
    const resolved = resolveGenerationOptions(deps.defaults, options.overrides);

    if (runningBriefs.has(brief.briefId)) {
      logger.warn('Rejected concurrent run', { briefId: brief.briefId });
      throw new ConcurrentRunConflictError(brief.briefId);
    }

    runningBriefs.add(brief.briefId);
    logger.info('Plan generation started', { briefId: brief.briefId, ...resolved });
    try {
      const plan = await generateWithIterations(
        { brief, options: resolved, signal: options.signal },
        {
          adapter: deps.adapter,
          backoff: deps.backoff,
          now: deps.now,
          onIterationComplete: options.onIterationComplete,
        },
      );
      logger.info('Plan generation completed', {
        briefId: brief.briefId,
        status: plan.metadata.status,
        iterationCount: plan.metadata.iterationCount,
        qualityScore: plan.metadata.qualityScore,
      });
      return plan;
    } catch (error) {
      logger.error('Plan generation failed', { briefId: brief.briefId, error: errorMessage(error) });
      throw error;
    } finally {
      runningBriefs.delete(brief.briefId);
    }
  }

  function suggest(
    fieldName: string,
    values: Partial<ProductBrief>,
    options: SuggestFieldOptions = {},
  ): Promise<string> {
    return suggestField(deps.adapter, fieldName, values, {
      retryCount: deps.defaults.retryCount,
      stageTimeoutSeconds: deps.defaults.stageTimeoutSeconds,
      backoff: deps.backoff,
      signal: options.signal,
    });
  }

  return {
    generate,
    suggest,
    isRunning: (briefId) => runningBriefs.has(briefId),
    get activeRuns() {
      return runningBriefs.size;
    },
  };
}
