// Pipeline Controller: one research → strategy → evaluate → aggregate run for
// a single brief.

import { createLogger } from '../../utils/logger.js';
import { generateId } from '../../utils/hash.js';
import type { BackoffOptions } from '../../utils/retry.js';
import { withLLMContext } from '../ai/call-context.js';
import {
  validateEvaluationPayload,
  validateResearchPayload,
  validateStrategyPayload,
} from '../stages/schemas.js';
import type { PayloadValidator, StageAdapter, StageRequest } from '../stages/types.js';
import { aggregatePlan } from './aggregator.js';
import { PipelineRunError, RunAbortedError } from './errors.js';
import { invokeWithRetry, type StageResult } from './retry-policy.js';
import type {
  EvaluationScorecard,
  GenerationOptions,
  IterationFeedback,
  MarketingPlan,
  PipelineStage,
  PipelineState,
  PipelineStep,
  ProductBrief,
  ResearchPayload,
  StageTimestamps,
  StrategyPayload,
} from '../../types/index.js';

const logger = createLogger('pipeline:orchestrator');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Per-run accumulator. Created for one run and dropped when it ends. */
export interface GenerationContext {
  readonly runId: string;
  readonly iteration: number;
  readonly brief: ProductBrief;
  readonly feedback?: IterationFeedback;
  state: PipelineState;
  research?: ResearchPayload;
  strategy?: StrategyPayload;
  evaluation: EvaluationScorecard | null;
  stageTimestamps: Partial<Record<PipelineStage, StageTimestamps>>;
  steps: PipelineStep[];
}

export interface PipelineRunInput {
  brief: ProductBrief;
  iteration: number;
  feedback?: IterationFeedback;
  options: Pick<GenerationOptions, 'retryCount' | 'stageTimeoutSeconds'>;
  signal?: AbortSignal;
}

export interface PipelineDependencies {
  adapter: StageAdapter;
  backoff?: Partial<BackoffOptions>;
  now?: () => Date;
}

export interface PipelineRunResult {
  runId: string;
  iteration: number;
  plan: MarketingPlan;
  evaluation: EvaluationScorecard | null;
  steps: PipelineStep[];
  startedAt: string;
  completedAt: string;
}

// ---------------------------------------------------------------------------
// Step log
// ---------------------------------------------------------------------------

function beginStep(ctx: GenerationContext, step: PipelineState, at: string): PipelineStep {
  const entry: PipelineStep = { step, status: 'running', startedAt: at };
  ctx.steps.push(entry);
  return entry;
}

function endStep(
  entry: PipelineStep,
  status: 'complete' | 'failed',
  at: string,
  extra: { attempts?: number; detail?: string } = {},
): void {
  entry.status = status;
  entry.completedAt = at;
  if (extra.attempts !== undefined) entry.attempts = extra.attempts;
  if (extra.detail !== undefined) entry.detail = extra.detail;
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

/**
 * Execute one pipeline run. Research and strategy are critical: their failure
 * throws PipelineRunError and no plan is produced. Evaluation is optional: on
 * failure the plan is aggregated without a scorecard and marked degraded.
 */
export async function runPipeline(
  input: PipelineRunInput,
  deps: PipelineDependencies,
): Promise<PipelineRunResult> {
  const now = deps.now ?? (() => new Date());
  const timestamp = () => now().toISOString();
  const startedAt = timestamp();

  const ctx: GenerationContext = {
    runId: generateId(),
    iteration: input.iteration,
    brief: input.brief,
    feedback: input.feedback,
    state: 'research',
    evaluation: null,
    stageTimestamps: {},
    steps: [],
  };

  const run = { briefId: ctx.brief.briefId, runId: ctx.runId, iteration: ctx.iteration };
  const log = logger.withData(run);

  async function runStage<T>(
    stage: PipelineStage,
    step: PipelineState,
    request: StageRequest,
    validate: PayloadValidator<T>,
  ): Promise<StageResult<T>> {
    const at = timestamp();
    const entry = beginStep(ctx, step, at);
    ctx.stageTimestamps[stage] = { startedAt: at };
    const done = log.time(`${stage} stage`);

    try {
      const result = await withLLMContext({ purpose: 'plan-generation', stage }, () =>
        invokeWithRetry(deps.adapter, request, validate, {
          retryCount: input.options.retryCount,
          stageTimeoutSeconds: input.options.stageTimeoutSeconds,
          backoff: deps.backoff,
          signal: input.signal,
        }),
      );

      const completedAt = timestamp();
      const attempts = result.ok ? result.attempts : result.failure.attempts;
      ctx.stageTimestamps[stage] = { startedAt: at, completedAt, attempts };
      if (result.ok) {
        endStep(entry, 'complete', completedAt, { attempts });
      } else {
        endStep(entry, 'failed', completedAt, {
          attempts,
          detail: `${result.failure.kind}: ${result.failure.reason}`,
        });
      }
      return result;
    } catch (error) {
      if (error instanceof RunAbortedError) {
        endStep(entry, 'failed', timestamp(), { detail: 'aborted' });
      }
      throw error;
    } finally {
      done();
    }
  }

  return withLLMContext(
    { purpose: 'plan-generation', ...run },
    async () => {
      log.info('Pipeline run started', { hasFeedback: Boolean(ctx.feedback) });

      while (ctx.state !== 'done' && ctx.state !== 'failed') {
        switch (ctx.state) {
          case 'research': {
            const result = await runStage('research', 'research', {
              stage: 'research',
              brief: ctx.brief,
              feedback: ctx.feedback,
            }, validateResearchPayload);

            if (!result.ok) {
              ctx.state = 'failed';
              log.error('Research stage failed', { ...result.failure });
              throw new PipelineRunError(result.failure, run);
            }
            ctx.research = result.value;
            ctx.state = 'strategy';
            break;
          }

          case 'strategy': {
            if (!ctx.research) throw new Error('Strategy stage reached without research');
            const result = await runStage('strategy', 'strategy', {
              stage: 'strategy',
              brief: ctx.brief,
              research: ctx.research,
              feedback: ctx.feedback,
            }, validateStrategyPayload);

            if (!result.ok) {
              ctx.state = 'failed';
              log.error('Strategy stage failed', { ...result.failure });
              throw new PipelineRunError(result.failure, run);
            }
            ctx.strategy = result.value;
            ctx.state = 'evaluate';
            break;
          }

          case 'evaluate': {
            if (!ctx.research || !ctx.strategy) throw new Error('Evaluation stage reached without research and strategy');
            const result = await runStage('evaluation', 'evaluate', {
              stage: 'evaluation',
              brief: ctx.brief,
              research: ctx.research,
              strategy: ctx.strategy,
            }, validateEvaluationPayload);

            if (result.ok) {
              ctx.evaluation = result.value;
            } else {
              log.warn('Evaluation unavailable, continuing without a scorecard', { ...result.failure });
              ctx.evaluation = null;
            }
            ctx.state = 'aggregate';
            break;
          }

          case 'aggregate': {
            if (input.signal?.aborted) {
              throw new RunAbortedError();
            }
            if (!ctx.research || !ctx.strategy) throw new Error('Aggregation reached without research and strategy');

            const entry = beginStep(ctx, 'aggregate', timestamp());
            const aggregated = aggregatePlan({
              brief: ctx.brief,
              research: ctx.research,
              strategy: ctx.strategy,
              evaluation: ctx.evaluation,
            });
            endStep(entry, 'complete', timestamp(), {
              detail: aggregated.degradedSections.length > 0
                ? `degraded: ${aggregated.degradedSections.join(', ')}`
                : undefined,
            });

            const completedAt = timestamp();
            const plan: MarketingPlan = {
              briefId: ctx.brief.briefId,
              productName: ctx.brief.productName,
              sections: aggregated.sections,
              evaluation: ctx.evaluation,
              metadata: {
                iterationCount: ctx.iteration,
                selectedIteration: ctx.iteration,
                qualityScore: ctx.evaluation?.overallScore ?? null,
                generatedAt: completedAt,
                status: aggregated.status,
                degradedSections: aggregated.degradedSections,
                stageTimestamps: { ...ctx.stageTimestamps },
                iterations: [],
                version: `1.${ctx.iteration - 1}`,
              },
            };

            ctx.state = 'done';
            log.info('Pipeline run completed', {
              status: plan.metadata.status,
              qualityScore: plan.metadata.qualityScore,
            });

            return {
              runId: ctx.runId,
              iteration: ctx.iteration,
              plan,
              evaluation: ctx.evaluation,
              steps: ctx.steps,
              startedAt,
              completedAt,
            };
          }
        }
      }

      throw new Error(`Pipeline run ended in unexpected state: ${ctx.state}`);
    },
  );
}
