// Iteration Controller: re-runs the pipeline under evaluator feedback until the
// quality threshold is met or the iteration budget is spent.

import { createLogger, errorMessage } from '../../utils/logger.js';
import { meetsQualityThreshold } from '../quality/scorecard.js';
import { SECTION_IDS } from '../plan/sections.js';
import { RunAbortedError } from './errors.js';
import { runPipeline, type PipelineDependencies, type PipelineRunResult } from './orchestrator.js';
import type {
  EvaluationScorecard,
  GenerationOptions,
  IterationFeedback,
  IterationRecord,
  MarketingPlan,
  ProductBrief,
} from '../../types/index.js';

const logger = createLogger('pipeline:iteration');

export interface IterationInput {
  brief: ProductBrief;
  options: GenerationOptions;
  signal?: AbortSignal;
}

export interface IterationDependencies extends PipelineDependencies {
  onIterationComplete?: (record: IterationRecord) => void;
}

export function buildFeedback(iteration: number, evaluation: EvaluationScorecard): IterationFeedback {
  return {
    fromIteration: iteration,
    previousScore: evaluation.overallScore,
    weaknesses: [...evaluation.weaknesses],
    recommendations: [...evaluation.recommendations],
  };
}

function finalizePlan(selected: PipelineRunResult, records: IterationRecord[]): MarketingPlan {
  const { plan } = selected;
  return {
    ...plan,
    metadata: {
      ...plan.metadata,
      iterationCount: records.length,
      selectedIteration: selected.iteration,
      iterations: records,
      version: `1.${records.length - 1}`,
    },
  };
}

/**
 * Produce the final plan for a brief.
 *
 * Stops after the first run when auto-iteration is off or no scorecard came
 * back, as soon as a run meets the threshold, or at the iteration budget, in
 * which case the best-scored run wins (earliest on a tie). A later run that
 * fails or comes back unscored ends the loop with the best plan so far.
 */
export async function generateWithIterations(
  input: IterationInput,
  deps: IterationDependencies,
): Promise<MarketingPlan> {
  const { brief, options, signal } = input;
  const maxIterations = Math.max(1, options.maxIterations);
  const log = logger.withData({ briefId: brief.briefId });
  const timestamp = () => (deps.now ?? (() => new Date()))().toISOString();

  const records: IterationRecord[] = [];
  let best: { run: PipelineRunResult; score: number } | undefined;
  let feedback: IterationFeedback | undefined;
  let selected: PipelineRunResult | undefined;

  const record = (entry: IterationRecord) => {
    records.push(entry);
    deps.onIterationComplete?.(entry);
  };

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const startedAt = timestamp();

    let run: PipelineRunResult;
    try {
      run = await runPipeline(
        {
          brief,
          iteration,
          feedback,
          options: { retryCount: options.retryCount, stageTimeoutSeconds: options.stageTimeoutSeconds },
          signal,
        },
        deps,
      );
    } catch (error) {
      if (error instanceof RunAbortedError || !best) {
        throw error;
      }
      record({
        iteration,
        qualityScore: null,
        regeneratedSections: [],
        startedAt,
        completedAt: timestamp(),
        outcome: 'failed',
      });
      log.warn('Iteration failed, keeping best plan so far', {
        iteration,
        bestIteration: best.run.iteration,
        error: errorMessage(error),
      });
      selected = best.run;
      break;
    }

    const evaluation = run.evaluation;
    record({
      iteration,
      qualityScore: evaluation?.overallScore ?? null,
      regeneratedSections: [...SECTION_IDS],
      startedAt,
      completedAt: run.completedAt,
      outcome: evaluation ? 'scored' : 'unscored',
    });

    if (!evaluation) {
      if (best) {
        log.warn('Iteration returned no scorecard, keeping best plan so far', {
          iteration,
          bestIteration: best.run.iteration,
        });
      }
      selected = best?.run ?? run;
      break;
    }

    if (!best || evaluation.overallScore > best.score) {
      best = { run, score: evaluation.overallScore };
    }

    if (!options.autoIterate) {
      selected = run;
      break;
    }

    if (meetsQualityThreshold(evaluation, options.qualityThreshold)) {
      log.info('Quality threshold met', {
        iteration,
        score: evaluation.overallScore,
        threshold: options.qualityThreshold,
      });
      selected = run;
      break;
    }

    if (iteration === maxIterations) {
      log.info('Iteration budget spent, returning best plan', {
        iterations: iteration,
        bestIteration: best.run.iteration,
        bestScore: best.score,
      });
      selected = best.run;
      break;
    }

    log.info('Below quality threshold, iterating with feedback', {
      iteration,
      score: evaluation.overallScore,
      threshold: options.qualityThreshold,
    });
    feedback = buildFeedback(iteration, evaluation);
  }

  if (!selected) {
    throw new Error('Iteration loop ended without selecting a plan');
  }

  return finalizePlan(selected, records);
}
