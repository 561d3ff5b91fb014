import { describe, it, expect } from 'vitest';
import { createPlanService } from '../../../src/services/pipeline/service.js';
import {
  ConcurrentRunConflictError,
  PipelineRunError,
  RunAbortedError,
  StageFailureError,
} from '../../../src/services/pipeline/errors.js';
import { GenerationOptionsError } from '../../../src/services/pipeline/options.js';
import { permanentFailure, success, type StageOutcome } from '../../../src/services/stages/types.js';
import { deferred, flush, ScriptedStageAdapter } from '../../helpers/fake-adapter.js';
import {
  evaluationPayload,
  fastOptions,
  noBackoff,
  researchPayload,
  strategyPayload,
  testBrief,
} from '../../helpers/fixtures.js';

function scriptedAdapter(): ScriptedStageAdapter {
  return new ScriptedStageAdapter()
    .always('research', success(researchPayload()))
    .always('strategy', success(strategyPayload()))
    .always('evaluation', success(evaluationPayload(8)));
}

function service(adapter: ScriptedStageAdapter) {
  return createPlanService({ adapter, defaults: fastOptions, backoff: noBackoff });
}

describe('PlanService.generate', () => {
  it('generates a plan for a brief', async () => {
    const plans = service(scriptedAdapter());

    const plan = await plans.generate(testBrief);

    expect(plan.briefId).toBe('brief-001');
    expect(plan.metadata.status).toBe('completed');
    expect(plans.activeRuns).toBe(0);
  });

  it('rejects a second run for a brief that is already running', async () => {
    const gate = deferred<StageOutcome>();
    const adapter = scriptedAdapter().enqueue('research', () => gate.promise);
    const plans = service(adapter);

    const first = plans.generate(testBrief);
    await flush();

    expect(plans.isRunning('brief-001')).toBe(true);
    await expect(plans.generate(testBrief)).rejects.toBeInstanceOf(ConcurrentRunConflictError);

    gate.resolve(success(researchPayload()));
    const plan = await first;

    expect(plan.metadata.iterationCount).toBe(1);
    expect(plans.isRunning('brief-001')).toBe(false);
    expect(adapter.callsFor('research')).toHaveLength(1);
  });

  it('runs different briefs side by side', async () => {
    const gate = deferred<StageOutcome>();
    const adapter = scriptedAdapter().enqueue('research', () => gate.promise);
    const plans = service(adapter);

    const first = plans.generate(testBrief);
    const second = plans.generate({ ...testBrief, briefId: 'brief-002' });
    await flush();
    expect(plans.activeRuns).toBe(2);

    gate.resolve(success(researchPayload()));
    const results = await Promise.all([first, second]);

    expect(results.map((p) => p.briefId)).toEqual(['brief-001', 'brief-002']);
    expect(plans.activeRuns).toBe(0);
  });

  it('validates overrides before admitting the run', async () => {
    const adapter = scriptedAdapter();
    const plans = service(adapter);

    await expect(plans.generate(testBrief, { overrides: { maxIterations: 0 } }))
      .rejects.toBeInstanceOf(GenerationOptionsError);
    expect(adapter.calls).toHaveLength(0);
    expect(plans.isRunning('brief-001')).toBe(false);
  });

  it('applies overrides to the run', async () => {
    const adapter = scriptedAdapter().always('evaluation', success(evaluationPayload(4)));
    const plans = service(adapter);

    const plan = await plans.generate(testBrief, { overrides: { autoIterate: false } });

    expect(plan.metadata.iterationCount).toBe(1);
    expect(adapter.callsFor('research')).toHaveLength(1);
  });

  it('releases the brief after a failed run', async () => {
    const adapter = scriptedAdapter().enqueue('research', permanentFailure('invalid key'));
    const plans = service(adapter);

    await expect(plans.generate(testBrief)).rejects.toBeInstanceOf(PipelineRunError);
    expect(plans.isRunning('brief-001')).toBe(false);

    const plan = await plans.generate(testBrief);
    expect(plan.metadata.status).toBe('completed');
  });

  it('stops an aborted run without producing a plan', async () => {
    const adapter = scriptedAdapter();
    const plans = service(adapter);

    await expect(plans.generate(testBrief, { signal: AbortSignal.abort() }))
      .rejects.toBeInstanceOf(RunAbortedError);
    expect(adapter.calls).toHaveLength(0);
    expect(plans.activeRuns).toBe(0);
  });
});

describe('PlanService.suggest', () => {
  it('returns the trimmed suggestion', async () => {
    const adapter = scriptedAdapter().always('field_suggestion', success('  Eco-minded commuters aged 25-40  '));
    const plans = service(adapter);

    const suggestion = await plans.suggest(' targetPrimary ', { productName: 'EcoBottle' });

    expect(suggestion).toBe('Eco-minded commuters aged 25-40');
    expect(adapter.calls[0].request).toEqual({
      stage: 'field_suggestion',
      fieldName: 'targetPrimary',
      values: { productName: 'EcoBottle' },
    });
  });

  it('re-prompts once on a blank reply and then fails', async () => {
    const adapter = scriptedAdapter().always('field_suggestion', success('   '));
    const plans = service(adapter);

    const error = await plans.suggest('productUsp', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageFailureError);
    expect(error).toMatchObject({
      stage: 'field_suggestion',
      failureKind: 'schema_invalid',
      missingKeys: ['suggestion'],
      attempts: 2,
    });
  });

  it('rejects a blank field name', async () => {
    const plans = service(scriptedAdapter());

    await expect(plans.suggest('  ', {})).rejects.toThrow('fieldName must not be empty');
  });

  it('is not blocked by a running generation for the same brief', async () => {
    const gate = deferred<StageOutcome>();
    const adapter = scriptedAdapter()
      .enqueue('research', () => gate.promise)
      .always('field_suggestion', success('Spring launch'));
    const plans = service(adapter);

    const running = plans.generate(testBrief);
    await flush();

    await expect(plans.suggest('launchDate', testBrief)).resolves.toBe('Spring launch');

    gate.resolve(success(researchPayload()));
    await running;
  });
});
