import type { StageName } from '../stages/types.js';

export type StageFailureKind = 'transient' | 'permanent' | 'schema_invalid';

export interface StageFailure {
  stage: StageName;
  kind: StageFailureKind;
  reason: string;
  missingKeys: string[];
  attempts: number;
}

export class StageFailureError extends Error {
  readonly stage: StageName;
  readonly failureKind: StageFailureKind;
  readonly reason: string;
  readonly missingKeys: string[];
  readonly attempts: number;

  constructor(failure: StageFailure, message?: string) {
    super(message ?? `${failure.stage} stage failed (${failure.kind}) after ${failure.attempts} attempt(s): ${failure.reason}`);
    this.name = 'StageFailureError';
    this.stage = failure.stage;
    this.failureKind = failure.kind;
    this.reason = failure.reason;
    this.missingKeys = failure.missingKeys;
    this.attempts = failure.attempts;
  }
}

/** A critical stage failed; the run produced no plan. */
export class PipelineRunError extends StageFailureError {
  readonly briefId: string;
  readonly runId: string;
  readonly iteration: number;

  constructor(failure: StageFailure, run: { briefId: string; runId: string; iteration: number }) {
    super(
      failure,
      `Pipeline run ${run.runId} for brief ${run.briefId} failed at ${failure.stage} (${failure.kind}) after ${failure.attempts} attempt(s): ${failure.reason}`,
    );
    this.name = 'PipelineRunError';
    this.briefId = run.briefId;
    this.runId = run.runId;
    this.iteration = run.iteration;
  }
}

export class ConcurrentRunConflictError extends Error {
  readonly briefId: string;

  constructor(briefId: string) {
    super(`A plan generation run is already in progress for brief ${briefId}`);
    this.name = 'ConcurrentRunConflictError';
    this.briefId = briefId;
  }
}

export class RunAbortedError extends Error {
  readonly stage?: StageName;

  constructor(stage?: StageName) {
    super(stage ? `Run aborted during ${stage} stage` : 'Run aborted');
    this.name = 'RunAbortedError';
    this.stage = stage;
  }
}
