// Per-request generation options, layered over the process defaults.

import { z } from 'zod';
import type { GenerationOptions } from '../../types/index.js';
import {
  formatValidationIssues,
  toValidationIssues,
  type ValidationIssue,
} from '../../utils/validation.js';

export const MAX_ITERATIONS_LIMIT = 10;
export const MAX_RETRY_COUNT = 5;
export const MAX_STAGE_TIMEOUT_SECONDS = 600;

export const GenerationOptionsSchema = z.object({
  autoIterate: z.boolean(),
  maxIterations: z.number().int().min(1).max(MAX_ITERATIONS_LIMIT),
  qualityThreshold: z.number().min(0).max(10),
  retryCount: z.number().int().min(0).max(MAX_RETRY_COUNT),
  stageTimeoutSeconds: z.number().positive().max(MAX_STAGE_TIMEOUT_SECONDS),
}).strict();

export const GenerationOptionsOverridesSchema = GenerationOptionsSchema.partial();

export type GenerationOptionsOverrides = z.infer<typeof GenerationOptionsOverridesSchema>;

export class GenerationOptionsError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`Invalid generation options: ${formatValidationIssues(issues)}`);
    this.name = 'GenerationOptionsError';
    this.issues = issues;
  }
}

/**
 * Merge request overrides onto the defaults. Both layers are checked, so a
 * bad environment value surfaces here rather than mid-run.
 */
export function resolveGenerationOptions(
  defaults: GenerationOptions,
  overrides: unknown = {},
): GenerationOptions {
  const parsedOverrides = GenerationOptionsOverridesSchema.safeParse(overrides ?? {});
  if (!parsedOverrides.success) {
    throw new GenerationOptionsError(toValidationIssues(parsedOverrides.error));
  }

  const provided = Object.fromEntries(
    Object.entries(parsedOverrides.data).filter(([, value]) => value !== undefined),
  );
  const merged = GenerationOptionsSchema.safeParse({ ...defaults, ...provided });
  if (!merged.success) {
    throw new GenerationOptionsError(toValidationIssues(merged.error));
  }
  return merged.data;
}
