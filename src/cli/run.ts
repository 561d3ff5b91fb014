import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { createEngine } from '../bootstrap.js';
import { parseBriefValues, parseProductBrief, BriefValidationError } from '../services/brief/validation.js';
import { ConcurrentRunConflictError, RunAbortedError, StageFailureError } from '../services/pipeline/errors.js';
import { GenerationOptionsError } from '../services/pipeline/options.js';
import { renderPlanMarkdown } from '../services/plan/markdown.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import type { MarketingPlan } from '../types/index.js';
import { CliUsageError, parseArgs, USAGE, type OutputFormat } from './args.js';

const logger = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_ABORTED = 130;

async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readFile(path, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new CliUsageError(`${path} is not valid JSON: ${errorMessage(error)}`);
  }
}

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'plan';
}

async function writePlan(plan: MarketingPlan, outDir: string, format: OutputFormat): Promise<string[]> {
  await mkdir(outDir, { recursive: true });
  const base = join(outDir, `${slugify(plan.productName)}-marketing-plan`);
  const written: string[] = [];

  if (format === 'md' || format === 'both') {
    await writeFile(`${base}.md`, renderPlanMarkdown(plan), 'utf-8');
    written.push(`${base}.md`);
  }
  if (format === 'json' || format === 'both') {
    await writeFile(`${base}.json`, `${JSON.stringify(plan, null, 2)}\n`, 'utf-8');
    written.push(`${base}.json`);
  }
  return written;
}

function exitCodeFor(error: unknown): number {
  if (error instanceof RunAbortedError) return EXIT_ABORTED;
  if (
    error instanceof CliUsageError
    || error instanceof BriefValidationError
    || error instanceof GenerationOptionsError
  ) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}

export async function runCli(argv: string[]): Promise<number> {
  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupted, cancelling run');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const command = parseArgs(argv);

    if (command.command === 'help') {
      process.stdout.write(`${USAGE}\n`);
      return EXIT_OK;
    }

    if (command.command === 'suggest') {
      const values = parseBriefValues(await readJsonFile(command.briefPath));
      const { service } = createEngine();
      const suggestion = await service.suggest(command.field, values, { signal: controller.signal });
      process.stdout.write(`${suggestion}\n`);
      return EXIT_OK;
    }

    const defaultBriefId = basename(command.briefPath, extname(command.briefPath));
    const brief = parseProductBrief(await readJsonFile(command.briefPath), { defaultBriefId });
    const { service, client } = createEngine();

    const plan = await service.generate(brief, {
      overrides: command.overrides,
      signal: controller.signal,
      onIterationComplete: (record) => {
        logger.info(`Iteration ${record.iteration} ${record.outcome}`, { qualityScore: record.qualityScore });
      },
    });

    const written = await writePlan(plan, command.outDir, command.format);
    for (const path of written) {
      process.stdout.write(`${path}\n`);
    }

    const usage = client.getUsage();
    logger.info('Done', {
      status: plan.metadata.status,
      qualityScore: plan.metadata.qualityScore,
      iterations: plan.metadata.iterationCount,
      llmRequests: usage.requestCount,
      totalTokens: usage.totalTokens,
    });
    return EXIT_OK;
  } catch (error) {
    const code = exitCodeFor(error);
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
    } else if (error instanceof StageFailureError || error instanceof ConcurrentRunConflictError) {
      logger.error(error.message, { name: error.name });
    } else {
      logger.error(errorMessage(error));
    }
    return code;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
