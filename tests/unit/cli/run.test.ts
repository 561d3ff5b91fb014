import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Engine } from '../../../src/bootstrap.js';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli, slugify } from '../../../src/cli/run.js';
import { UsageTracker } from '../../../src/services/ai/clients.js';
import { createPlanService } from '../../../src/services/pipeline/service.js';
import { permanentFailure, success } from '../../../src/services/stages/types.js';
import { ScriptedStageAdapter } from '../../helpers/fake-adapter.js';
import {
  evaluationPayload,
  fastOptions,
  noBackoff,
  researchPayload,
  strategyPayload,
} from '../../helpers/fixtures.js';

const state = vi.hoisted(() => {
  const holder: { engine?: Engine } = {};
  return holder;
});

vi.mock('../../../src/bootstrap.js', () => ({
  createEngine: () => {
    if (!state.engine) throw new Error('engine not set');
    return state.engine;
  },
}));

function useAdapter(adapter: ScriptedStageAdapter): void {
  state.engine = {
    client: {
      provider: 'gemini',
      model: 'test-model',
      generate: vi.fn(),
      getUsage: () => new UsageTracker().getStats(),
    },
    service: createPlanService({ adapter, defaults: fastOptions, backoff: noBackoff }),
  };
}

describe('runCli', () => {
  let dir: string;
  let stdout: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'marketing-plan-'));
    stdout = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    state.engine = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the plan as Markdown and JSON', async () => {
    useAdapter(new ScriptedStageAdapter()
      .always('research', success(researchPayload()))
      .always('strategy', success(strategyPayload()))
      .always('evaluation', success(evaluationPayload(8))));
    const briefPath = join(dir, 'launch.json');
    await writeFile(briefPath, JSON.stringify({ product_name: 'EcoBottle', product_category: 'Drinkware' }));
    const outDir = join(dir, 'out');

    const code = await runCli(['generate', briefPath, '--out', outDir]);

    expect(code).toBe(EXIT_OK);
    const base = join(outDir, 'ecobottle-marketing-plan');
    expect(stdout).toEqual([`${base}.md\n`, `${base}.json\n`]);

    const markdown = await readFile(`${base}.md`, 'utf-8');
    expect(markdown.startsWith('# Marketing Plan: EcoBottle\n\n- **Brief:** launch\n')).toBe(true);

    const plan: unknown = JSON.parse(await readFile(`${base}.json`, 'utf-8'));
    expect(plan).toMatchObject({ briefId: 'launch', productName: 'EcoBottle', metadata: { qualityScore: 8 } });
  });

  it('prints a field suggestion', async () => {
    useAdapter(new ScriptedStageAdapter().always('field_suggestion', success('Urban commuters')));
    const briefPath = join(dir, 'brief.json');
    await writeFile(briefPath, JSON.stringify({ productName: 'EcoBottle' }));

    const code = await runCli(['suggest', 'targetPrimary', briefPath]);

    expect(code).toBe(EXIT_OK);
    expect(stdout).toEqual(['Urban commuters\n']);
  });

  it('exits with a usage error for bad arguments', async () => {
    expect(await runCli(['generate'])).toBe(EXIT_USAGE);
  });

  it('exits with a usage error for an invalid brief', async () => {
    const briefPath = join(dir, 'brief.json');
    await writeFile(briefPath, JSON.stringify({ productCategory: 'Drinkware' }));

    expect(await runCli(['generate', briefPath])).toBe(EXIT_USAGE);
  });

  it('exits with a usage error for malformed JSON', async () => {
    const briefPath = join(dir, 'brief.json');
    await writeFile(briefPath, '{ not json');

    expect(await runCli(['generate', briefPath])).toBe(EXIT_USAGE);
  });

  it('exits with a failure when the run fails', async () => {
    useAdapter(new ScriptedStageAdapter().always('research', permanentFailure('invalid key')));
    const briefPath = join(dir, 'brief.json');
    await writeFile(briefPath, JSON.stringify({ productName: 'EcoBottle' }));

    expect(await runCli(['generate', briefPath, '--out', dir])).toBe(EXIT_FAILURE);
  });
});

describe('slugify', () => {
  it.each([
    ['EcoBottle', 'ecobottle'],
    ['Café Crème 2.0!', 'caf-cr-me-2-0'],
    ['***', 'plan'],
  ])('%s -> %s', (input, slug) => {
    expect(slugify(input)).toBe(slug);
  });
});
