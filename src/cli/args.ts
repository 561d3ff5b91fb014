import type { GenerationOptions } from '../types/index.js';

export type OutputFormat = 'md' | 'json' | 'both';

export type CliCommand =
  | {
      command: 'generate';
      briefPath: string;
      outDir: string;
      format: OutputFormat;
      overrides: Partial<GenerationOptions>;
    }
  | { command: 'suggest'; field: string; briefPath: string }
  | { command: 'help' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage:
  marketing-plan generate <brief.json> [options]
  marketing-plan suggest <field> <brief.json>

Generate options:
  --out <dir>              Output directory (default: current directory)
  --format <md|json|both>  Output format (default: both)
  --max-iterations <n>     Iteration budget
  --threshold <score>      Quality threshold, 0-10
  --retry-count <n>        Extra attempts after a transient stage failure
  --timeout <seconds>      Per-stage timeout
  --no-iterate             Single pass, no feedback iterations
  --iterate                Iterate under evaluator feedback
  -h, --help               Show this help`;

function parseNumber(flag: string, raw: string | undefined): number {
  if (raw === undefined || raw.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliUsageError(`${flag} must be a number, got: ${raw}`);
  }
  return value;
}

function parseFormat(raw: string | undefined): OutputFormat {
  if (raw === 'md' || raw === 'json' || raw === 'both') return raw;
  throw new CliUsageError(`--format must be one of md, json, both; got: ${raw ?? '(none)'}`);
}

// `--flag=value` becomes `--flag value`
function splitInlineValues(argv: string[]): string[] {
  return argv.flatMap((arg) => {
    const eq = arg.indexOf('=');
    return arg.startsWith('--') && eq > 2 ? [arg.slice(0, eq), arg.slice(eq + 1)] : [arg];
  });
}

function parseGenerate(args: string[]): CliCommand {
  const positional: string[] = [];
  const overrides: Partial<GenerationOptions> = {};
  let outDir = '.';
  let format: OutputFormat = 'both';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--out': {
        const value = args[++i];
        if (value === undefined) throw new CliUsageError('--out requires a value');
        outDir = value;
        break;
      }
      case '--format':
        format = parseFormat(args[++i]);
        break;
      case '--max-iterations':
        overrides.maxIterations = parseNumber(arg, args[++i]);
        break;
      case '--threshold':
        overrides.qualityThreshold = parseNumber(arg, args[++i]);
        break;
      case '--retry-count':
        overrides.retryCount = parseNumber(arg, args[++i]);
        break;
      case '--timeout':
        overrides.stageTimeoutSeconds = parseNumber(arg, args[++i]);
        break;
      case '--no-iterate':
        overrides.autoIterate = false;
        break;
      case '--iterate':
        overrides.autoIterate = true;
        break;
      default:
        if (arg.startsWith('-')) throw new CliUsageError(`Unknown option: ${arg}`);
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new CliUsageError('generate takes exactly one brief file');
  }
  return { command: 'generate', briefPath: positional[0], outDir, format, overrides };
}

function parseSuggest(args: string[]): CliCommand {
  const unknown = args.find((arg) => arg.startsWith('-'));
  if (unknown) throw new CliUsageError(`Unknown option: ${unknown}`);
  if (args.length !== 2) {
    throw new CliUsageError('suggest takes a field name and a brief file');
  }
  return { command: 'suggest', field: args[0], briefPath: args[1] };
}

/** Parse arguments after the executable and script name. */
export function parseArgs(argv: string[]): CliCommand {
  const args = splitInlineValues(argv);
  if (args.length === 0 || args.includes('--help') || args.includes('-h') || args[0] === 'help') {
    return { command: 'help' };
  }

  const [command, ...rest] = args;
  switch (command) {
    case 'generate':
      return parseGenerate(rest);
    case 'suggest':
      return parseSuggest(rest);
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}
