type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LevelSetting = LogLevel | 'silent';
type LogFormat = 'text' | 'json';

export interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
}

const LOG_LEVELS: Record<LevelSetting, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',  // cyan
  info: '\x1b[32m',   // green
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';

function isLevelSetting(value: string): value is LevelSetting {
  return value in LOG_LEVELS;
}

function getMinLevel(): LevelSetting {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLevelSetting(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function getFormat(): LogFormat {
  return process.env.LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'text';
}

function useColor(): boolean {
  return !process.env.NO_COLOR && Boolean(process.stderr.isTTY);
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function formatLogEntry(entry: LogEntry, color = false): string {
  const paint = (code: string, text: string) => (color ? `${code}${text}${RESET}` : text);
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const time = entry.timestamp.split('T')[1]?.replace('Z', '') ?? entry.timestamp;

  let line = `${paint(DIM, time)} ${paint(LOG_COLORS[entry.level], levelStr)} ${paint(BOLD, `[${entry.module}]`)} ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => {
        const serialized = serializeValue(v);
        const val = typeof serialized === 'string' ? serialized : JSON.stringify(serialized);
        return `${paint(DIM, `${k}=`)}${val}`;
      })
      .join(' ');
    line += ` ${dataStr}`;
  }

  return line;
}

function formatJsonEntry(entry: LogEntry): string {
  const data: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(entry.data ?? {})) {
    data[k] = serializeValue(v);
  }
  return JSON.stringify({
    time: entry.timestamp,
    level: entry.level,
    module: entry.module,
    msg: entry.message,
    ...data,
  });
}

// Everything goes to stderr so that stdout stays free for command output.
function write(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    process.stderr.write(`${line}\n`);
  }
}

export class Logger {
  private module: string;
  private parentData: Record<string, unknown>;

  constructor(module: string, parentData: Record<string, unknown> = {}) {
    this.module = module;
    this.parentData = parentData;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[getMinLevel()]) {
      return;
    }

    const entry: LogEntry = {
      level,
      module: this.module,
      message,
      data: { ...this.parentData, ...data },
      timestamp: new Date().toISOString(),
    };

    write(level, getFormat() === 'json' ? formatJsonEntry(entry) : formatLogEntry(entry, useColor()));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  child(childModule: string, childData?: Record<string, unknown>): Logger {
    return new Logger(
      `${this.module}:${childModule}`,
      { ...this.parentData, ...childData }
    );
  }

  withData(data: Record<string, unknown>): Logger {
    return new Logger(this.module, { ...this.parentData, ...data });
  }

  time(label: string): () => number {
    const start = performance.now();
    this.debug(`${label} started`);
    return () => {
      const duration = Math.round(performance.now() - start);
      this.debug(`${label} completed`, { durationMs: duration });
      return duration;
    };
  }
}

export function createLogger(module: string, data?: Record<string, unknown>): Logger {
  return new Logger(module, data);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
