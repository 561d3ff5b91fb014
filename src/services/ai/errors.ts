// Sorts provider and transport errors into transient (worth another attempt)
// and permanent (will fail the same way again).

import { TimeoutError } from '../../utils/retry.js';
import type { LLMErrorClassification } from './types.js';

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
]);

const TRANSIENT_PATTERNS = [
  /rate.?limit/i,
  /too many requests/i,
  /overloaded/i,
  /quota/i,
  /resource.?exhausted/i,
  /unavailable/i,
  /time(d)?.?out/i,
  /socket hang up/i,
  /network/i,
  /fetch failed/i,
  /connection (reset|error|closed)/i,
];

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return readCode(error.cause);
  return undefined;
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

export function classifyLLMError(error: unknown): LLMErrorClassification {
  const reason = describe(error);

  if (error instanceof TimeoutError) {
    return { kind: 'transient', reason };
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return {
      kind: TRANSIENT_STATUSES.has(status) ? 'transient' : 'permanent',
      reason: `HTTP ${status}: ${reason}`,
      status,
    };
  }

  const code = readCode(error);
  if (code && TRANSIENT_CODES.has(code)) {
    return { kind: 'transient', reason: `${code}: ${reason}` };
  }

  if (TRANSIENT_PATTERNS.some((pattern) => pattern.test(reason))) {
    return { kind: 'transient', reason };
  }

  return { kind: 'permanent', reason };
}
