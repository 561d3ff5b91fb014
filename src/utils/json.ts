// Helpers for JSON coming back from LLMs: fenced, wrapped in prose, or slightly broken.

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * True when the value carries something a reader could use: non-blank text,
 * a number or boolean, or a container holding at least one such value.
 */
export function hasContent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value === 'boolean') return true;
  if (Array.isArray(value)) return value.some(hasContent);
  if (typeof value === 'object') return Object.values(value).some(hasContent);
  return false;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function stripFences(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  return fenced ? fenced[1].trim() : text;
}

// From the first `open` to its matching close, skipping brackets inside strings.
function balancedBlock(text: string, open: '{' | '['): string | null {
  const close = open === '{' ? '}' : ']';
  const start = text.indexOf(open);
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === open) depth++;
    else if (char === close && --depth === 0) return text.slice(start, i + 1);
  }
  return null;
}

function outerSlice(text: string, open: '{' | '['): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(open === '{' ? '}' : ']');
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

// Objects first: every stage payload is one, and prose often carries `[1]` citations.
function blockCandidates(text: string): string[] {
  const blocks = [
    balancedBlock(text, '{'),
    outerSlice(text, '{'),
    balancedBlock(text, '['),
    outerSlice(text, '['),
  ];
  return blocks.filter((block): block is string => block !== null);
}

function repair(text: string): string {
  return text
    // trailing commas before a closing brace/bracket
    .replace(/,(\s*[}\]])/g, '$1')
    // control characters other than tab/newline/carriage return
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f]/g, '');
}

/**
 * Pull a JSON value out of an LLM response. Candidates are tried in order,
 * each as-is and then repaired: the whole text, the unfenced text, then the
 * object blocks and the array blocks within it. Returns undefined when
 * nothing parses.
 */
export function extractJSON(raw: string): JsonValue | undefined {
  const text = raw.trim();
  if (!text) return undefined;

  const unfenced = stripFences(text);
  const candidates = [...new Set([text, unfenced, ...blockCandidates(unfenced)])];

  for (const candidate of candidates) {
    for (const attempt of [candidate, repair(candidate)]) {
      const parsed = tryParse(attempt);
      if (parsed.ok && isJsonValue(parsed.value)) return parsed.value;
    }
  }

  return undefined;
}
