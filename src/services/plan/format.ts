// Renders structured stage output as Markdown.

import { hasContent, isJsonObject, type JsonValue } from '../../utils/json.js';

const MAX_HEADING_LEVEL = 6;

/** `currentSituation` and `pest_analysis` become `Current Situation` and `Pest Analysis`. */
export function humanizeKey(key: string): string {
  return key
    .replace(/[_-]+/g, ' ')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function scalarText(value: string | number | boolean | null): string {
  if (value === null) return '';
  return typeof value === 'string' ? value.trim() : String(value);
}

/** Flatten any value onto one line. */
export function inlineText(value: JsonValue): string {
  if (Array.isArray(value)) {
    return value.map(inlineText).filter(Boolean).join(', ');
  }
  if (isJsonObject(value)) {
    return Object.entries(value)
      .filter(([, v]) => hasContent(v))
      .map(([k, v]) => `${humanizeKey(k)}: ${inlineText(v)}`)
      .join('; ');
  }
  return scalarText(value);
}

function renderListItem(item: JsonValue): string {
  if (isJsonObject(item)) {
    return Object.entries(item)
      .filter(([, v]) => hasContent(v))
      .map(([k, v]) => `- **${humanizeKey(k)}:** ${inlineText(v)}`)
      .join('\n');
  }
  return `- ${inlineText(item)}`;
}

function renderList(items: JsonValue[]): string {
  const kept = items.filter(hasContent);
  const separator = kept.some(isJsonObject) ? '\n\n' : '\n';
  return kept.map(renderListItem).join(separator);
}

function heading(level: number, text: string): string {
  return `${'#'.repeat(Math.min(level, MAX_HEADING_LEVEL))} ${text}`;
}

/**
 * Render a payload value as Markdown. Objects become headed blocks, lists
 * become bullets and scalars become `**Key:** value` lines. Empty values are
 * skipped, so the result is '' when nothing has content.
 */
export function renderContent(value: JsonValue, level = 3): string {
  if (!hasContent(value)) return '';
  if (Array.isArray(value)) return renderList(value);
  if (!isJsonObject(value)) return scalarText(value);

  return Object.entries(value)
    .filter(([, v]) => hasContent(v))
    .map(([key, v]) => {
      const title = humanizeKey(key);
      if (isJsonObject(v)) return `${heading(level, title)}\n\n${renderContent(v, level + 1)}`;
      if (Array.isArray(v)) return `${heading(level, title)}\n\n${renderList(v)}`;
      return `**${title}:** ${scalarText(v)}`;
    })
    .join('\n\n');
}

/**
 * First line of prose in rendered Markdown, with list and emphasis markers
 * removed, clipped to `maxLength` characters.
 */
export function leadingExcerpt(markdown: string, maxLength = 280): string {
  const line = markdown
    .split('\n')
    .map((l) => l.trim())
    .find((l) => l.length > 0 && !l.startsWith('#'));

  if (!line) return '';

  const text = line.replace(/^[-*]\s+/, '').replace(/\*\*/g, '').trim();
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 1).trimEnd()}…`;
}
