import { describe, it, expect } from 'vitest';
import { humanizeKey, inlineText, leadingExcerpt, renderContent } from '../../../src/services/plan/format.js';

describe('humanizeKey', () => {
  it.each([
    ['currentSituation', 'Current Situation'],
    ['pest_analysis', 'Pest Analysis'],
    ['go-to-market', 'Go To Market'],
    ['kpis', 'Kpis'],
  ])('%s -> %s', (key, expected) => {
    expect(humanizeKey(key)).toBe(expected);
  });
});

describe('inlineText', () => {
  it('flattens objects and lists onto one line', () => {
    expect(inlineText({ phase: 'Pre-launch', activities: ['Seeding', 'Press'], owner: '' }))
      .toBe('Phase: Pre-launch; Activities: Seeding, Press');
  });
});

describe('renderContent', () => {
  it('renders scalars, lists and nested objects as blocks', () => {
    const markdown = renderContent({ mission: 'Make X', usps: ['A', 'B'], brand: { tone: 'Warm' } });

    expect(markdown).toBe('**Mission:** Make X\n\n### Usps\n\n- A\n- B\n\n### Brand\n\n**Tone:** Warm');
  });

  it('separates object list items with a blank line and skips empty fields', () => {
    const markdown = renderContent([
      { name: 'Ana', age: 30 },
      { name: 'Ben', age: null },
    ]);

    expect(markdown).toBe('- **Name:** Ana\n- **Age:** 30\n\n- **Name:** Ben');
  });

  it('caps heading depth', () => {
    expect(renderContent({ a: { b: { c: 'x' } } }, 6)).toBe('###### A\n\n###### B\n\n**C:** x');
  });

  it('returns an empty string when nothing has content', () => {
    expect(renderContent({ notes: '  ', items: [] })).toBe('');
    expect(renderContent(null)).toBe('');
  });

  it('renders a plain string trimmed', () => {
    expect(renderContent('  Growing market  ')).toBe('Growing market');
  });
});

describe('leadingExcerpt', () => {
  it('takes the first non-heading line without markers', () => {
    expect(leadingExcerpt('### Mission\n\n- **Mission:** Make reuse the default.\n- Other'))
      .toBe('Mission: Make reuse the default.');
  });

  it('clips long lines with an ellipsis', () => {
    expect(leadingExcerpt('a'.repeat(20), 10)).toBe(`${'a'.repeat(9)}…`);
  });

  it('returns an empty string for headings only', () => {
    expect(leadingExcerpt('## Only\n\n### Headings')).toBe('');
  });
});
