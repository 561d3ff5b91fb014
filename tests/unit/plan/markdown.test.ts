import { describe, it, expect } from 'vitest';
import { DEGRADED_NOTICE, headingAnchor, renderPlanMarkdown } from '../../../src/services/plan/markdown.js';
import { EMPTY_SECTION_PLACEHOLDER, EVALUATION_UNAVAILABLE } from '../../../src/services/pipeline/aggregator.js';
import { buildScorecard } from '../../../src/services/quality/scorecard.js';
import type { MarketingPlan } from '../../../src/types/index.js';

function plan(overrides: Partial<MarketingPlan> = {}): MarketingPlan {
  return {
    briefId: 'brief-001',
    productName: 'EcoBottle',
    sections: [
      {
        id: 'executive_summary',
        title: 'Executive Summary',
        content: '**Product:** EcoBottle',
        sourceStage: 'aggregate',
        degraded: false,
      },
      {
        id: 'swot_analysis',
        title: 'SWOT Analysis',
        content: EMPTY_SECTION_PLACEHOLDER,
        sourceStage: 'research',
        degraded: true,
      },
    ],
    evaluation: null,
    metadata: {
      iterationCount: 2,
      selectedIteration: 1,
      qualityScore: null,
      generatedAt: '2026-01-01T00:00:00.000Z',
      status: 'completed_degraded',
      degradedSections: ['swot_analysis'],
      stageTimestamps: {},
      iterations: [],
      version: '1.1',
    },
    ...overrides,
  };
}

describe('headingAnchor', () => {
  it.each([
    ['2. Mission, Vision & Value Proposition', '2-mission-vision--value-proposition'],
    ['7. Strategy & Marketing Mix (7Ps)', '7-strategy--marketing-mix-7ps'],
    ['4. SWOT Analysis', '4-swot-analysis'],
  ])('%s', (heading, anchor) => {
    expect(headingAnchor(heading)).toBe(anchor);
  });
});

describe('renderPlanMarkdown', () => {
  it('renders title, metadata, contents, sections and a missing evaluation', () => {
    expect(renderPlanMarkdown(plan())).toBe(
      [
        '# Marketing Plan: EcoBottle',
        [
          '- **Brief:** brief-001',
          '- **Generated:** 2026-01-01T00:00:00.000Z',
          '- **Version:** 1.1',
          '- **Status:** completed_degraded',
          '- **Quality score:** n/a',
          '- **Iterations:** 2 (selected iteration 1)',
          '- **Degraded sections:** swot_analysis',
        ].join('\n'),
        '## Table of Contents\n\n- [1. Executive Summary](#1-executive-summary)\n- [2. SWOT Analysis](#2-swot-analysis)',
        '## 1. Executive Summary\n\n**Product:** EcoBottle',
        `## 2. SWOT Analysis\n\n${DEGRADED_NOTICE}\n\n${EMPTY_SECTION_PLACEHOLDER}`,
        '---',
        `## Evaluation Summary\n\n${EVALUATION_UNAVAILABLE}`,
      ].join('\n\n') + '\n',
    );
  });

  it('renders the scorecard table and feedback lists', () => {
    const evaluation = buildScorecard({
      criterionScores: {
        consistency: 7,
        quality: 8,
        originality: 6.5,
        feasibility: 7,
        completeness: 9,
        ethics: 10,
      },
      strengths: ['Clear positioning'],
      weaknesses: [],
      recommendations: ['Break the budget down by channel'],
    });

    const markdown = renderPlanMarkdown(plan({ evaluation }));

    expect(markdown).toContain('**Overall score:** 7.9/10');
    expect(markdown).toContain('| Criterion | Score |\n|---|---|\n| Consistency | 7.0 |\n| Quality | 8.0 |\n| Originality | 6.5 |');
    expect(markdown).toContain('### Strengths\n\n- Clear positioning\n\n### Recommendations\n\n- Break the budget down by channel\n');
    expect(markdown).not.toContain('### Weaknesses');
  });
});
