import { EVALUATION_CRITERIA, type EvaluationScorecard, type MarketingPlan } from '../../types/index.js';
import { formatScore } from '../quality/scorecard.js';
import { EVALUATION_UNAVAILABLE } from '../pipeline/aggregator.js';
import { humanizeKey } from './format.js';

export const DEGRADED_NOTICE = '> **Note:** this section is incomplete; the stage that feeds it did not return usable content.';

/** GitHub-style heading anchor. */
export function headingAnchor(heading: string): string {
  return heading
    .toLowerCase()
    .replace(/[^a-z0-9 -]/g, '')
    .replace(/ /g, '-');
}

function renderMetadata(plan: MarketingPlan): string {
  const { metadata } = plan;
  const lines = [
    `- **Brief:** ${plan.briefId}`,
    `- **Generated:** ${metadata.generatedAt}`,
    `- **Version:** ${metadata.version}`,
    `- **Status:** ${metadata.status}`,
    `- **Quality score:** ${metadata.qualityScore === null ? 'n/a' : formatScore(metadata.qualityScore)}`,
    `- **Iterations:** ${metadata.iterationCount} (selected iteration ${metadata.selectedIteration})`,
  ];
  if (metadata.degradedSections.length > 0) {
    lines.push(`- **Degraded sections:** ${metadata.degradedSections.join(', ')}`);
  }
  return lines.join('\n');
}

function renderEvaluation(evaluation: EvaluationScorecard | null): string {
  if (!evaluation) {
    return `## Evaluation Summary\n\n${EVALUATION_UNAVAILABLE}`;
  }

  const rows = EVALUATION_CRITERIA.map(
    (criterion) => `| ${humanizeKey(criterion)} | ${evaluation.criterionScores[criterion].toFixed(1)} |`,
  );
  const list = (heading: string, items: string[]) =>
    items.length > 0 ? `### ${heading}\n\n${items.map((item) => `- ${item}`).join('\n')}` : '';

  return [
    '## Evaluation Summary',
    `**Overall score:** ${formatScore(evaluation.overallScore)}`,
    ['| Criterion | Score |', '|---|---|', ...rows].join('\n'),
    list('Strengths', evaluation.strengths),
    list('Weaknesses', evaluation.weaknesses),
    list('Recommendations', evaluation.recommendations),
  ].filter(Boolean).join('\n\n');
}

/**
 * Render a plan as a standalone Markdown document: title, metadata, table of
 * contents, the numbered sections and the evaluation summary.
 */
export function renderPlanMarkdown(plan: MarketingPlan): string {
  const numbered = plan.sections.map((section, i) => ({ section, heading: `${i + 1}. ${section.title}` }));

  const toc = numbered
    .map(({ heading }) => `- [${heading}](#${headingAnchor(heading)})`)
    .join('\n');

  const body = numbered.map(({ section, heading }) => {
    const parts = [`## ${heading}`];
    if (section.degraded) parts.push(DEGRADED_NOTICE);
    parts.push(section.content);
    return parts.join('\n\n');
  });

  return [
    `# Marketing Plan: ${plan.productName}`,
    renderMetadata(plan),
    `## Table of Contents\n\n${toc}`,
    ...body,
    '---',
    renderEvaluation(plan.evaluation),
  ].join('\n\n') + '\n';
}
