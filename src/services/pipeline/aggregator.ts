// Merges stage payloads into the fixed 12-section plan. Pure: no generation,
// no I/O.

import { formatScore } from '../quality/scorecard.js';
import { leadingExcerpt, renderContent } from '../plan/format.js';
import { PLAN_SECTIONS } from '../plan/sections.js';
import type { JsonValue } from '../../utils/json.js';
import type {
  EvaluationScorecard,
  PlanStatus,
  ProductBrief,
  ResearchPayload,
  SectionDraft,
  SectionId,
  SourceStage,
  StrategyPayload,
} from '../../types/index.js';

export const EVALUATION_UNAVAILABLE =
  'Evaluation unavailable: the evaluation stage did not return a usable scorecard for this plan.';

export const EMPTY_SECTION_PLACEHOLDER = 'No content was generated for this section.';

const SUMMARY_LIST_LIMIT = 3;

export interface AggregateInput {
  brief: ProductBrief;
  research: ResearchPayload;
  strategy: StrategyPayload;
  evaluation: EvaluationScorecard | null;
}

export interface AggregatedPlan {
  sections: SectionDraft[];
  degradedSections: SectionId[];
  status: PlanStatus;
}

type BodySectionId = Exclude<SectionId, 'executive_summary'>;

interface SectionSource {
  sourceStage: SourceStage;
  content: (research: ResearchPayload, strategy: StrategyPayload) => JsonValue;
}

const SECTION_SOURCES: Record<BodySectionId, SectionSource> = {
  mission_vision_value: { sourceStage: 'strategy', content: (_r, s) => s.missionVisionValue },
  situation_market_analysis: { sourceStage: 'research', content: (r) => r.marketAnalysis },
  swot_analysis: { sourceStage: 'research', content: (r) => r.swotAnalysis },
  target_audience_positioning: {
    sourceStage: 'strategy',
    content: (r, s) => ({ personas: r.personas, positioning: s.positioning }),
  },
  marketing_goals_kpis: { sourceStage: 'strategy', content: (_r, s) => s.marketingGoals },
  strategy_marketing_mix: { sourceStage: 'strategy', content: (_r, s) => s.marketingMix },
  tactics_action_plan: { sourceStage: 'strategy', content: (_r, s) => s.actionPlan },
  budget_resources: { sourceStage: 'strategy', content: (_r, s) => s.budget },
  monitoring_evaluation: { sourceStage: 'strategy', content: (_r, s) => s.monitoring },
  risks_mitigation: { sourceStage: 'strategy', content: (_r, s) => s.risks },
  launch_strategy: { sourceStage: 'strategy', content: (_r, s) => s.launchStrategy },
};

function isBodySection(id: SectionId): id is BodySectionId {
  return id !== 'executive_summary';
}

function buildBodySection(
  id: BodySectionId,
  title: string,
  research: ResearchPayload,
  strategy: StrategyPayload,
): SectionDraft {
  const source = SECTION_SOURCES[id];
  const content = renderContent(source.content(research, strategy));
  return {
    id,
    title,
    content: content || EMPTY_SECTION_PLACEHOLDER,
    sourceStage: source.sourceStage,
    degraded: content.length === 0,
  };
}

function formatAssessment(evaluation: EvaluationScorecard): string {
  const top = (items: string[]) => items.slice(0, SUMMARY_LIST_LIMIT).join('; ');
  return [
    `**Overall score:** ${formatScore(evaluation.overallScore)}`,
    '',
    `- **Strengths:** ${top(evaluation.strengths)}`,
    `- **Weaknesses:** ${top(evaluation.weaknesses)}`,
    `- **Recommendations:** ${top(evaluation.recommendations)}`,
  ].join('\n');
}

/**
 * Compose the executive summary from the leading line of every other section
 * and the evaluation headline.
 */
function buildExecutiveSummary(
  title: string,
  brief: ProductBrief,
  body: SectionDraft[],
  evaluation: EvaluationScorecard | null,
): SectionDraft {
  const product = brief.productCategory?.trim()
    ? `${brief.productName} (${brief.productCategory.trim()})`
    : brief.productName;

  const highlights = body
    .filter((section) => !section.degraded)
    .map((section) => [section.title, leadingExcerpt(section.content)] as const)
    .filter(([, excerpt]) => excerpt.length > 0)
    .map(([sectionTitle, excerpt]) => `- **${sectionTitle}:** ${excerpt}`);

  const blocks = [`**Product:** ${product}`];
  if (highlights.length > 0) {
    blocks.push(`### Plan Highlights\n\n${highlights.join('\n')}`);
  }
  blocks.push(`### Plan Assessment\n\n${evaluation ? formatAssessment(evaluation) : EVALUATION_UNAVAILABLE}`);

  return {
    id: 'executive_summary',
    title,
    content: blocks.join('\n\n'),
    sourceStage: 'aggregate',
    degraded: evaluation === null,
  };
}

export function aggregatePlan(input: AggregateInput): AggregatedPlan {
  const { brief, research, strategy, evaluation } = input;

  const body: SectionDraft[] = [];
  let summaryTitle = 'Executive Summary';
  for (const definition of PLAN_SECTIONS) {
    if (isBodySection(definition.id)) {
      body.push(buildBodySection(definition.id, definition.title, research, strategy));
    } else {
      summaryTitle = definition.title;
    }
  }

  const summary = buildExecutiveSummary(summaryTitle, brief, body, evaluation);
  const byId = new Map<SectionId, SectionDraft>();
  for (const section of [summary, ...body]) {
    byId.set(section.id, section);
  }

  const sections: SectionDraft[] = [];
  for (const definition of PLAN_SECTIONS) {
    const section = byId.get(definition.id);
    if (section) sections.push(section);
  }

  const degradedSections = sections.filter((s) => s.degraded).map((s) => s.id);

  return {
    sections,
    degradedSections,
    status: degradedSections.length > 0 ? 'completed_degraded' : 'completed',
  };
}
