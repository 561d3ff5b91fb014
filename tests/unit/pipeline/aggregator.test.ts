import { describe, it, expect } from 'vitest';
import {
  aggregatePlan,
  EMPTY_SECTION_PLACEHOLDER,
  EVALUATION_UNAVAILABLE,
} from '../../../src/services/pipeline/aggregator.js';
import { SECTION_IDS } from '../../../src/services/plan/sections.js';
import {
  validateEvaluationPayload,
  validateResearchPayload,
  validateStrategyPayload,
} from '../../../src/services/stages/schemas.js';
import {
  evaluationPayload,
  researchPayload,
  strategyPayload,
  testBrief,
  validated,
} from '../../helpers/fixtures.js';

const research = validated(validateResearchPayload(researchPayload()));
const strategy = validated(validateStrategyPayload(strategyPayload()));
const evaluation = validated(validateEvaluationPayload(evaluationPayload(8)));

function section(plan: ReturnType<typeof aggregatePlan>, id: string) {
  const found = plan.sections.find((s) => s.id === id);
  if (!found) throw new Error(`section ${id} missing`);
  return found;
}

describe('aggregatePlan', () => {
  it('produces the twelve sections in document order', () => {
    const plan = aggregatePlan({ brief: testBrief, research, strategy, evaluation });

    expect(plan.sections.map((s) => s.id)).toEqual(SECTION_IDS);
    expect(plan.status).toBe('completed');
    expect(plan.degradedSections).toEqual([]);
  });

  it('attributes every section to the stage that produced it', () => {
    const plan = aggregatePlan({ brief: testBrief, research, strategy, evaluation });

    expect(plan.sections.map((s) => [s.id, s.sourceStage])).toEqual([
      ['executive_summary', 'aggregate'],
      ['mission_vision_value', 'strategy'],
      ['situation_market_analysis', 'research'],
      ['swot_analysis', 'research'],
      ['target_audience_positioning', 'strategy'],
      ['marketing_goals_kpis', 'strategy'],
      ['strategy_marketing_mix', 'strategy'],
      ['tactics_action_plan', 'strategy'],
      ['budget_resources', 'strategy'],
      ['monitoring_evaluation', 'strategy'],
      ['risks_mitigation', 'strategy'],
      ['launch_strategy', 'strategy'],
    ]);
  });

  it('fills research sections from the research payload', () => {
    const plan = aggregatePlan({ brief: testBrief, research, strategy, evaluation });
    const swot = section(plan, 'swot_analysis');

    expect(swot.sourceStage).toBe('research');
    expect(swot.content).toBe(
      '### Strengths\n\n- Recycled materials\n\n### Weaknesses\n\n- Unknown brand\n\n' +
        '### Opportunities\n\n- Corporate gifting\n\n### Threats\n\n- Cheap imports',
    );
  });

  it('combines personas and positioning for the audience section', () => {
    const plan = aggregatePlan({ brief: testBrief, research, strategy, evaluation });

    expect(section(plan, 'target_audience_positioning').content).toBe(
      '### Personas\n\n- **Name:** Commuter Carla\n- **Profile:** Office worker who cycles to work\n\n' +
        '### Positioning\n\n**Statement:** The bottle for people who care where their steel comes from.',
    );
  });

  it('summarizes the plan and the evaluation in the executive summary', () => {
    const plan = aggregatePlan({ brief: testBrief, research, strategy, evaluation });
    const summary = section(plan, 'executive_summary');

    expect(summary.sourceStage).toBe('aggregate');
    expect(summary.degraded).toBe(false);
    expect(summary.content.startsWith('**Product:** EcoBottle (Drinkware)\n\n### Plan Highlights\n\n')).toBe(true);
    expect(summary.content).toContain('- **Mission, Vision & Value Proposition:** Mission: Make reuse the default.');
    expect(summary.content.endsWith(
      '### Plan Assessment\n\n**Overall score:** 8.0/10\n\n' +
        '- **Strengths:** Clear positioning\n' +
        '- **Weaknesses:** Budget lacks detail\n' +
        '- **Recommendations:** Break the budget down by channel',
    )).toBe(true);
  });

  it('degrades the executive summary when no scorecard is available', () => {
    const plan = aggregatePlan({ brief: testBrief, research, strategy, evaluation: null });
    const summary = section(plan, 'executive_summary');

    expect(summary.degraded).toBe(true);
    expect(summary.content.endsWith(`### Plan Assessment\n\n${EVALUATION_UNAVAILABLE}`)).toBe(true);
    expect(plan.degradedSections).toEqual(['executive_summary']);
    expect(plan.status).toBe('completed_degraded');
  });

  it('marks a section without content as degraded and leaves it out of the highlights', () => {
    const plan = aggregatePlan({
      brief: testBrief,
      research,
      strategy: { ...strategy, budget: { total: '' } },
      evaluation,
    });
    const budget = section(plan, 'budget_resources');

    expect(budget.degraded).toBe(true);
    expect(budget.content).toBe(EMPTY_SECTION_PLACEHOLDER);
    expect(plan.degradedSections).toEqual(['budget_resources']);
    expect(section(plan, 'executive_summary').content).not.toContain('Budget & Resources');
  });
});
