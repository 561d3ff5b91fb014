import type { SectionId } from '../../types/index.js';

export interface SectionDefinition {
  id: SectionId;
  title: string;
  description: string;
}

/** The fixed plan outline, in document order. */
export const PLAN_SECTIONS: readonly SectionDefinition[] = [
  {
    id: 'executive_summary',
    title: 'Executive Summary',
    description: 'A brief overview of the entire plan: the product, the objectives, the strategy and the expected results.',
  },
  {
    id: 'mission_vision_value',
    title: 'Mission, Vision & Value Proposition',
    description: 'The goal and vision of the project, and why customers would choose the product.',
  },
  {
    id: 'situation_market_analysis',
    title: 'Situation & Market Analysis',
    description: 'The current situation and the external market, including competitors and PEST factors.',
  },
  {
    id: 'swot_analysis',
    title: 'SWOT Analysis',
    description: 'Strengths, weaknesses, opportunities and threats that affect the product.',
  },
  {
    id: 'target_audience_positioning',
    title: 'Target Audience & Positioning',
    description: 'Who the audience is and where the product sits relative to competitors.',
  },
  {
    id: 'marketing_goals_kpis',
    title: 'Marketing Goals & KPIs',
    description: 'SMART objectives and the indicators used to measure them.',
  },
  {
    id: 'strategy_marketing_mix',
    title: 'Strategy & Marketing Mix (7Ps)',
    description: 'Product, price, place, promotion, people, process and physical evidence.',
  },
  {
    id: 'tactics_action_plan',
    title: 'Tactics & Action Plan',
    description: 'Concrete actions and a timeline of activities.',
  },
  {
    id: 'budget_resources',
    title: 'Budget & Resources',
    description: 'Cost estimate, required resources and expected return.',
  },
  {
    id: 'monitoring_evaluation',
    title: 'Monitoring & Evaluation',
    description: 'How progress is measured and when the plan is reviewed.',
  },
  {
    id: 'risks_mitigation',
    title: 'Risks & Mitigation',
    description: 'Potential risks and how they are addressed.',
  },
  {
    id: 'launch_strategy',
    title: 'Launch Strategy',
    description: 'Product introduction, adoption strategy and launch phases.',
  },
];

export const SECTION_IDS: readonly SectionId[] = PLAN_SECTIONS.map((section) => section.id);
