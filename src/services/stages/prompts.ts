// Prompt builders for the generation stages and the field assistant.

import { CRITERION_DESCRIPTIONS } from '../quality/scorecard.js';
import { EVALUATION_CRITERIA } from '../../types/index.js';
import type { BriefField, IterationFeedback, ProductBrief } from '../../types/index.js';
import type { StageInvokeOptions, StageRequest } from './types.js';

export interface StagePrompt {
  systemPrompt: string;
  prompt: string;
  temperature: number;
  json: boolean;
}

// ---------------------------------------------------------------------------
// Brief formatting
// ---------------------------------------------------------------------------

interface BriefGroup {
  heading: string;
  fields: Array<[BriefField, string]>;
}

export const BRIEF_GROUPS: BriefGroup[] = [
  {
    heading: 'Product',
    fields: [
      ['productName', 'Name'],
      ['productCategory', 'Category'],
      ['productFeatures', 'Features'],
      ['productUsp', 'Unique selling points'],
      ['productBranding', 'Branding & packaging'],
      ['productVariants', 'Variants'],
    ],
  },
  {
    heading: 'Target audience',
    fields: [
      ['targetPrimary', 'Primary audience'],
      ['targetSecondary', 'Secondary audience'],
      ['targetDemographics', 'Demographics'],
      ['targetPsychographics', 'Psychographics'],
      ['targetPersonas', 'Personas'],
      ['targetProblems', 'Needs & problems solved'],
    ],
  },
  {
    heading: 'Market & competition',
    fields: [
      ['marketSize', 'Market size'],
      ['competitors', 'Competitors'],
      ['competitorPricing', 'Competitor pricing'],
      ['competitorDistribution', 'Competitor distribution'],
      ['marketBenchmarks', 'Benchmarks'],
    ],
  },
  {
    heading: 'Pricing',
    fields: [
      ['productionCost', 'Production cost'],
      ['desiredMargin', 'Desired margin'],
      ['suggestedPrice', 'Suggested price'],
      ['priceElasticity', 'Price elasticity'],
    ],
  },
  {
    heading: 'Promotion',
    fields: [
      ['marketingChannels', 'Marketing channels'],
      ['historicalCampaigns', 'Past campaigns'],
      ['marketingBudget', 'Marketing budget'],
      ['toneOfVoice', 'Tone of voice'],
    ],
  },
  {
    heading: 'Distribution',
    fields: [
      ['distributionChannels', 'Distribution channels'],
      ['logistics', 'Logistics'],
      ['seasonality', 'Seasonality'],
    ],
  },
  {
    heading: 'Timing',
    fields: [
      ['launchDate', 'Launch date'],
      ['seasonalFactors', 'Seasonal factors'],
      ['campaignTimeline', 'Campaign timeline'],
    ],
  },
  {
    heading: 'Goals',
    fields: [
      ['salesGoals', 'Sales goals'],
      ['marketShareGoals', 'Market share goals'],
      ['brandAwarenessGoals', 'Brand awareness goals'],
      ['successMetrics', 'Success metrics'],
    ],
  },
];

function fieldText(value: string | readonly string[] | undefined): string {
  if (value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  return value.map((item) => item.trim()).filter(Boolean).join(', ');
}

/**
 * Render the filled-in parts of a brief as grouped bullet lists. Blank fields
 * and empty groups are left out.
 */
export function formatBrief(brief: Partial<ProductBrief>): string {
  const blocks: string[] = [];

  for (const group of BRIEF_GROUPS) {
    const lines = group.fields
      .map(([field, label]) => [label, fieldText(brief[field])] as const)
      .filter(([, text]) => text.length > 0)
      .map(([label, text]) => `- ${label}: ${text}`);

    if (lines.length > 0) {
      blocks.push(`### ${group.heading}\n${lines.join('\n')}`);
    }
  }

  return blocks.length > 0 ? blocks.join('\n\n') : 'No information provided yet.';
}

// ---------------------------------------------------------------------------
// Shared blocks
// ---------------------------------------------------------------------------

export function formatFeedback(feedback: IterationFeedback | undefined): string {
  if (!feedback) return '';

  const bullets = (items: string[]) => items.map((item) => `- ${item}`).join('\n');
  const parts = [
    `## Reviewer feedback on draft ${feedback.fromIteration} (scored ${feedback.previousScore.toFixed(1)}/10)`,
    'A previous draft of this plan was reviewed. Address every point below in this version.',
  ];
  if (feedback.weaknesses.length > 0) {
    parts.push(`Weaknesses:\n${bullets(feedback.weaknesses)}`);
  }
  if (feedback.recommendations.length > 0) {
    parts.push(`Recommendations:\n${bullets(feedback.recommendations)}`);
  }
  return parts.join('\n\n');
}

export function formatConformance(missingKeys: string[] | undefined): string {
  if (!missingKeys || missingKeys.length === 0) return '';
  return [
    '## Correction required',
    `Your previous response was missing or left empty these keys: ${missingKeys.join(', ')}.`,
    'Return the complete JSON object again with every key present and filled in.',
  ].join('\n');
}

const JSON_ONLY = 'Respond with a single JSON object and nothing else: no code fences, no commentary.';

function joinBlocks(...blocks: string[]): string {
  return blocks.filter((block) => block.trim().length > 0).join('\n\n');
}

function stringify(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

// ---------------------------------------------------------------------------
// Stage prompts
// ---------------------------------------------------------------------------

const RESEARCH_SYSTEM = 'You are a senior market research analyst. You write specific, evidence-minded analysis grounded in the product brief. Always answer in English with valid JSON.';

const STRATEGY_SYSTEM = 'You are a marketing strategist who turns market research into an actionable marketing plan. Be concrete: numbers, owners, timeframes. Always answer in English with valid JSON.';

const EVALUATION_SYSTEM = 'You are an expert marketing plan evaluator. Provide honest, constructive assessments. Be critical but fair. Always respond with valid JSON.';

const FIELD_SYSTEM = 'You are a helpful marketing assistant that provides concise, practical suggestions for product marketing plans. Keep responses brief and directly usable.';

const RESEARCH_SHAPE = `{
  "marketAnalysis": {
    "currentSituation": "...",
    "marketSize": "...",
    "growthRate": "...",
    "trends": ["..."],
    "competitors": [{ "name": "...", "strengths": "...", "positioning": "..." }],
    "pestAnalysis": { "political": "...", "economic": "...", "social": "...", "technological": "..." },
    "opportunities": ["..."]
  },
  "personas": [
    { "name": "...", "profile": "...", "goals": "...", "painPoints": "...", "channels": "..." }
  ],
  "swotAnalysis": {
    "strengths": ["..."],
    "weaknesses": ["..."],
    "opportunities": ["..."],
    "threats": ["..."]
  }
}`;

const STRATEGY_SHAPE = `{
  "missionVisionValue": { "mission": "...", "vision": "...", "valueProposition": "..." },
  "positioning": { "statement": "...", "differentiators": ["..."], "brandPersonality": "..." },
  "marketingGoals": { "goals": ["..."], "kpis": [{ "metric": "...", "target": "...", "timeframe": "..." }] },
  "marketingMix": { "product": "...", "price": "...", "place": "...", "promotion": "...", "people": "...", "process": "...", "physicalEvidence": "..." },
  "actionPlan": [{ "phase": "...", "timing": "...", "activities": ["..."], "owner": "..." }],
  "budget": { "total": "...", "allocation": [{ "item": "...", "amount": "...", "share": "..." }] },
  "monitoring": { "metrics": ["..."], "tools": ["..."], "reviewCadence": "..." },
  "risks": [{ "risk": "...", "likelihood": "...", "impact": "...", "mitigation": "..." }],
  "launchStrategy": { "preLaunch": ["..."], "launch": ["..."], "postLaunch": ["..."] }
}`;

function evaluationShape(): string {
  const scores = EVALUATION_CRITERIA.map((criterion) => `    "${criterion}": 0`).join(',\n');
  return `{
  "criterionScores": {
${scores}
  },
  "strengths": ["..."],
  "weaknesses": ["..."],
  "recommendations": ["..."]
}`;
}

function researchPrompt(brief: ProductBrief, feedback: IterationFeedback | undefined): string {
  return joinBlocks(
    `Perform a situation and market analysis for ${brief.productName}, describe its buyer personas and prepare a SWOT analysis.`,
    `## Product brief\n${formatBrief(brief)}`,
    formatFeedback(feedback),
    [
      'Cover the current market situation, size, growth and trends; the top competitors and how they position themselves;',
      'PEST factors; and concrete market opportunities. Describe two to four distinct personas.',
      'Each SWOT quadrant should list four or five specific points.',
    ].join(' '),
    `Return JSON with exactly this structure:\n${RESEARCH_SHAPE}`,
    JSON_ONLY,
  );
}

function strategyPrompt(
  brief: ProductBrief,
  research: unknown,
  feedback: IterationFeedback | undefined,
): string {
  return joinBlocks(
    `Build the marketing strategy for ${brief.productName} from the brief and the research below.`,
    `## Product brief\n${formatBrief(brief)}`,
    `## Market research\n${stringify(research)}`,
    formatFeedback(feedback),
    [
      'Write the mission, vision and value proposition; the positioning; SMART goals with KPIs;',
      'the 7Ps marketing mix; a phased action plan; a budget allocation; the monitoring plan;',
      'risks with mitigations; and a launch strategy. Keep it consistent with the brief\'s budget and timeline.',
    ].join(' '),
    `Return JSON with exactly this structure:\n${STRATEGY_SHAPE}`,
    JSON_ONLY,
  );
}

function evaluationPrompt(brief: ProductBrief, research: unknown, strategy: unknown): string {
  const criteria = EVALUATION_CRITERIA
    .map((criterion, i) => `${i + 1}. ${criterion.toUpperCase()} (0-10): ${CRITERION_DESCRIPTIONS[criterion]}`)
    .join('\n');

  return joinBlocks(
    `Evaluate this marketing plan for ${brief.productName}.`,
    `## Product brief\n${formatBrief(brief)}`,
    `## Research\n${stringify(research)}`,
    `## Strategy\n${stringify(strategy)}`,
    `## Criteria\nScore each criterion from 0 to 10.\n${criteria}`,
    'List the plan\'s main strengths and weaknesses, and recommendations that would most raise its score.',
    `Return JSON with exactly this structure:\n${evaluationShape()}`,
    JSON_ONLY,
  );
}

// ---------------------------------------------------------------------------
// Field assistant
// ---------------------------------------------------------------------------

export const FIELD_PROMPTS: Partial<Record<BriefField, string>> = {
  productCategory: 'Based on this product information, suggest a concise product category (1-3 words):',
  productFeatures: 'Based on this product, list 3-5 key features and functionalities:',
  productUsp: 'Based on this product, identify 2-3 unique selling points that differentiate it:',
  productBranding: 'Based on this product, suggest branding and packaging ideas:',
  targetPrimary: 'Based on this product, describe the primary target audience:',
  targetDemographics: 'Based on this product and target audience, provide demographic details (age, gender, location, income):',
  targetPsychographics: 'Based on this product and target audience, describe psychographic details (interests, lifestyle, values):',
  targetProblems: 'Based on this product, what customer needs or problems does it solve?',
  competitors: 'Based on this product category, list 3-5 key competitors:',
  suggestedPrice: 'Based on this product and market, suggest a price or price range:',
  marketingChannels: 'Based on this product and target audience, suggest the best marketing channels:',
  toneOfVoice: 'Based on this product and target audience, suggest the brand\'s tone of voice and key message:',
  salesGoals: 'Based on this product and market, suggest realistic sales goals:',
};

function isBriefField(name: string): name is BriefField {
  return BRIEF_GROUPS.some((group) => group.fields.some(([field]) => field === name));
}

export function fieldPrompt(fieldName: string, values: Partial<ProductBrief>): string {
  const instruction = (isBriefField(fieldName) ? FIELD_PROMPTS[fieldName] : undefined)
    ?? `Based on the following product information, suggest a value for '${fieldName}':`;

  return joinBlocks(
    `${instruction}\n${formatBrief(values)}`,
    'Provide a clear, concise, and actionable suggestion. Keep it brief and directly usable.',
  );
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export function buildStagePrompt(request: StageRequest, options: StageInvokeOptions = {}): StagePrompt {
  const conformance = formatConformance(options.missingKeys);

  switch (request.stage) {
    case 'research':
      return {
        systemPrompt: RESEARCH_SYSTEM,
        prompt: joinBlocks(researchPrompt(request.brief, request.feedback), conformance),
        temperature: 0.7,
        json: true,
      };
    case 'strategy':
      return {
        systemPrompt: STRATEGY_SYSTEM,
        prompt: joinBlocks(strategyPrompt(request.brief, request.research, request.feedback), conformance),
        temperature: 0.7,
        json: true,
      };
    case 'evaluation':
      return {
        systemPrompt: EVALUATION_SYSTEM,
        prompt: joinBlocks(evaluationPrompt(request.brief, request.research, request.strategy), conformance),
        temperature: 0.3,
        json: true,
      };
    case 'field_suggestion':
      return {
        systemPrompt: FIELD_SYSTEM,
        prompt: fieldPrompt(request.fieldName, request.values),
        temperature: 0.7,
        json: false,
      };
  }
}
