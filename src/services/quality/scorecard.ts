// Evaluation scorecard arithmetic. The evaluator returns six criterion scores;
// the overall score is always derived here, never taken from the model.

import { EVALUATION_CRITERIA, type CriterionScores, type EvaluationScorecard } from '../../types/index.js';

export const CRITERION_DESCRIPTIONS: Record<keyof CriterionScores, string> = {
  consistency: 'Alignment between sections, coherent narrative, no contradictions',
  quality: 'Depth of analysis, actionability, clarity, professional presentation',
  originality: 'Creative differentiation, unique positioning, innovative tactics',
  feasibility: 'Realistic goals, achievable tactics, appropriate budget allocation',
  completeness: 'All required sections present, comprehensive coverage',
  ethics: 'No misleading claims, respectful messaging, responsible practices',
};

export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

export function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}

export function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export function computeOverallScore(scores: CriterionScores): number {
  const total = EVALUATION_CRITERIA.reduce((sum, criterion) => sum + scores[criterion], 0);
  return roundToTenth(total / EVALUATION_CRITERIA.length);
}

export function buildScorecard(input: Omit<EvaluationScorecard, 'overallScore'>): EvaluationScorecard {
  return {
    criterionScores: { ...input.criterionScores },
    overallScore: computeOverallScore(input.criterionScores),
    strengths: [...input.strengths],
    weaknesses: [...input.weaknesses],
    recommendations: [...input.recommendations],
  };
}

export function meetsQualityThreshold(scorecard: EvaluationScorecard, threshold: number): boolean {
  return scorecard.overallScore >= threshold;
}

export function formatScore(score: number): string {
  return `${score.toFixed(1)}/10`;
}
