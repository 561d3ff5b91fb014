import { describe, it, expect } from 'vitest';
import {
  buildScorecard,
  clampScore,
  computeOverallScore,
  formatScore,
  meetsQualityThreshold,
} from '../../../src/services/quality/scorecard.js';

const scores = { consistency: 7, quality: 8, originality: 6, feasibility: 9, completeness: 7, ethics: 8 };

describe('scorecard', () => {
  it('computes the overall score as the mean of the six criteria', () => {
    expect(computeOverallScore(scores)).toBe(7.5);
  });

  it('rounds the mean to one decimal', () => {
    expect(computeOverallScore({ ...scores, quality: 7, originality: 7, feasibility: 7, ethics: 8 })).toBe(7.2);
  });

  it('clamps scores into [0, 10]', () => {
    expect(clampScore(12)).toBe(10);
    expect(clampScore(-1)).toBe(0);
    expect(clampScore(6.5)).toBe(6.5);
  });

  it('derives the overall score when building a scorecard', () => {
    const card = buildScorecard({ criterionScores: scores, strengths: ['a'], weaknesses: ['b'], recommendations: ['c'] });
    expect(card.overallScore).toBe(7.5);
    expect(card.strengths).toEqual(['a']);
  });

  it('meets the threshold at exactly the threshold', () => {
    const card = buildScorecard({ criterionScores: { ...scores, feasibility: 6, ethics: 8 }, strengths: [], weaknesses: [], recommendations: [] });
    expect(card.overallScore).toBe(7);
    expect(meetsQualityThreshold(card, 7)).toBe(true);
    expect(meetsQualityThreshold(card, 7.1)).toBe(false);
  });

  it('formats a score out of ten', () => {
    expect(formatScore(7)).toBe('7.0/10');
  });
});
