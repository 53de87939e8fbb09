import { z } from 'zod';
import type {
  AssessmentResult,
  CategoryAssessment,
  ExtractedDetails,
  RequirementCategory,
  ScoredBullet,
} from '../types.js';
import { REQUIREMENT_CATEGORIES } from '../types.js';

const ScoredBulletSchema = z.object({
  requirement: z.string().catch(''),
  score: z.coerce.number().catch(0),
  rationale: z.string().catch(''),
});

export const AssessmentResponseSchema = z.object({
  responsibilities: z.array(ScoredBulletSchema).catch([]).default([]),
  qualifications: z.array(ScoredBulletSchema).catch([]).default([]),
  skills: z.array(ScoredBulletSchema).catch([]).default([]),
});

export type AssessmentResponse = z.output<typeof AssessmentResponseSchema>;

export const EMPTY_ASSESSMENT_RESPONSE: AssessmentResponse = {
  responsibilities: [],
  qualifications: [],
  skills: [],
};

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Relevancy in [0,1], 2 decimals. Non-finite scores count as 0. */
export function normalizeBulletScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return round(Math.min(1, Math.max(0, score)), 2);
}

/** mean(bullets) × 100 to 1 decimal; null for a category with no bullets. */
export function categoryScore(bullets: ScoredBullet[]): number | null {
  if (bullets.length === 0) return null;
  return round(mean(bullets.map((b) => b.score)) * 100, 1);
}

export function overallScore(categories: Record<RequirementCategory, CategoryAssessment>): number | null {
  const scores = REQUIREMENT_CATEGORIES.map((c) => categories[c].score).filter((s): s is number => s !== null);
  return scores.length === 0 ? null : round(mean(scores), 1);
}

/**
 * Aligns the model's per-bullet scores with the requested requirements. Each
 * requested requirement gets the score of the response bullet with the same
 * text, else the one at the same position; unmatched requirements score 0.
 */
export function scoreAssessment(
  jobId: string,
  requirements: ExtractedDetails,
  response: AssessmentResponse,
): AssessmentResult {
  const build = (category: RequirementCategory): CategoryAssessment => {
    const answered = response[category];
    const byText = new Map(answered.map((b) => [b.requirement.trim().toLowerCase(), b]));
    const bullets: ScoredBullet[] = requirements[category].map((item, index) => {
      const match = byText.get(item.requirement.trim().toLowerCase()) ?? answered[index];
      return {
        requirement: item.requirement,
        score: normalizeBulletScore(match ? match.score : 0),
        rationale: match ? match.rationale : 'No assessment returned for this requirement.',
      };
    });
    return { bullets, score: categoryScore(bullets) };
  };

  const categories = {
    responsibilities: build('responsibilities'),
    qualifications: build('qualifications'),
    skills: build('skills'),
  };
  return { jobId, categories, overall: overallScore(categories) };
}
