import { z } from 'zod';
import { BandDescriptor } from './enums';

export const DEFAULT_BAND_LEVEL = 6.0;

export const BandScoreSchema = z
  .number()
  .min(0)
  .max(9)
  .refine((band) => Number.isInteger(band * 2), { message: 'Band must be a multiple of 0.5' });

export const CriterionScoreSchema = z.object({
  band: BandScoreSchema,
  comment: z.string(),
});

export type CriterionScore = z.infer<typeof CriterionScoreSchema>;

export const CriteriaScoresSchema = z.object({
  lexicalResource: CriterionScoreSchema,
  grammaticalRange: CriterionScoreSchema,
  coherence: CriterionScoreSchema,
  taskAchievement: CriterionScoreSchema,
});

export type CriteriaScores = z.infer<typeof CriteriaScoresSchema>;

export const IssueSchema = z.object({
  word: z.string(),
  criterion: z.string().min(1),
  reason: z.string(),
});

export type Issue = z.infer<typeof IssueSchema>;

export const AlternativeSchema = z.object({
  word: z.string().min(1),
  pos: z.string(),
  meaning: z.string(),
  example: z.string(),
  meaningVi: z.string(),
  bandLevel: z.string(),
});

export type Alternative = z.infer<typeof AlternativeSchema>;

export const UpgradeSchema = z.object({
  original: z.string(),
  context: z.string(),
  alternatives: z.array(AlternativeSchema),
});

export type Upgrade = z.infer<typeof UpgradeSchema>;

export const FeedbackSchema = z.object({
  overallBand: BandScoreSchema,
  criteria: CriteriaScoresSchema,
  goodPoints: z.array(z.string()),
  issues: z.array(IssueSchema),
  upgrades: z.array(UpgradeSchema),
  improvedSentence: z.string(),
  explanation: z.string(),
});

export type Feedback = z.infer<typeof FeedbackSchema>;

export function bandLabel(band: number): BandDescriptor {
  if (band >= 8.5) return BandDescriptor.EXPERT;
  if (band >= 8.0) return BandDescriptor.VERY_GOOD;
  if (band >= 7.0) return BandDescriptor.GOOD;
  if (band >= 6.0) return BandDescriptor.COMPETENT;
  if (band >= 5.0) return BandDescriptor.MODEST;
  return BandDescriptor.LIMITED;
}

/**
 * Reads a band level such as "7.0" or "7.0+" as a number.
 */
export function parseBandLevel(level: string, fallback: number = DEFAULT_BAND_LEVEL): number {
  const value = Number.parseFloat(level.trim().replace(/\+$/, ''));
  return Number.isFinite(value) ? value : fallback;
}
