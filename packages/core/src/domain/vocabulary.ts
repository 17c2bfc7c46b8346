import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { INITIAL_INTERVAL_SECONDS, addSeconds } from '../srs/intervals';
import type { Alternative } from './feedback';

export const VocabItemSchema = z.object({
  id: z.string().min(1),
  word: z.string().min(1),
  partOfSpeech: z.string(),
  meaning: z.string(),
  meaningLocalized: z.string(),
  example: z.string(),
  originalWord: z.string(),
  context: z.string(),
  level: z.string(),
  addedAt: z.date(),
  nextReviewAt: z.date(),
  lastReviewedAt: z.date().nullable(),
  reviewIntervalSeconds: z.number().positive(),
  mastered: z.boolean(),
});

export type VocabItem = z.infer<typeof VocabItemSchema>;

export function createVocabItem(
  alternative: Alternative,
  originalWord: string,
  context: string,
  now: Date = new Date()
): VocabItem {
  return {
    id: uuidv4(),
    word: alternative.word,
    partOfSpeech: alternative.pos,
    meaning: alternative.meaning,
    meaningLocalized: alternative.meaningVi,
    example: alternative.example,
    originalWord,
    context,
    level: alternative.bandLevel,
    addedAt: now,
    nextReviewAt: addSeconds(now, INITIAL_INTERVAL_SECONDS),
    lastReviewedAt: null,
    reviewIntervalSeconds: INITIAL_INTERVAL_SECONDS,
    mastered: false,
  };
}
