import type { VocabItem } from '../src/domain/vocabulary';
import { SECONDS_PER_DAY } from '../src/srs/intervals';

export const NOW = new Date('2024-03-10T09:00:00.000Z');

export function daysFrom(date: Date, days: number): Date {
  return new Date(date.getTime() + days * SECONDS_PER_DAY * 1000);
}

export function makeItem(overrides: Partial<VocabItem> = {}): VocabItem {
  return {
    id: 'item-1',
    word: 'mitigate',
    partOfSpeech: 'verb',
    meaning: 'to make something less severe',
    meaningLocalized: 'giảm nhẹ',
    example: 'Planting trees can mitigate flooding.',
    originalWord: 'reduce',
    context: 'reduce the damage',
    level: '7.0',
    addedAt: daysFrom(NOW, -5),
    nextReviewAt: daysFrom(NOW, -1),
    lastReviewedAt: null,
    reviewIntervalSeconds: SECONDS_PER_DAY,
    mastered: false,
    ...overrides,
  };
}
