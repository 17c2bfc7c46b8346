import { describe, it, expect } from 'vitest';
import {
  FeedbackSchema,
  bandLabel,
  parseBandLevel,
} from '../../src/domain/feedback';
import { BandDescriptor } from '../../src/domain/enums';
import { createVocabItem } from '../../src/domain/vocabulary';
import { SentenceSchema, createSentence } from '../../src/domain/sentence';
import { isValidSchema } from '../../src/validation/validator';
import { NOW, daysFrom } from '../fixtures';

const criterion = { band: 6.5, comment: 'Adequate range' };

const feedback = {
  overallBand: 6.5,
  criteria: {
    lexicalResource: criterion,
    grammaticalRange: criterion,
    coherence: criterion,
    taskAchievement: criterion,
  },
  goodPoints: ['Clear meaning'],
  issues: [{ word: 'very big', criterion: 'lexicalResource', reason: 'Too informal' }],
  upgrades: [
    {
      original: 'very big',
      context: 'a very big problem',
      alternatives: [
        {
          word: 'substantial',
          pos: 'adjective',
          meaning: 'large in size or importance',
          example: 'a substantial problem',
          meaningVi: 'đáng kể',
          bandLevel: '7.0+',
        },
      ],
    },
  ],
  improvedSentence: 'Traffic congestion is a substantial problem.',
  explanation: 'Use more precise adjectives.',
};

describe('feedback domain', () => {
  describe('FeedbackSchema', () => {
    it('should accept a complete feedback payload', () => {
      expect(isValidSchema(FeedbackSchema, feedback)).toBe(true);
    });

    it('should reject bands off the half-band grid', () => {
      expect(isValidSchema(FeedbackSchema, { ...feedback, overallBand: 6.3 })).toBe(false);
    });

    it('should reject bands above 9', () => {
      expect(isValidSchema(FeedbackSchema, { ...feedback, overallBand: 9.5 })).toBe(false);
    });

    it('should reject a payload missing a criterion', () => {
      const criteria = {
        lexicalResource: criterion,
        grammaticalRange: criterion,
        taskAchievement: criterion,
      };
      expect(isValidSchema(FeedbackSchema, { ...feedback, criteria })).toBe(false);
    });
  });

  describe('bandLabel', () => {
    it('should label each band range', () => {
      expect(bandLabel(9)).toBe(BandDescriptor.EXPERT);
      expect(bandLabel(8.5)).toBe(BandDescriptor.EXPERT);
      expect(bandLabel(8)).toBe(BandDescriptor.VERY_GOOD);
      expect(bandLabel(7.5)).toBe(BandDescriptor.GOOD);
      expect(bandLabel(6)).toBe(BandDescriptor.COMPETENT);
      expect(bandLabel(5.5)).toBe(BandDescriptor.MODEST);
      expect(bandLabel(4.5)).toBe(BandDescriptor.LIMITED);
    });
  });

  describe('parseBandLevel', () => {
    it('should ignore a trailing plus', () => {
      expect(parseBandLevel('7.0+')).toBe(7);
      expect(parseBandLevel('8.5')).toBe(8.5);
    });

    it('should fall back to 6.0 for unparsable levels', () => {
      expect(parseBandLevel('advanced')).toBe(6);
      expect(parseBandLevel('')).toBe(6);
    });
  });

  describe('createVocabItem', () => {
    it('should build a new item due one day after it was added', () => {
      const alternative = feedback.upgrades[0].alternatives[0];
      const item = createVocabItem(alternative, 'very big', 'a very big problem', NOW);

      expect(item).toMatchObject({
        word: 'substantial',
        partOfSpeech: 'adjective',
        meaning: 'large in size or importance',
        meaningLocalized: 'đáng kể',
        example: 'a substantial problem',
        originalWord: 'very big',
        context: 'a very big problem',
        level: '7.0+',
        addedAt: NOW,
        lastReviewedAt: null,
        reviewIntervalSeconds: 86400,
        mastered: false,
      });
      expect(item.nextReviewAt).toEqual(daysFrom(NOW, 1));
      expect(item.id).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('createSentence', () => {
    it('should assign a uuid to the payload', () => {
      const sentence = createSentence({
        vietnamese: 'Tôi thích đọc sách.',
        topic: 'Education',
        targetBand: '6.5',
        hint: 'Use a gerund',
        keyStructures: ['like + V-ing'],
      });

      expect(isValidSchema(SentenceSchema, sentence)).toBe(true);
      expect(sentence.vietnamese).toBe('Tôi thích đọc sách.');
    });
  });
});
