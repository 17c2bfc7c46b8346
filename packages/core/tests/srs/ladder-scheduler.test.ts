import { describe, it, expect } from 'vitest';
import {
  isDue,
  nextIntervalAfterCorrect,
  recordOutcome,
} from '../../src/srs/ladder-scheduler';
import { MASTERY_INTERVAL_SECONDS, SECONDS_PER_DAY } from '../../src/srs/intervals';
import { NOW, daysFrom, makeItem } from '../fixtures';

const DAY = SECONDS_PER_DAY;

describe('ladder scheduler', () => {
  describe('nextIntervalAfterCorrect', () => {
    it('should map each band to the next rung', () => {
      expect(nextIntervalAfterCorrect(0)).toBe(3 * DAY);
      expect(nextIntervalAfterCorrect(1 * DAY)).toBe(3 * DAY);
      expect(nextIntervalAfterCorrect(3 * DAY)).toBe(7 * DAY);
      expect(nextIntervalAfterCorrect(7 * DAY)).toBe(14 * DAY);
      expect(nextIntervalAfterCorrect(14 * DAY)).toBe(30 * DAY);
      expect(nextIntervalAfterCorrect(30 * DAY)).toBe(60 * DAY);
    });

    it('should treat band lower bounds as inclusive', () => {
      expect(nextIntervalAfterCorrect(2 * DAY - 1)).toBe(3 * DAY);
      expect(nextIntervalAfterCorrect(2 * DAY)).toBe(7 * DAY);
      expect(nextIntervalAfterCorrect(5 * DAY)).toBe(14 * DAY);
      expect(nextIntervalAfterCorrect(10 * DAY)).toBe(30 * DAY);
      expect(nextIntervalAfterCorrect(20 * DAY)).toBe(60 * DAY);
    });

    it('should stay at the terminal rung', () => {
      expect(nextIntervalAfterCorrect(60 * DAY)).toBe(MASTERY_INTERVAL_SECONDS);
      expect(nextIntervalAfterCorrect(365 * DAY)).toBe(MASTERY_INTERVAL_SECONDS);
    });
  });

  describe('recordOutcome', () => {
    it('should climb 1 -> 3 -> 7 -> 14 -> 30 -> 60 days on consecutive correct answers', () => {
      let item = makeItem();
      const seen: number[] = [];

      for (let i = 0; i < 5; i++) {
        item = recordOutcome(item, true, NOW);
        seen.push(item.reviewIntervalSeconds / DAY);
      }

      expect(seen).toEqual([3, 7, 14, 30, 60]);
      expect(item.mastered).toBe(true);
    });

    it('should only mark mastery on reaching the terminal rung', () => {
      const item = recordOutcome(makeItem({ reviewIntervalSeconds: 14 * DAY }), true, NOW);
      expect(item.reviewIntervalSeconds).toBe(30 * DAY);
      expect(item.mastered).toBe(false);
    });

    it('should schedule the next review at now plus the new interval', () => {
      const item = recordOutcome(makeItem({ reviewIntervalSeconds: 3 * DAY }), true, NOW);
      expect(item.nextReviewAt).toEqual(daysFrom(NOW, 7));
      expect(item.lastReviewedAt).toEqual(NOW);
    });

    it('should reset to one day and clear mastery on a wrong answer', () => {
      const mastered = makeItem({ reviewIntervalSeconds: 60 * DAY, mastered: true });
      const item = recordOutcome(mastered, false, NOW);

      expect(item.reviewIntervalSeconds).toBe(DAY);
      expect(item.mastered).toBe(false);
      expect(item.lastReviewedAt).toEqual(NOW);
      expect(item.nextReviewAt).toEqual(daysFrom(NOW, 1));
    });

    it('should not modify the input item', () => {
      const original = makeItem();
      recordOutcome(original, true, NOW);
      expect(original.reviewIntervalSeconds).toBe(DAY);
      expect(original.lastReviewedAt).toBeNull();
    });

    it('should keep other fields unchanged', () => {
      const original = makeItem();
      const item = recordOutcome(original, true, NOW);
      expect(item.id).toBe(original.id);
      expect(item.word).toBe(original.word);
      expect(item.addedAt).toBe(original.addedAt);
    });
  });

  describe('isDue', () => {
    it('should include items scheduled exactly now', () => {
      expect(isDue(makeItem({ nextReviewAt: NOW }), NOW)).toBe(true);
    });

    it('should exclude items scheduled in the future', () => {
      expect(isDue(makeItem({ nextReviewAt: daysFrom(NOW, 1) }), NOW)).toBe(false);
    });
  });
});
