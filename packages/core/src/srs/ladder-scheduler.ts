import type { VocabItem } from '../domain/vocabulary';
import {
  INITIAL_INTERVAL_SECONDS,
  INTERVAL_LADDER,
  MASTERY_INTERVAL_SECONDS,
  addSeconds,
} from './intervals';

/**
 * Interval ladder scheduling
 *
 * Each vocabulary item carries a review interval. A correct answer moves the item
 * one rung up the ladder, chosen by the band its current interval falls into:
 *
 * - [0d, 2d)   -> 3 days
 * - [2d, 5d)   -> 7 days
 * - [5d, 10d)  -> 14 days
 * - [10d, 20d) -> 30 days
 * - [20d, ...) -> 60 days (terminal rung, the item becomes mastered)
 *
 * A wrong answer drops the item back to 1 day and clears mastery.
 * In both cases the next review is scheduled at `now + interval`.
 */

/**
 * Next interval in seconds after a correct answer.
 */
export function nextIntervalAfterCorrect(currentIntervalSeconds: number): number {
  for (const band of INTERVAL_LADDER) {
    if (currentIntervalSeconds < band.below) {
      return band.next;
    }
  }
  return MASTERY_INTERVAL_SECONDS;
}

/**
 * Applies one review outcome and returns the updated item. The input is not modified.
 */
export function recordOutcome(item: VocabItem, correct: boolean, now: Date = new Date()): VocabItem {
  if (!correct) {
    return {
      ...item,
      reviewIntervalSeconds: INITIAL_INTERVAL_SECONDS,
      mastered: false,
      lastReviewedAt: now,
      nextReviewAt: addSeconds(now, INITIAL_INTERVAL_SECONDS),
    };
  }

  const interval = nextIntervalAfterCorrect(item.reviewIntervalSeconds);

  return {
    ...item,
    reviewIntervalSeconds: interval,
    // Below the terminal rung the flag is left as it was.
    mastered: interval >= MASTERY_INTERVAL_SECONDS ? true : item.mastered,
    lastReviewedAt: now,
    nextReviewAt: addSeconds(now, interval),
  };
}

export function isDue(item: VocabItem, now: Date): boolean {
  return item.nextReviewAt.getTime() <= now.getTime();
}
