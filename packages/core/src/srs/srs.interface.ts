import type { ReviewOutcome } from '../domain/enums';
import type { VocabItem } from '../domain/vocabulary';

/**
 * Options for building a review session
 */
export interface SessionOptions {
  /** Session size when nothing is due. */
  fallbackSize?: number;
  /** Maximum number of due items in one session. */
  dueCapSize?: number;
  /** Source of randomness for the shuffle, returns a value in [0, 1). */
  random?: () => number;
}

/**
 * Receives the single outcome reported for a reviewed item
 */
export type ReviewOutcomeHandler = (item: VocabItem, outcome: ReviewOutcome) => void | Promise<void>;

/**
 * Callbacks handed to a quiz variant for one item. Exactly one of them may be called.
 */
export interface ReviewCallbacks {
  onCorrect(): Promise<void>;
  onWrong(): Promise<void>;
}
