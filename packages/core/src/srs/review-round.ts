import { ReviewOutcome } from '../domain/enums';
import type { VocabItem } from '../domain/vocabulary';
import type { ReviewCallbacks, ReviewOutcomeHandler } from './srs.interface';

export class DuplicateOutcomeError extends Error {
  public readonly itemId: string;

  constructor(itemId: string) {
    super(`Outcome already reported for item ${itemId}`);
    this.name = 'DuplicateOutcomeError';
    this.itemId = itemId;
  }
}

export class UnknownReviewItemError extends Error {
  public readonly itemId: string;

  constructor(itemId: string) {
    super(`Item ${itemId} is not part of this review round`);
    this.name = 'UnknownReviewItemError';
    this.itemId = itemId;
  }
}

/**
 * One pass over a review session. Hands out per-item callbacks to the quiz UI and
 * forwards each item's single outcome to the handler.
 */
export class ReviewRound {
  private readonly outcomes = new Map<string, ReviewOutcome>();
  private readonly itemIds: Set<string>;

  constructor(
    private readonly items: readonly VocabItem[],
    private readonly handler: ReviewOutcomeHandler
  ) {
    this.itemIds = new Set(items.map((item) => item.id));
  }

  get size(): number {
    return this.items.length;
  }

  get answeredCount(): number {
    return this.outcomes.size;
  }

  get correctCount(): number {
    return this.countOf(ReviewOutcome.CORRECT);
  }

  get wrongCount(): number {
    return this.countOf(ReviewOutcome.WRONG);
  }

  /** Fraction of items answered, 0 for an empty round. */
  get progress(): number {
    return this.items.length === 0 ? 0 : this.outcomes.size / this.items.length;
  }

  get isComplete(): boolean {
    return this.outcomes.size === this.items.length;
  }

  /** First item without an outcome, in session order. */
  current(): VocabItem | null {
    return this.items.find((item) => !this.outcomes.has(item.id)) ?? null;
  }

  outcomeOf(itemId: string): ReviewOutcome | undefined {
    return this.outcomes.get(itemId);
  }

  callbacksFor(item: VocabItem): ReviewCallbacks {
    if (!this.itemIds.has(item.id)) {
      throw new UnknownReviewItemError(item.id);
    }

    return {
      onCorrect: () => this.report(item, ReviewOutcome.CORRECT),
      onWrong: () => this.report(item, ReviewOutcome.WRONG),
    };
  }

  private report(item: VocabItem, outcome: ReviewOutcome): Promise<void> {
    if (this.outcomes.has(item.id)) {
      throw new DuplicateOutcomeError(item.id);
    }
    this.outcomes.set(item.id, outcome);
    return Promise.resolve(this.handler(item, outcome));
  }

  private countOf(outcome: ReviewOutcome): number {
    let count = 0;
    for (const value of this.outcomes.values()) {
      if (value === outcome) count++;
    }
    return count;
  }
}
