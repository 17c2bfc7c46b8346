import { ReviewOutcome } from '../domain/enums';
import { parseBandLevel, type Upgrade } from '../domain/feedback';
import { createVocabItem, type VocabItem } from '../domain/vocabulary';
import type { VocabBankRepository } from '../persistence/repositories';
import { recordOutcome } from '../srs/ladder-scheduler';
import { dueCount, masteredCount, selectSession } from '../srs/review-queue';
import { ReviewRound } from '../srs/review-round';
import type { SessionOptions } from '../srs/srs.interface';

export class VocabBankService {
  private items: VocabItem[] = [];

  constructor(
    private readonly repository: VocabBankRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Replace the in-memory bank with the persisted one
   */
  async load(): Promise<readonly VocabItem[]> {
    this.items = await this.repository.load();
    return this.items;
  }

  list(): readonly VocabItem[] {
    return this.items;
  }

  contains(word: string): boolean {
    return this.items.some((item) => item.word === word);
  }

  /**
   * Save every alternative of an upgrade whose word is not in the bank yet
   * @returns The items that were added
   */
  async addUpgrade(upgrade: Upgrade, now: Date = this.clock()): Promise<VocabItem[]> {
    const added: VocabItem[] = [];

    for (const alternative of upgrade.alternatives) {
      if (this.contains(alternative.word)) {
        continue;
      }
      const item = createVocabItem(alternative, upgrade.original, upgrade.context, now);
      this.items.push(item);
      added.push(item);
    }

    await this.repository.save(this.items);
    return added;
  }

  async remove(id: string): Promise<boolean> {
    const before = this.items.length;
    this.items = this.items.filter((item) => item.id !== id);
    if (this.items.length === before) {
      return false;
    }
    await this.repository.save(this.items);
    return true;
  }

  /**
   * Apply a review outcome to one item and persist the bank
   * @returns The updated item, or null when no item has this id
   */
  async recordOutcome(id: string, correct: boolean, now: Date = this.clock()): Promise<VocabItem | null> {
    const index = this.items.findIndex((item) => item.id === id);
    if (index === -1) {
      return null;
    }

    const updated = recordOutcome(this.items[index], correct, now);
    this.items = this.items.map((item, i) => (i === index ? updated : item));
    await this.repository.save(this.items);
    return updated;
  }

  dueCount(now: Date = this.clock()): number {
    return dueCount(this.items, now);
  }

  masteredCount(): number {
    return masteredCount(this.items);
  }

  /**
   * Highest band level first; the sort is stable for equal levels
   */
  sortedByLevel(): VocabItem[] {
    return [...this.items].sort((a, b) => parseBandLevel(b.level) - parseBandLevel(a.level));
  }

  /**
   * Build a review round over the current session, recording each outcome in the bank
   */
  startReview(options: SessionOptions = {}, now: Date = this.clock()): ReviewRound {
    const session = selectSession(this.items, now, options);
    return new ReviewRound(session, async (item, outcome) => {
      await this.recordOutcome(item.id, outcome === ReviewOutcome.CORRECT);
    });
  }
}
