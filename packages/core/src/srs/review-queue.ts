import type { VocabItem } from '../domain/vocabulary';
import { isDue } from './ladder-scheduler';
import type { SessionOptions } from './srs.interface';

export const DEFAULT_FALLBACK_SIZE = 10;
export const DEFAULT_DUE_CAP_SIZE = 20;

export function selectDue(collection: readonly VocabItem[], now: Date): VocabItem[] {
  return collection.filter((item) => isDue(item, now));
}

export function dueCount(collection: readonly VocabItem[], now: Date): number {
  return selectDue(collection, now).length;
}

export function masteredCount(collection: readonly VocabItem[]): number {
  return collection.filter((item) => item.mastered).length;
}

/**
 * Fisher-Yates shuffle into a new array.
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const held = result[i];
    result[i] = result[j];
    result[j] = held;
  }
  return result;
}

/**
 * Picks the items for one review session.
 *
 * Due items (up to `dueCapSize`, in stored order) are used when there are any.
 * Otherwise the first `fallbackSize` items of the collection are reviewed early.
 * Either way the picked items are shuffled.
 */
export function selectSession(
  collection: readonly VocabItem[],
  now: Date,
  options: SessionOptions = {}
): VocabItem[] {
  const fallbackSize = options.fallbackSize ?? DEFAULT_FALLBACK_SIZE;
  const dueCapSize = options.dueCapSize ?? DEFAULT_DUE_CAP_SIZE;

  const due = selectDue(collection, now);
  const picked = due.length > 0 ? due.slice(0, dueCapSize) : collection.slice(0, fallbackSize);

  return shuffle(picked, options.random);
}
