import type { VocabItem } from '../domain/vocabulary';
import { emptyStats, type UserStats } from '../domain/stats';
import type { BlobStore } from './blob-store';
import { decodeStats, decodeVocabBank, encodeStats, encodeVocabBank } from './codecs';

export const VOCAB_BANK_KEY = 'vocabBank';
export const USER_STATS_KEY = 'userStats';

export interface VocabBankRepository {
  load(): Promise<VocabItem[]>;
  save(items: readonly VocabItem[]): Promise<void>;
}

export interface StatsRepository {
  load(): Promise<UserStats>;
  save(stats: UserStats): Promise<void>;
}

export class BlobVocabBankRepository implements VocabBankRepository {
  constructor(
    private readonly store: BlobStore,
    private readonly key: string = VOCAB_BANK_KEY
  ) {}

  async load(): Promise<VocabItem[]> {
    const blob = await this.store.get(this.key);
    if (!blob) {
      return [];
    }
    return decodeVocabBank(blob);
  }

  async save(items: readonly VocabItem[]): Promise<void> {
    await this.store.set(this.key, encodeVocabBank(items));
  }
}

export class BlobStatsRepository implements StatsRepository {
  constructor(
    private readonly store: BlobStore,
    private readonly key: string = USER_STATS_KEY
  ) {}

  async load(): Promise<UserStats> {
    const blob = await this.store.get(this.key);
    if (!blob) {
      return emptyStats();
    }
    return decodeStats(blob);
  }

  async save(stats: UserStats): Promise<void> {
    await this.store.set(this.key, encodeStats(stats));
  }
}
