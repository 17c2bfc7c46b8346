import { describe, it, expect, vi } from 'vitest';
import { StatsService } from '../../src/services/stats.service';
import { BlobStatsRepository } from '../../src/persistence/repositories';
import { MemoryBlobStore } from '../../src/persistence/blob-store';

describe('StatsService', () => {
  const monday = new Date(2024, 2, 4, 10, 0);
  const tuesday = new Date(2024, 2, 5, 10, 0);

  it('should accumulate evaluations and persist them', async () => {
    const repository = new BlobStatsRepository(new MemoryBlobStore());
    const service = new StatsService(repository);
    await service.load();

    await service.recordEvaluation(6, monday);
    await service.recordEvaluation(7, tuesday);

    expect(service.averageBand()).toBe(6.5);
    expect(await repository.load()).toEqual({
      streak: 2,
      totalScore: 13,
      sentenceCount: 2,
      lastActiveDate: tuesday,
    });
  });

  it('should not double count a day refreshed before an evaluation', async () => {
    const service = new StatsService(new BlobStatsRepository(new MemoryBlobStore()), () => monday);
    await service.load();

    await service.refreshStreak();
    const stats = await service.recordEvaluation(7);

    expect(stats.streak).toBe(1);
    expect(stats.sentenceCount).toBe(1);
  });

  it('should save after refreshing the streak', async () => {
    const repository = { load: vi.fn(), save: vi.fn(async () => undefined) };
    const service = new StatsService(repository, () => monday);

    await service.refreshStreak();

    expect(repository.save).toHaveBeenCalledWith({
      streak: 1,
      totalScore: 0,
      sentenceCount: 0,
      lastActiveDate: monday,
    });
  });
});
