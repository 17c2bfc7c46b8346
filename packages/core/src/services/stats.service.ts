import {
  averageBand,
  emptyStats,
  recordEvaluation,
  refreshStreak,
  type UserStats,
} from '../domain/stats';
import type { StatsRepository } from '../persistence/repositories';

export class StatsService {
  private stats: UserStats = emptyStats();

  constructor(
    private readonly repository: StatsRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async load(): Promise<UserStats> {
    this.stats = await this.repository.load();
    return this.stats;
  }

  current(): UserStats {
    return this.stats;
  }

  async refreshStreak(now: Date = this.clock()): Promise<UserStats> {
    this.stats = refreshStreak(this.stats, now);
    await this.repository.save(this.stats);
    return this.stats;
  }

  async recordEvaluation(overallBand: number, now: Date = this.clock()): Promise<UserStats> {
    this.stats = recordEvaluation(this.stats, overallBand, now);
    await this.repository.save(this.stats);
    return this.stats;
  }

  averageBand(): number {
    return averageBand(this.stats);
  }
}
