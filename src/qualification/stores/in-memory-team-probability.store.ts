import { standingKey } from '../helpers/standing.parser';
import { MaterializeSummary, ProbabilityResult } from '../types/qualification.types';
import { ProbabilityFilter, StoredProbability, TeamProbabilityStore } from './team-probability.store';

/**
 * Map-backed store for tests and local tooling. Writes go to a copy that
 * replaces the visible map only once the whole batch has been applied.
 */
export class InMemoryTeamProbabilityStore implements TeamProbabilityStore {
  private records = new Map<string, StoredProbability>();

  /** When set, `applyBatch` throws after writing this many records of a batch. */
  failAfter: number | null = null;

  async applyBatch(
    results: readonly ProbabilityResult[],
    runId: string,
  ): Promise<MaterializeSummary> {
    const next = new Map(this.records);
    const updatedAt = new Date();
    let inserted = 0;
    let updated = 0;

    for (const [index, result] of results.entries()) {
      if (this.failAfter !== null && index >= this.failAfter) {
        throw new Error('connection terminated unexpectedly');
      }
      const key = standingKey(result);
      if (next.has(key)) updated++;
      else inserted++;
      next.set(key, { ...result, runId, updatedAt });
    }

    this.records = next;
    return { inserted, updated };
  }

  async findCurrent(filter: ProbabilityFilter = {}): Promise<StoredProbability[]> {
    return [...this.records.values()]
      .filter((record) => !filter.confederation || record.confederation === filter.confederation)
      .filter((record) => !filter.status || record.qualificationStatus === filter.status)
      .sort((a, b) => standingKey(a).localeCompare(standingKey(b)));
  }

  get size(): number {
    return this.records.size;
  }
}
