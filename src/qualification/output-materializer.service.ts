import { Inject, Injectable, Logger } from '@nestjs/common';
import { StoreUnavailableError } from './errors/qualification.errors';
import { MaterializeSummary, ProbabilityResult } from './types/qualification.types';
import {
  ProbabilityFilter,
  StoredProbability,
  TEAM_PROBABILITY_STORE,
  TeamProbabilityStore,
} from './stores/team-probability.store';
import { getErrorMessage } from '../common/utils/error.util';

/**
 * Writes a run's results as the new current snapshot, all or nothing.
 */
@Injectable()
export class OutputMaterializerService {
  private readonly logger = new Logger(OutputMaterializerService.name);

  constructor(
    @Inject(TEAM_PROBABILITY_STORE)
    private store: TeamProbabilityStore,
  ) {}

  /**
   * @throws StoreUnavailableError when the store rejects the batch; none of
   * the batch has been applied in that case
   */
  async apply(results: readonly ProbabilityResult[], runId: string): Promise<MaterializeSummary> {
    try {
      const summary = await this.store.applyBatch(results, runId);
      this.logger.log(
        `Materialized ${results.length} probabilities for run ${runId} ` +
          `(${summary.inserted} inserted, ${summary.updated} updated)`,
      );
      return summary;
    } catch (error) {
      throw new StoreUnavailableError(
        `Failed to materialize ${results.length} probabilities: ${getErrorMessage(error)}`,
        error,
      );
    }
  }

  /** The current snapshot, one record per (team, confederation, group). */
  async findCurrent(filter: ProbabilityFilter = {}): Promise<StoredProbability[]> {
    return await this.store.findCurrent(filter);
  }
}
