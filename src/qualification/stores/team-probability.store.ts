import {
  Confederation,
  MaterializeSummary,
  ProbabilityResult,
  QualificationStatus,
} from '../types/qualification.types';

export const TEAM_PROBABILITY_STORE = Symbol('TEAM_PROBABILITY_STORE');

export interface StoredProbability extends ProbabilityResult {
  runId: string | null;
  updatedAt: Date;
}

export interface ProbabilityFilter {
  confederation?: Confederation;
  status?: QualificationStatus;
}

/**
 * Current probability per (team, confederation, group).
 *
 * `applyBatch` is all-or-nothing: when it rejects, no record of the batch
 * is visible to readers.
 */
export interface TeamProbabilityStore {
  applyBatch(results: readonly ProbabilityResult[], runId: string): Promise<MaterializeSummary>;
  findCurrent(filter?: ProbabilityFilter): Promise<StoredProbability[]>;
}
