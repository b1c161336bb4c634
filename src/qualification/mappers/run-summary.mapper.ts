import { PredictionRun } from '../entities/prediction-run.entity';
import { StoredProbability } from '../stores/team-probability.store';
import { RowFailure, RunStatus } from '../types/qualification.types';

export interface RunSummary {
  id: string;
  runType: string;
  status: RunStatus;
  inputHash: string;
  historicalLookupHash: string | null;
  modelVersion: string;
  startedAt: Date;
  completedAt: Date | null;
  executionTimeSeconds: number | null;
  rows: {
    processed: number;
    inserted: number;
    updated: number;
    failed: number;
  };
  statistics: {
    qualifiedCount: number;
    inProgressCount: number;
    avgProbability: number | null;
    minProbability: number | null;
    maxProbability: number | null;
    probabilityDistribution: Record<string, number> | null;
    historicalMatches: { rank: number; bucket: number; none: number };
    confederationCounts: Record<string, number> | null;
  };
  errorMessage: string | null;
  warnings: string[];
  executionContext: string;
  environment: string;
}

export interface RunDetail extends RunSummary {
  errorDetails: RowFailure[];
  inputParams: Record<string, unknown> | null;
  notes: string | null;
}

export interface ProbabilityView {
  team: string;
  confederation: string;
  group: string;
  stage: string;
  rank: number | null;
  points: number;
  played: number;
  goalDiff: number;
  probability: number;
  qualificationStatus: string;
  historicalMatch: string;
  runId: string | null;
  updatedAt: Date;
}

export function mapRunToSummary(run: PredictionRun): RunSummary {
  return {
    id: run.id,
    runType: run.runType,
    status: run.status,
    inputHash: run.inputHash,
    historicalLookupHash: run.historicalLookupHash,
    modelVersion: run.modelVersion,
    startedAt: run.startedAt,
    completedAt: run.completedAt,
    executionTimeSeconds: run.executionTimeSeconds,
    rows: {
      processed: run.rowsProcessed,
      inserted: run.rowsInserted,
      updated: run.rowsUpdated,
      failed: run.rowsFailed,
    },
    statistics: {
      qualifiedCount: run.qualifiedCount,
      inProgressCount: run.inProgressCount,
      avgProbability: run.avgProbability,
      minProbability: run.minProbability,
      maxProbability: run.maxProbability,
      probabilityDistribution: run.probabilityDistribution,
      historicalMatches: {
        rank: run.rankLevelMatches,
        bucket: run.bucketLevelMatches,
        none: run.noHistoricalMatch,
      },
      confederationCounts: run.confederationCounts,
    },
    errorMessage: run.errorMessage,
    warnings: run.warnings ?? [],
    executionContext: run.executionContext,
    environment: run.environment,
  };
}

export function mapRunToDetail(run: PredictionRun): RunDetail {
  return {
    ...mapRunToSummary(run),
    errorDetails: run.errorDetails ?? [],
    inputParams: run.inputParams,
    notes: run.notes,
  };
}

export function mapProbability(record: StoredProbability): ProbabilityView {
  return {
    team: record.team,
    confederation: record.confederation,
    group: record.group,
    stage: record.stage,
    rank: record.rank,
    points: record.points,
    played: record.played,
    goalDiff: record.goalDiff,
    probability: record.probFillSlot,
    qualificationStatus: record.qualificationStatus,
    historicalMatch: record.lookupLevel,
    runId: record.runId,
    updatedAt: record.updatedAt,
  };
}
