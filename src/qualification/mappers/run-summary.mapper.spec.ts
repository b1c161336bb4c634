import { mapProbability, mapRunToDetail, mapRunToSummary } from './run-summary.mapper';
import { PredictionRun } from '../entities/prediction-run.entity';
import { StoredProbability } from '../stores/team-probability.store';

function partialRun(): PredictionRun {
  return Object.assign(new PredictionRun(), {
    id: 'run-3',
    runType: 'full_update',
    status: 'partial',
    inputHash: 'a'.repeat(64),
    historicalLookupHash: 'b'.repeat(64),
    modelVersion: 'blend-v1',
    startedAt: new Date('2025-03-01T10:00:00Z'),
    completedAt: new Date('2025-03-01T10:00:02Z'),
    executionTimeSeconds: 2,
    rowsProcessed: 10,
    rowsInserted: 6,
    rowsUpdated: 2,
    rowsFailed: 2,
    qualifiedCount: 1,
    inProgressCount: 7,
    avgProbability: 55.5,
    minProbability: 12,
    maxProbability: 100,
    probabilityDistribution: { high: 3, medium: 3, low: 2 },
    rankLevelMatches: 5,
    bucketLevelMatches: 2,
    noHistoricalMatch: 1,
    confederationCounts: { UEFA: 8 },
    errorMessage: '2 of 10 rows failed',
    errorDetails: null,
    warnings: null,
    executionContext: 'api',
    environment: 'test',
    inputParams: { source: 'weekly' },
    notes: 'weekly',
  });
}

describe('run summary mapper', () => {
  it('should group row counts and historical match counts', () => {
    const summary = mapRunToSummary(partialRun());

    expect(summary.rows).toEqual({ processed: 10, inserted: 6, updated: 2, failed: 2 });
    expect(summary.statistics.historicalMatches).toEqual({ rank: 5, bucket: 2, none: 1 });
    expect(summary.warnings).toEqual([]);
    expect(summary).not.toHaveProperty('errorDetails');
  });

  it('should add row failures and inputs to the detail view', () => {
    const detail = mapRunToDetail(partialRun());

    expect(detail.errorDetails).toEqual([]);
    expect(detail.inputParams).toEqual({ source: 'weekly' });
    expect(detail.notes).toBe('weekly');
  });

  it('should expose the slot probability under its public name', () => {
    const record: StoredProbability = {
      team: 'Netherlands',
      confederation: 'UEFA',
      group: 'Group G',
      stage: 'Qualifying Group Stage',
      rank: 1,
      points: 18,
      played: 8,
      goalDiff: 16,
      probFillSlot: 91.79,
      qualificationStatus: 'InProgress',
      lookupLevel: 'rank',
      runId: 'run-3',
      updatedAt: new Date('2025-03-01T10:00:02Z'),
    };

    expect(mapProbability(record)).toMatchObject({
      team: 'Netherlands',
      probability: 91.79,
      historicalMatch: 'rank',
    });
  });
});
