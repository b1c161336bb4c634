import dataSource from './typeorm.config';
import { HistoricalProbabilityLookup } from '../qualification/entities/historical-probability-lookup.entity';
import { HistoricalStanding } from '../qualification/entities/historical-standing.entity';
import { PredictionRun } from '../qualification/entities/prediction-run.entity';
import { TeamSlotProbability } from '../qualification/entities/team-slot-probability.entity';

describe('migration data source', () => {
  it('should register the qualification entities without synchronizing', () => {
    expect(dataSource.isInitialized).toBe(false);
    expect(dataSource.options.entities).toEqual([
      TeamSlotProbability,
      HistoricalStanding,
      HistoricalProbabilityLookup,
      PredictionRun,
    ]);
    expect(dataSource.options.synchronize).toBe(false);
    expect(dataSource.options.migrationsTableName).toBe('qualification_migrations');
  });
});
