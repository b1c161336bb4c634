import { computeRunStatistics, getProbabilityTier } from './run-statistics.helper';
import { ProbabilityResult } from '../types/qualification.types';

function result(overrides: Partial<ProbabilityResult>): ProbabilityResult {
  return {
    team: 'Team',
    confederation: 'UEFA',
    group: 'Group A',
    stage: 'Qualifying Group Stage',
    rank: 1,
    points: 10,
    played: 5,
    goalDiff: 4,
    probFillSlot: 50,
    qualificationStatus: 'InProgress',
    lookupLevel: 'rank',
    ...overrides,
  };
}

describe('run statistics helper', () => {
  describe('getProbabilityTier', () => {
    it.each([
      [100, 'very_high'],
      [80, 'very_high'],
      [79.99, 'high'],
      [60, 'high'],
      [40, 'medium'],
      [20, 'low'],
      [19.99, 'very_low'],
      [0, 'very_low'],
    ])('should place %d in %s', (probability, tier) => {
      expect(getProbabilityTier(probability)).toBe(tier);
    });
  });

  describe('computeRunStatistics', () => {
    it('should summarise a set of results', () => {
      const stats = computeRunStatistics([
        result({ qualificationStatus: 'Qualified', probFillSlot: 100, lookupLevel: 'none' }),
        result({ probFillSlot: 65.5, lookupLevel: 'bucket', confederation: 'CAF' }),
        result({ probFillSlot: 12.25 }),
      ]);

      expect(stats).toEqual({
        qualifiedCount: 1,
        inProgressCount: 2,
        avgProbability: 59.25,
        minProbability: 12.25,
        maxProbability: 100,
        probabilityDistribution: { very_high: 1, high: 1, medium: 0, low: 0, very_low: 1 },
        rankLevelMatches: 1,
        bucketLevelMatches: 1,
        noHistoricalMatch: 1,
        confederationCounts: { UEFA: 2, CAF: 1 },
      });
    });

    it('should leave the probability summary empty when nothing was computed', () => {
      const stats = computeRunStatistics([]);

      expect(stats.avgProbability).toBeNull();
      expect(stats.minProbability).toBeNull();
      expect(stats.maxProbability).toBeNull();
      expect(stats.inProgressCount).toBe(0);
    });
  });
});
