import { getBaseStage, HistoricalLookupTable } from './historical-lookup.table';
import { LookupTableError } from '../errors/qualification.errors';
import { HistoricalProbabilityEntry } from '../types/qualification.types';

const STAGE = 'Qualifying Group Stage';

function rankEntry(
  confederation: string,
  stage: string,
  rank: number,
  historicalQualProb: number,
): HistoricalProbabilityEntry {
  return {
    confederation,
    stage,
    rank,
    rankBucket: null,
    ppgBucket: null,
    lookupLevel: 'rank',
    historicalQualProb,
  };
}

function bucketEntry(
  confederation: string,
  stage: string,
  rankBucket: HistoricalProbabilityEntry['rankBucket'],
  ppgBucket: HistoricalProbabilityEntry['ppgBucket'],
  historicalQualProb: number,
): HistoricalProbabilityEntry {
  return {
    confederation,
    stage,
    rank: null,
    rankBucket,
    ppgBucket,
    lookupLevel: 'bucket',
    historicalQualProb,
  };
}

describe('HistoricalLookupTable', () => {
  const table = HistoricalLookupTable.fromEntries([
    rankEntry('UEFA', STAGE, 1, 0.92),
    rankEntry('UEFA', 'Third Round', 2, 0.61),
    bucketEntry('UEFA', STAGE, '3-4', '1.5-1.99', 0.27),
    bucketEntry('OFC', 'Third Round', '1', '>=2', 0.8),
    bucketEntry('AFC', STAGE, '1', null, 0.5),
  ]);

  describe('getBaseStage', () => {
    it('should strip the sub-stage suffix', () => {
      expect(getBaseStage('Third Round - Group A')).toBe('Third Round');
    });

    it('should return null without a suffix', () => {
      expect(getBaseStage(STAGE)).toBeNull();
    });
  });

  describe('lookup', () => {
    it('should return an exact rank match first', () => {
      expect(table.lookup('UEFA', STAGE, 1, { rankBucket: '1', ppgBucket: '>=2' })).toEqual({
        level: 'rank',
        probability: 0.92,
      });
    });

    it('should retry the rank level on the base stage', () => {
      expect(
        table.lookup('UEFA', 'Third Round - Group B', 2, { rankBucket: '2', ppgBucket: '>=2' }),
      ).toEqual({ level: 'rank', probability: 0.61 });
    });

    it('should fall back to the bucket level when no rank entry exists', () => {
      expect(table.lookup('UEFA', STAGE, 3, { rankBucket: '3-4', ppgBucket: '1.5-1.99' })).toEqual(
        { level: 'bucket', probability: 0.27 },
      );
    });

    it('should retry the bucket level on the base stage', () => {
      expect(
        table.lookup('OFC', 'Third Round - Group A', 1, { rankBucket: '1', ppgBucket: '>=2' }),
      ).toEqual({ level: 'bucket', probability: 0.8 });
    });

    it('should skip the rank level for unranked teams', () => {
      expect(table.lookup('UEFA', STAGE, null, { rankBucket: '1', ppgBucket: '>=2' })).toEqual({
        level: 'none',
      });
    });

    it('should match a null ppg bucket to the entry stored without one', () => {
      expect(table.lookup('AFC', STAGE, 1, { rankBucket: '1', ppgBucket: null })).toEqual({
        level: 'bucket',
        probability: 0.5,
      });
    });

    it('should report none when both levels miss', () => {
      expect(table.lookup('CAF', STAGE, 1, { rankBucket: '1', ppgBucket: '>=2' })).toEqual({
        level: 'none',
      });
    });
  });

  describe('fromEntries', () => {
    it('should count entries per level', () => {
      expect(table.rankEntryCount).toBe(2);
      expect(table.bucketEntryCount).toBe(3);
      expect(table.size).toBe(5);
    });

    it('should reject duplicate keys', () => {
      expect(() =>
        HistoricalLookupTable.fromEntries([
          rankEntry('UEFA', STAGE, 1, 0.92),
          rankEntry('UEFA', STAGE, 1, 0.9),
        ]),
      ).toThrow(LookupTableError);
    });

    it('should reject a rank-level entry without a rank', () => {
      expect(() =>
        HistoricalLookupTable.fromEntries([{ ...rankEntry('UEFA', STAGE, 1, 0.9), rank: null }]),
      ).toThrow('Rank-level entry without a rank for UEFA / Qualifying Group Stage');
    });

    it('should hash the same entries identically regardless of order', () => {
      const a = rankEntry('UEFA', STAGE, 1, 0.92);
      const b = rankEntry('UEFA', STAGE, 2, 0.7);

      expect(HistoricalLookupTable.fromEntries([a, b]).hash).toBe(
        HistoricalLookupTable.fromEntries([b, a]).hash,
      );
      expect(HistoricalLookupTable.fromEntries([a]).hash).not.toBe(
        HistoricalLookupTable.empty().hash,
      );
    });
  });
});
