import { roundTo } from '../../common/utils/number.util';
import {
  HistoricalProbabilityEntry,
  PpgBucket,
  QUALIFICATION_CONSTANTS,
  RankBucket,
} from '../types/qualification.types';

export interface ArchiveSample {
  confederation: string;
  stage: string;
  rank: number | null;
  rankBucket: RankBucket;
  ppgBucket: PpgBucket | null;
  qualified: boolean;
}

export type BuiltLookupEntry = HistoricalProbabilityEntry & { sampleSize: number };

interface Tally {
  entry: Omit<HistoricalProbabilityEntry, 'historicalQualProb'>;
  total: number;
  qualified: number;
}

function addSample(
  tallies: Map<string, Tally>,
  key: string,
  entry: Tally['entry'],
  qualified: boolean,
): void {
  const tally = tallies.get(key) ?? { entry, total: 0, qualified: 0 };
  tally.total += 1;
  if (qualified) tally.qualified += 1;
  tallies.set(key, tally);
}

function sortKey(entry: HistoricalProbabilityEntry): string[] {
  return [
    entry.confederation,
    entry.stage,
    entry.lookupLevel,
    entry.rank === null ? '' : String(entry.rank).padStart(4, '0'),
    entry.rankBucket ?? '',
    entry.ppgBucket ?? '',
  ];
}

function compareEntries(a: HistoricalProbabilityEntry, b: HistoricalProbabilityEntry): number {
  const keyA = sortKey(a);
  const keyB = sortKey(b);
  for (let i = 0; i < keyA.length; i++) {
    if (keyA[i] < keyB[i]) return -1;
    if (keyA[i] > keyB[i]) return 1;
  }
  return 0;
}

/**
 * Computes the historical qualification rate for every
 * (confederation, stage, rank) and (confederation, stage, rankBucket, ppgBucket)
 * seen in the archive. Archive rows without a rank only contribute to the
 * bucket level.
 */
export function buildLookupEntries(samples: readonly ArchiveSample[]): BuiltLookupEntry[] {
  const tallies = new Map<string, Tally>();

  for (const sample of samples) {
    if (sample.rank !== null) {
      addSample(
        tallies,
        `rank|${sample.confederation}|${sample.stage}|${sample.rank}`,
        {
          confederation: sample.confederation,
          stage: sample.stage,
          rank: sample.rank,
          rankBucket: null,
          ppgBucket: null,
          lookupLevel: 'rank',
        },
        sample.qualified,
      );
    }

    addSample(
      tallies,
      `bucket|${sample.confederation}|${sample.stage}|${sample.rankBucket}|${sample.ppgBucket ?? 'none'}`,
      {
        confederation: sample.confederation,
        stage: sample.stage,
        rank: null,
        rankBucket: sample.rankBucket,
        ppgBucket: sample.ppgBucket,
        lookupLevel: 'bucket',
      },
      sample.qualified,
    );
  }

  return [...tallies.values()]
    .map(({ entry, total, qualified }) => ({
      ...entry,
      historicalQualProb: roundTo(qualified / total, QUALIFICATION_CONSTANTS.PRECISION.HISTORICAL),
      sampleSize: total,
    }))
    .sort(compareEntries);
}
