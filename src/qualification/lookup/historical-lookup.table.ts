import { computeContentHash } from '../../common/utils/content-hash.util';
import { LookupTableError } from '../errors/qualification.errors';
import {
  HistoricalLookupResult,
  HistoricalProbabilityEntry,
  PpgBucket,
  RankBucket,
  StandingBuckets,
} from '../types/qualification.types';

const KEY_SEPARATOR = '|';

function rankKey(confederation: string, stage: string, rank: number): string {
  return [confederation, stage, String(rank)].join(KEY_SEPARATOR);
}

function bucketKey(
  confederation: string,
  stage: string,
  rankBucket: RankBucket,
  ppgBucket: PpgBucket | null,
): string {
  return [confederation, stage, rankBucket, ppgBucket ?? 'none'].join(KEY_SEPARATOR);
}

function toHashable(entry: HistoricalProbabilityEntry): HistoricalProbabilityEntry {
  return {
    confederation: entry.confederation,
    stage: entry.stage,
    rank: entry.rank,
    rankBucket: entry.rankBucket,
    ppgBucket: entry.ppgBucket,
    lookupLevel: entry.lookupLevel,
    historicalQualProb: entry.historicalQualProb,
  };
}

/**
 * "Group Stage - Second Round" → "Group Stage". Returns null when the stage
 * has no sub-stage suffix.
 */
export function getBaseStage(stage: string): string | null {
  const separatorIndex = stage.indexOf(' - ');
  if (separatorIndex === -1) return null;
  return stage.slice(0, separatorIndex);
}

/**
 * Immutable view over the historical qualification rates.
 *
 * Exact-rank entries are consulted first; bucket entries cover the
 * confederations and stages where a single rank has too few samples.
 */
export class HistoricalLookupTable {
  readonly hash: string;

  private constructor(
    private readonly rankIndex: ReadonlyMap<string, number>,
    private readonly bucketIndex: ReadonlyMap<string, number>,
    hash: string,
  ) {
    this.hash = hash;
  }

  static fromEntries(entries: readonly HistoricalProbabilityEntry[]): HistoricalLookupTable {
    const rankIndex = new Map<string, number>();
    const bucketIndex = new Map<string, number>();

    for (const entry of entries) {
      if (entry.lookupLevel === 'rank') {
        if (entry.rank === null) {
          throw new LookupTableError(
            `Rank-level entry without a rank for ${entry.confederation} / ${entry.stage}`,
          );
        }
        const key = rankKey(entry.confederation, entry.stage, entry.rank);
        if (rankIndex.has(key)) throw new LookupTableError(`Duplicate lookup key ${key}`);
        rankIndex.set(key, entry.historicalQualProb);
      } else {
        if (entry.rankBucket === null) {
          throw new LookupTableError(
            `Bucket-level entry without a rank bucket for ${entry.confederation} / ${entry.stage}`,
          );
        }
        const key = bucketKey(entry.confederation, entry.stage, entry.rankBucket, entry.ppgBucket);
        if (bucketIndex.has(key)) throw new LookupTableError(`Duplicate lookup key ${key}`);
        bucketIndex.set(key, entry.historicalQualProb);
      }
    }

    return new HistoricalLookupTable(
      rankIndex,
      bucketIndex,
      computeContentHash(entries.map(toHashable)),
    );
  }

  static empty(): HistoricalLookupTable {
    return HistoricalLookupTable.fromEntries([]);
  }

  get rankEntryCount(): number {
    return this.rankIndex.size;
  }

  get bucketEntryCount(): number {
    return this.bucketIndex.size;
  }

  get size(): number {
    return this.rankIndex.size + this.bucketIndex.size;
  }

  lookup(
    confederation: string,
    stage: string,
    rank: number | null,
    buckets: Pick<StandingBuckets, 'rankBucket' | 'ppgBucket'>,
  ): HistoricalLookupResult {
    const baseStage = getBaseStage(stage);
    const stages = baseStage === null ? [stage] : [stage, baseStage];

    if (rank !== null) {
      for (const candidate of stages) {
        const probability = this.rankIndex.get(rankKey(confederation, candidate, rank));
        if (probability !== undefined) {
          return { level: 'rank', probability };
        }
      }
    }

    for (const candidate of stages) {
      const probability = this.bucketIndex.get(
        bucketKey(confederation, candidate, buckets.rankBucket, buckets.ppgBucket),
      );
      if (probability !== undefined) {
        return { level: 'bucket', probability };
      }
    }

    return { level: 'none' };
  }
}
