import { roundTo } from '../../common/utils/number.util';
import { ProbabilityResult, QUALIFICATION_CONSTANTS } from '../types/qualification.types';

export type ProbabilityTier = 'very_high' | 'high' | 'medium' | 'low' | 'very_low';

export interface RunStatistics {
  qualifiedCount: number;
  inProgressCount: number;
  avgProbability: number | null;
  minProbability: number | null;
  maxProbability: number | null;
  probabilityDistribution: Record<ProbabilityTier, number>;
  rankLevelMatches: number;
  bucketLevelMatches: number;
  noHistoricalMatch: number;
  confederationCounts: Record<string, number>;
}

/** very_high ≥ 80, high ≥ 60, medium ≥ 40, low ≥ 20, else very_low. */
export function getProbabilityTier(probability: number): ProbabilityTier {
  if (probability >= 80) return 'very_high';
  if (probability >= 60) return 'high';
  if (probability >= 40) return 'medium';
  if (probability >= 20) return 'low';
  return 'very_low';
}

export function computeRunStatistics(results: readonly ProbabilityResult[]): RunStatistics {
  const probabilityDistribution: Record<ProbabilityTier, number> = {
    very_high: 0,
    high: 0,
    medium: 0,
    low: 0,
    very_low: 0,
  };
  const confederationCounts: Record<string, number> = {};
  let qualifiedCount = 0;
  let rankLevelMatches = 0;
  let bucketLevelMatches = 0;
  let noHistoricalMatch = 0;
  let sum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (const result of results) {
    if (result.qualificationStatus === 'Qualified') qualifiedCount++;

    if (result.lookupLevel === 'rank') rankLevelMatches++;
    else if (result.lookupLevel === 'bucket') bucketLevelMatches++;
    else noHistoricalMatch++;

    probabilityDistribution[getProbabilityTier(result.probFillSlot)]++;
    confederationCounts[result.confederation] = (confederationCounts[result.confederation] ?? 0) + 1;

    sum += result.probFillSlot;
    min = Math.min(min, result.probFillSlot);
    max = Math.max(max, result.probFillSlot);
  }

  const empty = results.length === 0;
  const precision = QUALIFICATION_CONSTANTS.PRECISION.PROBABILITY;

  return {
    qualifiedCount,
    inProgressCount: results.length - qualifiedCount,
    avgProbability: empty ? null : roundTo(sum / results.length, precision),
    minProbability: empty ? null : min,
    maxProbability: empty ? null : max,
    probabilityDistribution,
    rankLevelMatches,
    bucketLevelMatches,
    noHistoricalMatch,
    confederationCounts,
  };
}
