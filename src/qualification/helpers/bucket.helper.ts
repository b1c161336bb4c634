import {
  GoalDiffBucket,
  PpgBucket,
  RankBucket,
  StandingBuckets,
} from '../types/qualification.types';

/**
 * Bucketizer: maps a standing onto the ordinal keys used by the historical
 * lookup table. Pure; the same input always yields the same buckets.
 */

/**
 * Unranked teams (`null`) fall into "6+", the bucket of the weakest
 * positions, matching how the form component treats them.
 */
export function getRankBucket(rank: number | null): RankBucket {
  if (rank === null) return '6+';
  if (rank <= 1) return '1';
  if (rank === 2) return '2';
  if (rank <= 4) return '3-4';
  if (rank === 5) return '5';
  return '6+';
}

export function getPointsPerGame(points: number, played: number): number | null {
  if (played <= 0) return null;
  return points / played;
}

export function getPpgBucket(points: number, played: number): PpgBucket | null {
  const ppg = getPointsPerGame(points, played);
  if (ppg === null) return null;
  if (ppg >= 2.0) return '>=2';
  if (ppg >= 1.5) return '1.5-1.99';
  if (ppg >= 1.0) return '1.0-1.49';
  return '<1.0';
}

export function getGoalDiffBucket(goalDiff: number): GoalDiffBucket {
  if (goalDiff >= 10) return '>=10';
  if (goalDiff >= 5) return '5-9';
  if (goalDiff >= 0) return '0-4';
  if (goalDiff >= -4) return '-4--1';
  if (goalDiff >= -9) return '-9--5';
  return '<=-10';
}

export function bucketize(standing: {
  rank: number | null;
  points: number;
  played: number;
  goalDiff: number;
}): StandingBuckets {
  return {
    rankBucket: getRankBucket(standing.rank),
    ppgBucket: getPpgBucket(standing.points, standing.played),
    goalDiffBucket: getGoalDiffBucket(standing.goalDiff),
  };
}
