/**
 * Type definitions for qualification probability runs
 */

export const CONFEDERATIONS = ['UEFA', 'CAF', 'AFC', 'CONMEBOL', 'CONCACAF', 'OFC'] as const;
export type Confederation = (typeof CONFEDERATIONS)[number];

export const QUALIFICATION_STATUSES = ['Qualified', 'InProgress'] as const;
export type QualificationStatus = (typeof QUALIFICATION_STATUSES)[number];

export const RANK_BUCKETS = ['1', '2', '3-4', '5', '6+'] as const;
export type RankBucket = (typeof RANK_BUCKETS)[number];

export const PPG_BUCKETS = ['>=2', '1.5-1.99', '1.0-1.49', '<1.0'] as const;
export type PpgBucket = (typeof PPG_BUCKETS)[number];

export const GOAL_DIFF_BUCKETS = ['>=10', '5-9', '0-4', '-4--1', '-9--5', '<=-10'] as const;
export type GoalDiffBucket = (typeof GOAL_DIFF_BUCKETS)[number];

export type LookupLevel = 'rank' | 'bucket';

export type RunStatus = 'running' | 'success' | 'partial' | 'failed';
export type TerminalRunStatus = Exclude<RunStatus, 'running'>;

export type RunType = 'full_update' | 'incremental';
export type ExecutionContext = 'api' | 'worker' | 'cli';

/**
 * One team's position as captured from the standings source.
 * `qualificationStatus` is kept as reported; the blender rejects values
 * outside {@link QUALIFICATION_STATUSES}.
 */
export interface StandingRow {
  team: string;
  confederation: Confederation;
  group: string;
  stage: string;
  rank: number | null;
  points: number;
  played: number;
  goalDiff: number;
  qualificationStatus: string;
  note?: string;
}

export type ValidatedStanding = Omit<StandingRow, 'qualificationStatus'> & {
  qualificationStatus: QualificationStatus;
};

export interface StandingBuckets {
  rankBucket: RankBucket;
  /** `null` when no games have been played */
  ppgBucket: PpgBucket | null;
  goalDiffBucket: GoalDiffBucket;
}

export interface HistoricalProbabilityEntry {
  confederation: string;
  stage: string;
  rank: number | null;
  rankBucket: RankBucket | null;
  ppgBucket: PpgBucket | null;
  lookupLevel: LookupLevel;
  historicalQualProb: number;
}

export type HistoricalLookupResult =
  | { level: 'rank'; probability: number }
  | { level: 'bucket'; probability: number }
  | { level: 'none' };

export interface ProbabilityResult {
  team: string;
  confederation: Confederation;
  group: string;
  stage: string;
  rank: number | null;
  points: number;
  played: number;
  goalDiff: number;
  probFillSlot: number;
  qualificationStatus: QualificationStatus;
  lookupLevel: HistoricalLookupResult['level'];
}

export type RowFailureReason = 'malformed' | 'invalid' | 'duplicate';

export interface RowFailure {
  index: number;
  team: string | null;
  reason: RowFailureReason;
  message: string;
  field?: string;
}

export interface MaterializeSummary {
  inserted: number;
  updated: number;
}

export interface HostNation {
  team: string;
  confederation: Confederation;
}

export interface BlenderPolicy {
  modelVersion: string;
  formWeight: number;
  historicalWeight: number;
  formFactorWeights: {
    rank: number;
    pointsPerGame: number;
    goalDiff: number;
  };
  confederationMultipliers: Record<Confederation, number>;
  minProbability: number;
  maxProbability: number;
}

export const DEFAULT_CONFEDERATION_MULTIPLIERS: Readonly<Record<Confederation, number>> = {
  UEFA: 1.0,
  CONMEBOL: 1.0,
  AFC: 0.95,
  CAF: 0.95,
  CONCACAF: 0.9,
  OFC: 0.7,
};

export const QUALIFICATION_CONSTANTS = {
  HOST_GROUP: 'Host',
  CACHE_KEYS: {
    LOOKUP_ENTRIES: 'historical-lookup:entries',
    RATE_LIMIT_PREFIX: 'rate_limit:admin:',
  },
  FORM: {
    /** rank factor = 1 / (1 + RANK_DECAY * (rank - 1)) */
    RANK_DECAY: 0.35,
    /** ppg factor = 1 - e^(-ppg / PPG_SCALE) */
    PPG_SCALE: 1.5,
    /** goal difference factor = 1 / (1 + e^(-goalDiff / GOAL_DIFF_SCALE)) */
    GOAL_DIFF_SCALE: 5,
    NEUTRAL_PPG_FACTOR: 0.5,
  },
  PRECISION: {
    PROBABILITY: 2,
    HISTORICAL: 4,
  },
  WRITE_CHUNK_SIZE: 500,
} as const;

export function isConfederation(value: unknown): value is Confederation {
  return typeof value === 'string' && (CONFEDERATIONS as readonly string[]).includes(value);
}

export function isQualificationStatus(value: unknown): value is QualificationStatus {
  return (
    typeof value === 'string' && (QUALIFICATION_STATUSES as readonly string[]).includes(value)
  );
}

/**
 * One archived final standing submitted for import.
 */
export interface HistoricalStandingInput {
  season: number;
  confederation: Confederation;
  stage: string;
  group: string;
  team: string;
  rank: number | null;
  points: number;
  played: number;
  wins?: number;
  draws?: number;
  losses?: number;
  goalsFor?: number;
  goalsAgainst?: number;
  goalDiff: number;
  qualified: boolean;
  note?: string;
  sourceUrl?: string;
}

function isNullableOneOf(value: unknown, allowed: readonly string[]): boolean {
  return value === null || (typeof value === 'string' && allowed.includes(value));
}

export function isHistoricalProbabilityEntry(value: unknown): value is HistoricalProbabilityEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry.confederation === 'string' &&
    typeof entry.stage === 'string' &&
    (entry.rank === null || typeof entry.rank === 'number') &&
    isNullableOneOf(entry.rankBucket, RANK_BUCKETS) &&
    isNullableOneOf(entry.ppgBucket, PPG_BUCKETS) &&
    (entry.lookupLevel === 'rank' || entry.lookupLevel === 'bucket') &&
    typeof entry.historicalQualProb === 'number'
  );
}
