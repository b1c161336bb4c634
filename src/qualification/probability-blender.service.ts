import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { clamp, roundTo } from '../common/utils/number.util';
import { StandingValidationError } from './errors/qualification.errors';
import {
  BlenderPolicy,
  DEFAULT_CONFEDERATION_MULTIPLIERS,
  HistoricalLookupResult,
  isQualificationStatus,
  ProbabilityResult,
  QUALIFICATION_CONSTANTS,
  StandingRow,
  ValidatedStanding,
} from './types/qualification.types';

export const DEFAULT_BLENDER_POLICY: BlenderPolicy = {
  modelVersion: 'blend-v1',
  formWeight: 0.6,
  historicalWeight: 0.4,
  formFactorWeights: {
    rank: 0.5,
    pointsPerGame: 0.3,
    goalDiff: 0.2,
  },
  confederationMultipliers: { ...DEFAULT_CONFEDERATION_MULTIPLIERS },
  minProbability: 0,
  maxProbability: 100,
};

const QUALIFIED_PROBABILITY = 100;

/**
 * Probability Blender
 *
 * Turns a validated standing and its historical lookup result into the
 * probability (0-100) that the team fills a tournament slot:
 *
 * 1. `Qualified` teams are 100, always.
 * 2. Form component from rank, points per game and goal difference.
 * 3. Historical component = lookup probability × 100, when there is one.
 * 4. Weighted blend, weights normalised over the components present.
 * 5. Confederation multiplier, then clamp to the policy bounds.
 * 6. Rounded to 2 decimals.
 */
@Injectable()
export class ProbabilityBlenderService {
  readonly policy: BlenderPolicy;

  constructor(private configService: ConfigService) {
    this.policy = this.configService.get<BlenderPolicy>('blender') ?? DEFAULT_BLENDER_POLICY;
  }

  get modelVersion(): string {
    return this.policy.modelVersion;
  }

  /**
   * @throws StandingValidationError for an unknown status, a rank below 1,
   * or negative points or games played
   */
  validateStanding(row: StandingRow): ValidatedStanding {
    const { qualificationStatus } = row;
    if (!isQualificationStatus(qualificationStatus)) {
      throw new StandingValidationError(
        'qualificationStatus',
        `Unknown qualification status "${qualificationStatus}"`,
      );
    }
    if (row.rank !== null && (!Number.isInteger(row.rank) || row.rank < 1)) {
      throw new StandingValidationError('rank', `Rank must be a positive integer, got ${row.rank}`);
    }
    if (row.played < 0) {
      throw new StandingValidationError(
        'played',
        `Games played cannot be negative (${row.played})`,
      );
    }
    if (row.points < 0) {
      throw new StandingValidationError('points', `Points cannot be negative (${row.points})`);
    }

    return { ...row, qualificationStatus };
  }

  /** 1 for first place, decaying with rank; 0 when unranked. */
  rankFactor(rank: number | null): number {
    if (rank === null) return 0;
    return 1 / (1 + QUALIFICATION_CONSTANTS.FORM.RANK_DECAY * (rank - 1));
  }

  pointsPerGameFactor(points: number, played: number): number {
    if (played <= 0) return QUALIFICATION_CONSTANTS.FORM.NEUTRAL_PPG_FACTOR;
    return 1 - Math.exp(-(points / played) / QUALIFICATION_CONSTANTS.FORM.PPG_SCALE);
  }

  goalDiffFactor(goalDiff: number): number {
    return 1 / (1 + Math.exp(-goalDiff / QUALIFICATION_CONSTANTS.FORM.GOAL_DIFF_SCALE));
  }

  /**
   * Current form on a 0-100 scale. Each factor lies in [0, 1); the result is
   * their weighted mean.
   */
  computeFormComponent(
    standing: Pick<StandingRow, 'rank' | 'points' | 'played' | 'goalDiff'>,
  ): number {
    const weights = this.policy.formFactorWeights;
    const totalWeight = weights.rank + weights.pointsPerGame + weights.goalDiff;

    const weighted =
      weights.rank * this.rankFactor(standing.rank) +
      weights.pointsPerGame * this.pointsPerGameFactor(standing.points, standing.played) +
      weights.goalDiff * this.goalDiffFactor(standing.goalDiff);

    return (100 * weighted) / totalWeight;
  }

  computeProbability(standing: ValidatedStanding, lookup: HistoricalLookupResult): number {
    if (standing.qualificationStatus === 'Qualified') {
      return QUALIFIED_PROBABILITY;
    }

    const form = this.computeFormComponent(standing);
    const blended =
      lookup.level === 'none' ? form : this.blendWithHistorical(form, lookup.probability);

    const multiplier = this.policy.confederationMultipliers[standing.confederation];
    const bounded = clamp(
      blended * multiplier,
      this.policy.minProbability,
      this.policy.maxProbability,
    );

    return roundTo(bounded, QUALIFICATION_CONSTANTS.PRECISION.PROBABILITY);
  }

  private blendWithHistorical(form: number, historicalProbability: number): number {
    const { formWeight, historicalWeight } = this.policy;
    const historical = historicalProbability * 100;
    return (formWeight * form + historicalWeight * historical) / (formWeight + historicalWeight);
  }

  blend(standing: ValidatedStanding, lookup: HistoricalLookupResult): ProbabilityResult {
    return {
      team: standing.team,
      confederation: standing.confederation,
      group: standing.group,
      stage: standing.stage,
      rank: standing.rank,
      points: standing.points,
      played: standing.played,
      goalDiff: standing.goalDiff,
      probFillSlot: this.computeProbability(standing, lookup),
      qualificationStatus: standing.qualificationStatus,
      lookupLevel: lookup.level,
    };
  }
}
