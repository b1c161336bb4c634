import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Unique } from 'typeorm';
import { numericTransformer } from '../../common/transformers/numeric.transformer';
import type { GoalDiffBucket, PpgBucket, RankBucket } from '../types/qualification.types';

/**
 * Archived final table position from a past qualifying cycle, with the
 * buckets it fell into. Source for the lookup rebuild.
 */
@Entity('historical_standings')
@Unique('uq_historical_standings_key', ['season', 'confederation', 'stage', 'group', 'team'])
export class HistoricalStanding {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'int' })
  season!: number;

  @Column({ type: 'varchar', length: 16 })
  confederation!: string;

  @Column({ type: 'varchar', length: 150 })
  stage!: string;

  @Column({ name: 'group_name', type: 'varchar', length: 100 })
  group!: string;

  @Column({ type: 'varchar', length: 100 })
  team!: string;

  @Column({ type: 'int', nullable: true })
  rank!: number | null;

  @Column({ type: 'int' })
  points!: number;

  @Column({ type: 'int' })
  played!: number;

  @Column({ type: 'int', default: 0 })
  wins!: number;

  @Column({ type: 'int', default: 0 })
  draws!: number;

  @Column({ type: 'int', default: 0 })
  losses!: number;

  @Column({ name: 'goals_for', type: 'int', default: 0 })
  goalsFor!: number;

  @Column({ name: 'goals_against', type: 'int', default: 0 })
  goalsAgainst!: number;

  @Column({ name: 'goal_diff', type: 'int' })
  goalDiff!: number;

  @Column({ type: 'boolean' })
  qualified!: boolean;

  @Column({ type: 'text', nullable: true })
  note!: string | null;

  @Column({ name: 'source_url', type: 'text', nullable: true })
  sourceUrl!: string | null;

  @Column({ name: 'rank_bucket', type: 'varchar', length: 8 })
  rankBucket!: RankBucket;

  @Column({
    name: 'points_per_game',
    type: 'numeric',
    precision: 4,
    scale: 2,
    nullable: true,
    transformer: numericTransformer,
  })
  pointsPerGame!: number | null;

  @Column({ name: 'ppg_bucket', type: 'varchar', length: 12, nullable: true })
  ppgBucket!: PpgBucket | null;

  @Column({ name: 'goal_diff_bucket', type: 'varchar', length: 8 })
  goalDiffBucket!: GoalDiffBucket;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
