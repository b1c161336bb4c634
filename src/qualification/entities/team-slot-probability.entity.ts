import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Unique } from 'typeorm';
import { numericTransformer } from '../../common/transformers/numeric.transformer';
import type {
  Confederation,
  HistoricalLookupResult,
  QualificationStatus,
} from '../types/qualification.types';

/**
 * Current probability per (team, confederation, group). One row per key,
 * overwritten by each successful run.
 */
@Entity('team_slot_probabilities')
@Unique('uq_team_slot_probabilities_key', ['team', 'confederation', 'group'])
export class TeamSlotProbability {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  team!: string;

  @Column({ type: 'varchar', length: 16 })
  confederation!: Confederation;

  @Column({ name: 'current_group', type: 'varchar', length: 100 })
  group!: string;

  @Column({ type: 'varchar', length: 150 })
  stage!: string;

  @Column({ name: 'position', type: 'int', nullable: true })
  rank!: number | null;

  @Column({ type: 'int' })
  points!: number;

  @Column({ type: 'int' })
  played!: number;

  @Column({ name: 'goal_diff', type: 'int' })
  goalDiff!: number;

  @Column({
    name: 'prob_fill_slot',
    type: 'numeric',
    precision: 5,
    scale: 2,
    transformer: numericTransformer,
  })
  probFillSlot!: number;

  @Column({ name: 'qualification_status', type: 'varchar', length: 20 })
  qualificationStatus!: QualificationStatus;

  @Column({ name: 'lookup_level', type: 'varchar', length: 10 })
  lookupLevel!: HistoricalLookupResult['level'];

  @Column({ name: 'run_id', type: 'uuid', nullable: true })
  runId!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
