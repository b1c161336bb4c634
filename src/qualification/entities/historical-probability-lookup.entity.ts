import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';
import { numericTransformer } from '../../common/transformers/numeric.transformer';
import type { LookupLevel, PpgBucket, RankBucket } from '../types/qualification.types';

/**
 * Uniqueness of the key tuple is enforced by an expression index in the
 * migration, since rank and the buckets are nullable.
 */
@Entity('historical_probability_lookup')
export class HistoricalProbabilityLookup {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 16 })
  confederation!: string;

  @Column({ type: 'varchar', length: 150 })
  stage!: string;

  @Column({ type: 'int', nullable: true })
  rank!: number | null;

  @Column({ name: 'rank_bucket', type: 'varchar', length: 8, nullable: true })
  rankBucket!: RankBucket | null;

  @Column({ name: 'ppg_bucket', type: 'varchar', length: 12, nullable: true })
  ppgBucket!: PpgBucket | null;

  @Column({ name: 'lookup_level', type: 'varchar', length: 10 })
  lookupLevel!: LookupLevel;

  @Column({
    name: 'historical_qual_prob',
    type: 'numeric',
    precision: 5,
    scale: 4,
    transformer: numericTransformer,
  })
  historicalQualProb!: number;

  @Column({ name: 'sample_size', type: 'int' })
  sampleSize!: number;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
