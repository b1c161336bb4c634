import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { numericTransformer } from '../../common/transformers/numeric.transformer';
import type {
  ExecutionContext,
  RowFailure,
  RunStatus,
  RunType,
} from '../types/qualification.types';

/**
 * Ledger entry for one execution of the blending batch. Never deleted.
 */
@Entity('prediction_runs')
@Index('idx_prediction_runs_dedup', ['inputHash', 'historicalLookupHash', 'modelVersion', 'status'])
export class PredictionRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'run_type', type: 'varchar', length: 20 })
  runType!: RunType;

  @Column({ type: 'varchar', length: 10 })
  status!: RunStatus;

  @Column({ name: 'input_hash', type: 'char', length: 64 })
  inputHash!: string;

  @Column({ name: 'historical_lookup_hash', type: 'char', length: 64, nullable: true })
  historicalLookupHash!: string | null;

  @Column({ name: 'model_version', type: 'varchar', length: 50 })
  modelVersion!: string;

  @Column({ name: 'input_params', type: 'jsonb', nullable: true })
  inputParams!: Record<string, unknown> | null;

  @Index('idx_prediction_runs_started_at')
  @Column({ name: 'started_at', type: 'timestamptz' })
  startedAt!: Date;

  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;

  @Column({
    name: 'execution_time_seconds',
    type: 'numeric',
    precision: 10,
    scale: 3,
    nullable: true,
    transformer: numericTransformer,
  })
  executionTimeSeconds!: number | null;

  @Column({ name: 'rows_processed', type: 'int', default: 0 })
  rowsProcessed!: number;

  @Column({ name: 'rows_inserted', type: 'int', default: 0 })
  rowsInserted!: number;

  @Column({ name: 'rows_updated', type: 'int', default: 0 })
  rowsUpdated!: number;

  @Column({ name: 'rows_failed', type: 'int', default: 0 })
  rowsFailed!: number;

  @Column({ name: 'qualified_count', type: 'int', default: 0 })
  qualifiedCount!: number;

  @Column({ name: 'in_progress_count', type: 'int', default: 0 })
  inProgressCount!: number;

  @Column({
    name: 'avg_probability',
    type: 'numeric',
    precision: 5,
    scale: 2,
    nullable: true,
    transformer: numericTransformer,
  })
  avgProbability!: number | null;

  @Column({
    name: 'min_probability',
    type: 'numeric',
    precision: 5,
    scale: 2,
    nullable: true,
    transformer: numericTransformer,
  })
  minProbability!: number | null;

  @Column({
    name: 'max_probability',
    type: 'numeric',
    precision: 5,
    scale: 2,
    nullable: true,
    transformer: numericTransformer,
  })
  maxProbability!: number | null;

  @Column({ name: 'probability_distribution', type: 'jsonb', nullable: true })
  probabilityDistribution!: Record<string, number> | null;

  @Column({ name: 'rank_level_matches', type: 'int', default: 0 })
  rankLevelMatches!: number;

  @Column({ name: 'bucket_level_matches', type: 'int', default: 0 })
  bucketLevelMatches!: number;

  @Column({ name: 'no_historical_match', type: 'int', default: 0 })
  noHistoricalMatch!: number;

  @Column({ name: 'confederation_counts', type: 'jsonb', nullable: true })
  confederationCounts!: Record<string, number> | null;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ name: 'error_details', type: 'jsonb', nullable: true })
  errorDetails!: RowFailure[] | null;

  @Column({ type: 'jsonb', nullable: true })
  warnings!: string[] | null;

  @Column({ name: 'execution_context', type: 'varchar', length: 10 })
  executionContext!: ExecutionContext;

  @Column({ type: 'varchar', length: 20 })
  environment!: string;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;
}
