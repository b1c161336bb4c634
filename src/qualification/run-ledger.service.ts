import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectRepository } from '@nestjs/typeorm';
import { In, LessThan, Repository } from 'typeorm';
import { PredictionRun } from './entities/prediction-run.entity';
import { RunStateError } from './errors/qualification.errors';
import { RunStatistics } from './helpers/run-statistics.helper';
import {
  ExecutionContext,
  MaterializeSummary,
  RowFailure,
  RunStatus,
  RunType,
  TerminalRunStatus,
} from './types/qualification.types';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { roundTo } from '../common/utils/number.util';
import { getErrorMessage, getErrorStack } from '../common/utils/error.util';

export interface StartRunParams {
  inputHash: string;
  historicalLookupHash: string | null;
  modelVersion: string;
  runType: RunType;
  executionContext: ExecutionContext;
  inputParams?: Record<string, unknown>;
  notes?: string;
  requestedBy?: string;
  rowCount: number;
}

export interface RunOutcome extends MaterializeSummary {
  rowsProcessed: number;
  rowsFailed: number;
  statistics: RunStatistics;
  errorDetails: RowFailure[];
  warnings: string[];
}

type RunChanges = Partial<
  Omit<PredictionRun, 'id' | 'inputHash' | 'startedAt' | 'executionContext' | 'environment' | 'inputParams'>
>;

/** Statuses whose runs wrote their results to the store. */
const MATERIALIZED_STATUSES: RunStatus[] = ['success', 'partial'];

/**
 * `success` when nothing failed, `partial` when some rows failed,
 * `failed` when every row failed or there was nothing to process.
 */
export function resolveRunStatus(rowsProcessed: number, rowsFailed: number): TerminalRunStatus {
  if (rowsProcessed === 0 || rowsFailed >= rowsProcessed) return 'failed';
  if (rowsFailed === 0) return 'success';
  return 'partial';
}

/**
 * Run Ledger
 *
 * Owns the `prediction_runs` table. A run is created as `running` and moves
 * exactly once to `success`, `partial` or `failed`; rows are never deleted.
 */
@Injectable()
export class RunLedgerService {
  private readonly logger = new Logger(RunLedgerService.name);

  constructor(
    @InjectRepository(PredictionRun)
    private runRepository: Repository<PredictionRun>,
    private configService: ConfigService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {}

  async start(params: StartRunParams): Promise<PredictionRun> {
    const run = this.runRepository.create({
      runType: params.runType,
      status: 'running',
      inputHash: params.inputHash,
      historicalLookupHash: params.historicalLookupHash,
      modelVersion: params.modelVersion,
      inputParams: params.inputParams ?? null,
      startedAt: new Date(),
      completedAt: null,
      executionTimeSeconds: null,
      rowsProcessed: 0,
      rowsInserted: 0,
      rowsUpdated: 0,
      rowsFailed: 0,
      errorMessage: null,
      errorDetails: null,
      warnings: null,
      executionContext: params.executionContext,
      environment: this.configService.get<string>('environment') || 'development',
      notes: params.notes ?? null,
    });

    const saved = await this.runRepository.save(run);
    this.auditLogger.logRunStarted(saved.id, saved.inputHash, params.rowCount, params.requestedBy);
    return saved;
  }

  async complete(run: PredictionRun, outcome: RunOutcome): Promise<PredictionRun> {
    this.assertRunning(run, 'complete');

    const status = resolveRunStatus(outcome.rowsProcessed, outcome.rowsFailed);
    const { statistics } = outcome;

    const saved = await this.finish(run, 'complete', {
      status,
      rowsProcessed: outcome.rowsProcessed,
      rowsFailed: outcome.rowsFailed,
      rowsInserted: outcome.inserted,
      rowsUpdated: outcome.updated,
      qualifiedCount: statistics.qualifiedCount,
      inProgressCount: statistics.inProgressCount,
      avgProbability: statistics.avgProbability,
      minProbability: statistics.minProbability,
      maxProbability: statistics.maxProbability,
      probabilityDistribution: statistics.probabilityDistribution,
      rankLevelMatches: statistics.rankLevelMatches,
      bucketLevelMatches: statistics.bucketLevelMatches,
      noHistoricalMatch: statistics.noHistoricalMatch,
      confederationCounts: statistics.confederationCounts,
      errorDetails: outcome.errorDetails.length > 0 ? outcome.errorDetails : null,
      warnings: outcome.warnings.length > 0 ? outcome.warnings : null,
      errorMessage: this.describeOutcome(status, outcome),
    });
    this.auditLogger.logRunCompleted(saved.id, status, {
      rowsProcessed: saved.rowsProcessed,
      rowsFailed: saved.rowsFailed,
      rowsInserted: saved.rowsInserted,
      rowsUpdated: saved.rowsUpdated,
    });
    return saved;
  }

  /**
   * Marks a run failed after an unrecoverable error. Counts already known
   * (rows processed and failed before the error) are kept on the record.
   */
  async fail(
    run: PredictionRun,
    error: unknown,
    counts?: Pick<RunOutcome, 'rowsProcessed' | 'rowsFailed' | 'errorDetails'>,
  ): Promise<PredictionRun> {
    this.assertRunning(run, 'fail');

    const message = getErrorMessage(error);
    const changes: RunChanges = { status: 'failed', errorMessage: message };
    if (counts) {
      changes.rowsProcessed = counts.rowsProcessed;
      changes.rowsFailed = counts.rowsFailed;
      changes.errorDetails = counts.errorDetails.length > 0 ? counts.errorDetails : null;
    }

    this.logger.error(`Run ${run.id} failed: ${message}`, getErrorStack(error));
    const saved = await this.finish(run, 'fail', changes);
    this.auditLogger.logRunFailed(saved.id, message);
    return saved;
  }

  /**
   * The run whose results the store currently holds, when it succeeded over
   * the same input, lookup table and model. A later run that wrote other
   * results makes an earlier identical run stale.
   */
  async findReusableRun(
    inputHash: string,
    historicalLookupHash: string,
    modelVersion: string,
  ): Promise<PredictionRun | null> {
    const latest = await this.runRepository.findOne({
      where: { status: In(MATERIALIZED_STATUSES) },
      order: { completedAt: 'DESC' },
    });

    if (
      !latest ||
      latest.status !== 'success' ||
      latest.inputHash !== inputHash ||
      latest.historicalLookupHash !== historicalLookupHash ||
      latest.modelVersion !== modelVersion
    ) {
      return null;
    }
    return latest;
  }

  async findById(id: string): Promise<PredictionRun | null> {
    return await this.runRepository.findOne({ where: { id } });
  }

  async findRecent(limit: number = 20): Promise<PredictionRun[]> {
    return await this.runRepository.find({
      order: { startedAt: 'DESC' },
      take: limit,
    });
  }

  /**
   * Marks every run still `running` after `olderThanMinutes` as failed.
   *
   * @returns ids of the runs that were reconciled
   */
  async reconcileStaleRuns(olderThanMinutes?: number): Promise<string[]> {
    const minutes =
      olderThanMinutes ?? this.configService.get<number>('runs.staleAfterMinutes') ?? 30;
    const cutoff = new Date(Date.now() - minutes * 60_000);

    const stale = await this.runRepository.find({
      select: { id: true },
      where: { status: 'running', startedAt: LessThan(cutoff) },
    });

    if (stale.length === 0) {
      this.logger.log('No stale runs to reconcile');
      return [];
    }

    const ids = stale.map((run) => run.id);
    await this.runRepository.update(
      { id: In(ids), status: 'running' },
      {
        status: 'failed',
        completedAt: new Date(),
        errorMessage: `Run did not finish within ${minutes} minutes; marked failed by the stale run sweep`,
      },
    );

    this.logger.warn(`Marked ${ids.length} stale runs as failed`);
    this.auditLogger.logStaleRunsReconciled(ids, minutes);
    this.metricsService.incrementStaleRunsReconciled(ids.length);
    return ids;
  }

  @Cron(CronExpression.EVERY_10_MINUTES, { name: 'stale-run-sweep' })
  async handleStaleRunSweep(): Promise<void> {
    if (this.configService.get<boolean>('runs.sweepEnabled') === false) return;

    try {
      await this.reconcileStaleRuns();
    } catch (error) {
      this.logger.error(`Stale run sweep failed: ${getErrorMessage(error)}`, getErrorStack(error));
    }
  }

  private assertRunning(run: PredictionRun, attempted: string): void {
    if (run.status !== 'running') {
      throw new RunStateError(run.id, run.status, attempted);
    }
  }

  /**
   * Writes the terminal transition only while the stored run is still
   * `running`; the stale sweep may have closed it in the meantime.
   */
  private async finish(
    run: PredictionRun,
    attempted: string,
    changes: RunChanges,
  ): Promise<PredictionRun> {
    const completedAt = new Date();
    const seconds = roundTo((completedAt.getTime() - run.startedAt.getTime()) / 1000, 3);
    const terminal: RunChanges = { ...changes, completedAt, executionTimeSeconds: seconds };

    const result = await this.runRepository.update({ id: run.id, status: 'running' }, terminal);
    if (!result.affected) {
      const stored = await this.findById(run.id);
      throw new RunStateError(run.id, stored?.status ?? run.status, attempted);
    }

    const saved = Object.assign(run, terminal);
    this.metricsService.recordRun(saved.status, saved.executionContext, seconds);
    return saved;
  }

  private describeOutcome(status: TerminalRunStatus, outcome: RunOutcome): string | null {
    if (status === 'success') return null;
    if (outcome.rowsProcessed === 0) return 'No standing rows were submitted';
    return `${outcome.rowsFailed} of ${outcome.rowsProcessed} rows failed`;
  }
}
