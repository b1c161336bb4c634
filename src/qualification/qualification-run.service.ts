import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HistoricalLookupService } from './historical-lookup.service';
import { OutputMaterializerService } from './output-materializer.service';
import { ProbabilityBlenderService } from './probability-blender.service';
import { RunLedgerService } from './run-ledger.service';
import { PredictionRun } from './entities/prediction-run.entity';
import {
  MalformedStandingError,
  StandingValidationError,
  StoreUnavailableError,
} from './errors/qualification.errors';
import { bucketize } from './helpers/bucket.helper';
import { computeRunStatistics } from './helpers/run-statistics.helper';
import { parseStandingRow, standingKey } from './helpers/standing.parser';
import { HistoricalLookupTable } from './lookup/historical-lookup.table';
import {
  ExecutionContext,
  HostNation,
  MaterializeSummary,
  ProbabilityResult,
  QUALIFICATION_CONSTANTS,
  RowFailure,
  RunType,
  StandingRow,
} from './types/qualification.types';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { computeContentHash } from '../common/utils/content-hash.util';
import { RabbitMQService } from '../rabbitmq/rabbitmq.service';

/** Body of a run request, over HTTP or as a queue message. */
export interface RunRequest {
  rows: readonly unknown[];
  source?: string;
  requestedBy?: string;
  force?: boolean;
}

export interface ExecuteRunParams extends RunRequest {
  executionContext: ExecutionContext;
  runType?: RunType;
}

export interface RunExecution {
  run: PredictionRun;
  deduplicated: boolean;
  results: ProbabilityResult[];
}

export interface EnqueueResult {
  queued: boolean;
  queueDepth: number;
}

type ParsedRow =
  | { raw: unknown; parsed: true; standing: StandingRow }
  | { raw: unknown; parsed: false; error: MalformedStandingError };

interface ProcessedRows {
  results: ProbabilityResult[];
  failures: RowFailure[];
}

function teamOf(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || !('team' in raw)) return null;
  return typeof raw.team === 'string' ? raw.team : null;
}

/**
 * Runs the engine over one batch of standings: parse, bucketize, look up,
 * blend, materialize, each step recorded on a ledger run.
 */
@Injectable()
export class QualificationRunService {
  private readonly logger = new Logger(QualificationRunService.name);
  private readonly queueName: string;

  constructor(
    private blender: ProbabilityBlenderService,
    private historicalLookup: HistoricalLookupService,
    private materializer: OutputMaterializerService,
    private ledger: RunLedgerService,
    private rabbitMQService: RabbitMQService,
    private configService: ConfigService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {
    this.queueName = this.configService.get<string>('rabbitmq.queue') || 'qualification.run';
  }

  async execute(params: ExecuteRunParams): Promise<RunExecution> {
    const rows = [...this.hostRows(), ...params.rows];
    const parsedRows = this.parseRows(rows);
    // Rows that parse are hashed in their normalized form
    const inputHash = computeContentHash(
      parsedRows.map((row) => (row.parsed ? row.standing : row.raw)),
    );
    const modelVersion = this.blender.modelVersion;
    const baseRun = {
      inputHash,
      modelVersion,
      runType: params.runType ?? 'full_update',
      executionContext: params.executionContext,
      inputParams: {
        source: params.source ?? null,
        force: params.force ?? false,
        rowCount: rows.length,
        hostNations: rows.length - params.rows.length,
      },
      notes: params.source,
      requestedBy: params.requestedBy,
      rowCount: rows.length,
    };

    let table: HistoricalLookupTable;
    try {
      table = await this.historicalLookup.getTable();
    } catch (error) {
      const run = await this.ledger.start({ ...baseRun, historicalLookupHash: null });
      await this.ledger.fail(run, error);
      throw error;
    }

    if (!params.force && this.configService.get<boolean>('qualification.dedupEnabled') !== false) {
      const previous = await this.ledger.findReusableRun(inputHash, table.hash, modelVersion);
      if (previous) {
        this.logger.log(`Input ${inputHash.slice(0, 12)} already processed by run ${previous.id}`);
        this.auditLogger.logRunDeduplicated(previous.id, inputHash, params.requestedBy);
        this.metricsService.incrementRunsDeduplicated();
        return { run: previous, deduplicated: true, results: [] };
      }
    }

    const run = await this.ledger.start({ ...baseRun, historicalLookupHash: table.hash });
    const { results, failures } = this.processRows(parsedRows, table);
    const counts = {
      rowsProcessed: rows.length,
      rowsFailed: failures.length,
      errorDetails: failures,
    };

    let summary: MaterializeSummary = { inserted: 0, updated: 0 };
    try {
      if (results.length > 0) {
        summary = await this.materializer.apply(results, run.id);
      }
    } catch (error) {
      const failed = await this.ledger.fail(run, error, counts);
      if (error instanceof StoreUnavailableError) {
        return { run: failed, deduplicated: false, results };
      }
      throw error;
    }

    this.metricsService.recordRows(results.length, failures.length);

    const completed = await this.ledger.complete(run, {
      ...counts,
      ...summary,
      statistics: computeRunStatistics(results),
      warnings: this.collectWarnings(table, results),
    });

    this.logger.log(
      `Run ${completed.id} ${completed.status}: ${results.length} of ${rows.length} rows materialized`,
    );
    return { run: completed, deduplicated: false, results };
  }

  /**
   * Publishes a run request for the worker. The run itself is recorded when
   * the worker picks it up.
   */
  async enqueue(request: RunRequest): Promise<EnqueueResult> {
    const queued = await this.rabbitMQService.publishToQueue(this.queueName, {
      rows: request.rows,
      source: request.source,
      requestedBy: request.requestedBy,
      force: request.force ?? false,
    });

    if (queued) {
      this.auditLogger.logRunQueued(request.rows.length, request.requestedBy);
      this.metricsService.incrementRunsQueued();
    } else {
      this.logger.warn(`Run request for ${request.rows.length} rows was not queued`);
    }

    const queueDepth = await this.rabbitMQService.getQueueMessageCount(this.queueName);
    this.metricsService.setQueueDepth(queueDepth);
    return { queued, queueDepth };
  }

  private parseRows(rows: readonly unknown[]): ParsedRow[] {
    const defaultStage =
      this.configService.get<string>('qualification.defaultStage') || 'Qualifying Group Stage';

    return rows.map((raw): ParsedRow => {
      try {
        return { raw, parsed: true, standing: parseStandingRow(raw, defaultStage) };
      } catch (error) {
        if (error instanceof MalformedStandingError) {
          return { raw, parsed: false, error };
        }
        throw error;
      }
    });
  }

  private processRows(rows: readonly ParsedRow[], table: HistoricalLookupTable): ProcessedRows {
    const results: ProbabilityResult[] = [];
    const failures: RowFailure[] = [];
    const seen = new Set<string>();

    const reject = (failure: RowFailure): void => {
      failures.push(failure);
      this.metricsService.incrementRowFailure(failure.reason);
    };

    rows.forEach((row, index) => {
      if (!row.parsed) {
        reject({
          index,
          team: teamOf(row.raw),
          reason: 'malformed',
          message: row.error.message,
          ...(row.error.field ? { field: row.error.field } : {}),
        });
        return;
      }

      try {
        const standing = this.blender.validateStanding(row.standing);

        const key = standingKey(standing);
        if (seen.has(key)) {
          reject({
            index,
            team: standing.team,
            reason: 'duplicate',
            message: `Duplicate standing for ${standing.team} in ${standing.confederation} ${standing.group}`,
          });
          return;
        }
        seen.add(key);

        const lookup = table.lookup(
          standing.confederation,
          standing.stage,
          standing.rank,
          bucketize(standing),
        );
        this.metricsService.incrementHistoricalMatch(lookup.level);
        results.push(this.blender.blend(standing, lookup));
      } catch (error) {
        if (error instanceof StandingValidationError) {
          reject({
            index,
            team: row.standing.team,
            reason: 'invalid',
            message: error.message,
            field: error.field,
          });
        } else {
          throw error;
        }
      }
    });

    return { results, failures };
  }

  private hostRows(): Record<string, unknown>[] {
    const hosts = this.configService.get<HostNation[]>('qualification.hostNations') ?? [];
    return hosts.map((host) => ({
      team: host.team,
      confederation: host.confederation,
      group: QUALIFICATION_CONSTANTS.HOST_GROUP,
      rank: null,
      points: 0,
      played: 0,
      goalDiff: 0,
      qualificationStatus: 'Qualified',
      note: 'Tournament host',
    }));
  }

  private collectWarnings(table: HistoricalLookupTable, results: ProbabilityResult[]): string[] {
    const warnings: string[] = [];
    if (table.size === 0) {
      warnings.push('Historical lookup table is empty; probabilities use the form component only');
    }
    const unmatched = results.filter(
      (result) => result.qualificationStatus !== 'Qualified' && result.lookupLevel === 'none',
    ).length;
    if (table.size > 0 && unmatched > 0) {
      warnings.push(`${unmatched} teams had no historical match`);
    }
    return warnings;
  }
}
