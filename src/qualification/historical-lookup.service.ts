import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { HistoricalProbabilityLookup } from './entities/historical-probability-lookup.entity';
import { HistoricalStanding } from './entities/historical-standing.entity';
import { StoreUnavailableError } from './errors/qualification.errors';
import { bucketize, getPointsPerGame } from './helpers/bucket.helper';
import { ArchiveSample, buildLookupEntries } from './lookup/historical-lookup.builder';
import { HistoricalLookupTable } from './lookup/historical-lookup.table';
import {
  HistoricalProbabilityEntry,
  HistoricalStandingInput,
  isHistoricalProbabilityEntry,
  QUALIFICATION_CONSTANTS,
} from './types/qualification.types';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { chunk } from '../common/utils/array.util';
import { getErrorMessage, getErrorStack } from '../common/utils/error.util';
import { roundTo } from '../common/utils/number.util';
import { RedisService } from '../redis/redis.service';

export interface LookupRebuildSummary {
  entries: number;
  rankEntries: number;
  bucketEntries: number;
  sourceRows: number;
  hash: string;
}

function toEntry(row: HistoricalProbabilityLookup): HistoricalProbabilityEntry {
  return {
    confederation: row.confederation,
    stage: row.stage,
    rank: row.rank,
    rankBucket: row.rankBucket,
    ppgBucket: row.ppgBucket,
    lookupLevel: row.lookupLevel,
    historicalQualProb: row.historicalQualProb,
  };
}

function toSample(row: HistoricalStanding): ArchiveSample {
  return {
    confederation: row.confederation,
    stage: row.stage,
    rank: row.rank,
    rankBucket: row.rankBucket,
    ppgBucket: row.ppgBucket,
    qualified: row.qualified,
  };
}

function readCachedEntries(value: unknown): HistoricalProbabilityEntry[] | null {
  if (!Array.isArray(value)) return null;
  const entries: HistoricalProbabilityEntry[] = [];
  for (const item of value) {
    if (!isHistoricalProbabilityEntry(item)) return null;
    entries.push(item);
  }
  return entries;
}

/**
 * Historical Lookup Table
 *
 * Serves the table derived from past qualifying cycles. Reads go through
 * Redis; the `historical_probability_lookup` table is the source of truth
 * and is recomputed from `historical_standings` by {@link rebuild}.
 */
@Injectable()
export class HistoricalLookupService {
  private readonly logger = new Logger(HistoricalLookupService.name);
  private readonly cacheTtlSeconds: number;

  constructor(
    private dataSource: DataSource,
    @InjectRepository(HistoricalProbabilityLookup)
    private lookupRepository: Repository<HistoricalProbabilityLookup>,
    @InjectRepository(HistoricalStanding)
    private standingRepository: Repository<HistoricalStanding>,
    private redisService: RedisService,
    private configService: ConfigService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {
    this.cacheTtlSeconds = this.configService.get<number>('historical.cacheTtlSeconds') ?? 86400;
  }

  async getTable(): Promise<HistoricalLookupTable> {
    const cached = await this.readCache();
    if (cached) {
      this.metricsService.incrementLookupCache('hit');
      return HistoricalLookupTable.fromEntries(cached);
    }

    let rows: HistoricalProbabilityLookup[];
    try {
      rows = await this.lookupRepository.find();
    } catch (error) {
      throw new StoreUnavailableError(
        `Historical lookup unavailable: ${getErrorMessage(error)}`,
        error,
      );
    }

    const entries = rows.map(toEntry);
    const table = HistoricalLookupTable.fromEntries(entries);
    this.metricsService.setLookupEntries(table.rankEntryCount, table.bucketEntryCount);

    try {
      await this.redisService.setJson(
        QUALIFICATION_CONSTANTS.CACHE_KEYS.LOOKUP_ENTRIES,
        this.cacheTtlSeconds,
        entries,
      );
    } catch (error) {
      this.logger.warn(`Could not cache historical lookup: ${getErrorMessage(error)}`);
    }

    return table;
  }

  /**
   * Recomputes every lookup entry from the archive and replaces the table
   * in one transaction.
   */
  async rebuild(): Promise<LookupRebuildSummary> {
    try {
      const standings = await this.standingRepository.find();
      const entries = buildLookupEntries(standings.map(toSample));
      const table = HistoricalLookupTable.fromEntries(entries);

      await this.dataSource.transaction(async (manager) => {
        const repository = manager.getRepository(HistoricalProbabilityLookup);
        await repository.createQueryBuilder().delete().execute();
        for (const batch of chunk(entries, QUALIFICATION_CONSTANTS.WRITE_CHUNK_SIZE)) {
          await repository.insert(batch);
        }
      });

      await this.invalidateCache();

      const summary: LookupRebuildSummary = {
        entries: table.size,
        rankEntries: table.rankEntryCount,
        bucketEntries: table.bucketEntryCount,
        sourceRows: standings.length,
        hash: table.hash,
      };

      this.logger.log(
        `Historical lookup rebuilt: ${summary.rankEntries} rank entries, ${summary.bucketEntries} bucket entries from ${summary.sourceRows} standings`,
      );
      this.auditLogger.logLookupRebuilt(summary.entries, summary.hash, summary.sourceRows);
      this.metricsService.recordLookupRebuild('success');
      this.metricsService.setLookupEntries(summary.rankEntries, summary.bucketEntries);
      return summary;
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error(`Historical lookup rebuild failed: ${message}`, getErrorStack(error));
      this.auditLogger.logLookupRebuildFailed(message);
      this.metricsService.recordLookupRebuild('failure');
      throw error;
    }
  }

  /**
   * Upserts archived standings on (season, confederation, stage, group, team),
   * deriving their buckets. The lookup table is not rebuilt.
   *
   * @returns number of standings written
   */
  async importArchive(rows: readonly HistoricalStandingInput[], actor?: string): Promise<number> {
    if (rows.length === 0) return 0;

    const records = rows.map((row) => {
      const buckets = bucketize(row);
      const pointsPerGame = getPointsPerGame(row.points, row.played);
      return {
        season: row.season,
        confederation: row.confederation,
        stage: row.stage,
        group: row.group,
        team: row.team,
        rank: row.rank,
        points: row.points,
        played: row.played,
        wins: row.wins ?? 0,
        draws: row.draws ?? 0,
        losses: row.losses ?? 0,
        goalsFor: row.goalsFor ?? 0,
        goalsAgainst: row.goalsAgainst ?? 0,
        goalDiff: row.goalDiff,
        qualified: row.qualified,
        note: row.note ?? null,
        sourceUrl: row.sourceUrl ?? null,
        rankBucket: buckets.rankBucket,
        ppgBucket: buckets.ppgBucket,
        goalDiffBucket: buckets.goalDiffBucket,
        pointsPerGame: pointsPerGame === null ? null : roundTo(pointsPerGame, 2),
      };
    });

    await this.dataSource.transaction(async (manager) => {
      const repository = manager.getRepository(HistoricalStanding);
      for (const batch of chunk(records, QUALIFICATION_CONSTANTS.WRITE_CHUNK_SIZE)) {
        await repository.upsert(batch, {
          conflictPaths: ['season', 'confederation', 'stage', 'group', 'team'],
        });
      }
    });

    this.auditLogger.logHistoricalImported(records.length, actor);
    return records.length;
  }

  async invalidateCache(): Promise<void> {
    try {
      await this.redisService.del(QUALIFICATION_CONSTANTS.CACHE_KEYS.LOOKUP_ENTRIES);
    } catch (error) {
      this.logger.warn(`Could not invalidate historical lookup cache: ${getErrorMessage(error)}`);
    }
  }

  @Cron(CronExpression.EVERY_WEEK, { name: 'historical-lookup-rebuild' })
  async handleScheduledRebuild(): Promise<void> {
    if (this.configService.get<boolean>('historical.rebuildEnabled') === false) return;

    try {
      await this.rebuild();
    } catch (error) {
      this.logger.error(`Scheduled lookup rebuild failed: ${getErrorMessage(error)}`);
    }
  }

  private async readCache(): Promise<HistoricalProbabilityEntry[] | null> {
    let cached: unknown;
    try {
      cached = await this.redisService.getJson(QUALIFICATION_CONSTANTS.CACHE_KEYS.LOOKUP_ENTRIES);
    } catch (error) {
      this.logger.warn(`Historical lookup cache unavailable: ${getErrorMessage(error)}`);
      this.metricsService.incrementLookupCache('error');
      return null;
    }

    if (cached === null) {
      this.metricsService.incrementLookupCache('miss');
      return null;
    }

    const entries = readCachedEntries(cached);
    if (entries === null) {
      this.logger.warn('Discarding malformed historical lookup cache entry');
      this.metricsService.incrementLookupCache('miss');
      await this.invalidateCache();
    }
    return entries;
  }
}
