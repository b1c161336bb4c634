import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { QualificationRunService } from './qualification-run.service';
import { HistoricalLookupService } from './historical-lookup.service';
import { OutputMaterializerService } from './output-materializer.service';
import { RunLedgerService } from './run-ledger.service';
import { TriggerRunDto } from './dto/trigger-run.dto';
import { ProbabilityQueryDto } from './dto/probability-query.dto';
import { RunsQueryDto } from './dto/runs-query.dto';
import { ReconcileRunsDto } from './dto/reconcile-runs.dto';
import { ImportHistoricalDto } from './dto/import-historical.dto';
import { mapProbability, mapRunToDetail, mapRunToSummary } from './mappers/run-summary.mapper';
import { AdminApiKeyGuard } from '../common/guards/admin-api-key.guard';
import { RateLimitingGuard } from '../common/guards/rate-limiting.guard';

@Controller('qualification')
@ApiTags('Qualification')
export class QualificationController {
  constructor(
    private readonly runService: QualificationRunService,
    private readonly ledger: RunLedgerService,
    private readonly materializer: OutputMaterializerService,
    private readonly historicalLookup: HistoricalLookupService,
  ) {}

  @Get('probabilities')
  @ApiOperation({ summary: 'Current slot probability of every team' })
  @ApiResponse({ status: 200, description: 'Returns the current probability table' })
  async getProbabilities(@Query() query: ProbabilityQueryDto) {
    const records = await this.materializer.findCurrent({
      confederation: query.confederation,
      status: query.status,
    });

    return {
      count: records.length,
      probabilities: records.map(mapProbability),
    };
  }

  @Get('runs')
  @ApiOperation({ summary: 'Most recent runs, newest first' })
  @ApiResponse({ status: 200, description: 'Returns run summaries' })
  async getRuns(@Query() query: RunsQueryDto) {
    const runs = await this.ledger.findRecent(query.limit ?? 20);
    return { runs: runs.map(mapRunToSummary) };
  }

  @Get('runs/:id')
  @ApiOperation({ summary: 'One run with its per-row failures' })
  @ApiResponse({ status: 200, description: 'Returns the run' })
  @ApiResponse({ status: 404, description: 'Run not found' })
  async getRun(@Param('id', new ParseUUIDPipe()) id: string) {
    const run = await this.ledger.findById(id);
    if (!run) {
      throw new NotFoundException(`Run ${id} not found`);
    }
    return mapRunToDetail(run);
  }

  @Post('admin/runs')
  @UseGuards(AdminApiKeyGuard, RateLimitingGuard)
  @ApiSecurity('admin-key')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Run the engine over a batch of standings (Admin only)',
    description:
      'Blends every row, replaces the current probabilities and records the run. Identical input already processed returns the earlier run unless force is set.',
  })
  @ApiResponse({
    status: 200,
    description: 'Run finished',
    schema: {
      example: {
        deduplicated: false,
        run: { id: '6f1c3a52-9d0e-4b7a-8f59-2a8d7c1e4b90', status: 'partial' },
      },
    },
  })
  @ApiResponse({ status: 401, description: 'Missing or invalid admin key' })
  @ApiResponse({ status: 429, description: 'Rate limit exceeded' })
  @ApiResponse({ status: 503, description: 'Historical lookup or store unavailable' })
  async triggerRun(@Body() dto: TriggerRunDto) {
    const { run, deduplicated } = await this.runService.execute({
      rows: dto.rows,
      source: dto.source,
      requestedBy: dto.requestedBy,
      force: dto.force,
      executionContext: 'api',
    });

    return { deduplicated, run: mapRunToDetail(run) };
  }

  @Post('admin/runs/queue')
  @UseGuards(AdminApiKeyGuard, RateLimitingGuard)
  @ApiSecurity('admin-key')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Queue a batch of standings for the worker (Admin only)' })
  @ApiResponse({
    status: 202,
    description: 'Run request queued',
    schema: { example: { message: 'RUN_QUEUED', queued: true, queueDepth: 1 } },
  })
  async queueRun(@Body() dto: TriggerRunDto) {
    const result = await this.runService.enqueue({
      rows: dto.rows,
      source: dto.source,
      requestedBy: dto.requestedBy,
      force: dto.force,
    });

    return {
      message: result.queued ? 'RUN_QUEUED' : 'RUN_NOT_QUEUED',
      ...result,
    };
  }

  @Post('admin/runs/reconcile')
  @UseGuards(AdminApiKeyGuard)
  @ApiSecurity('admin-key')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark runs stuck in running as failed (Admin only)' })
  async reconcileRuns(@Body() dto: ReconcileRunsDto) {
    const runIds = await this.ledger.reconcileStaleRuns(dto.olderThanMinutes);
    return { reconciled: runIds.length, runIds };
  }

  @Post('admin/historical/import')
  @UseGuards(AdminApiKeyGuard)
  @ApiSecurity('admin-key')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Import archived standings (Admin only)',
    description: 'Upserts past final standings and, unless rebuild is false, rebuilds the lookup.',
  })
  async importHistorical(@Body() dto: ImportHistoricalDto) {
    const imported = await this.historicalLookup.importArchive(
      dto.standings.map((standing) => ({ ...standing, rank: standing.rank ?? null })),
      dto.requestedBy,
    );
    const lookup = dto.rebuild === false ? null : await this.historicalLookup.rebuild();

    return { imported, lookup };
  }

  @Post('admin/historical/rebuild')
  @UseGuards(AdminApiKeyGuard)
  @ApiSecurity('admin-key')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Rebuild the historical lookup from the archive (Admin only)' })
  @ApiResponse({
    status: 200,
    description: 'Lookup rebuilt',
    schema: {
      example: { entries: 412, rankEntries: 180, bucketEntries: 232, sourceRows: 1964, hash: '9c1f…' },
    },
  })
  async rebuildHistorical() {
    return await this.historicalLookup.rebuild();
  }
}
