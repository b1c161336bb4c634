import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { FindOperator } from 'typeorm';
import { QualificationRunService } from './qualification-run.service';
import { HistoricalLookupService } from './historical-lookup.service';
import { OutputMaterializerService } from './output-materializer.service';
import { ProbabilityBlenderService } from './probability-blender.service';
import { RunLedgerService } from './run-ledger.service';
import { PredictionRun } from './entities/prediction-run.entity';
import { StoreUnavailableError } from './errors/qualification.errors';
import { HistoricalLookupTable } from './lookup/historical-lookup.table';
import { TEAM_PROBABILITY_STORE } from './stores/team-probability.store';
import { InMemoryTeamProbabilityStore } from './stores/in-memory-team-probability.store';
import { HostNation } from './types/qualification.types';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { RabbitMQService } from '../rabbitmq/rabbitmq.service';

const STAGE = 'Qualifying Group Stage';

const table = HistoricalLookupTable.fromEntries([
  {
    confederation: 'UEFA',
    stage: STAGE,
    rank: 1,
    rankBucket: null,
    ppgBucket: null,
    lookupLevel: 'rank',
    historicalQualProb: 0.92,
  },
  {
    confederation: 'UEFA',
    stage: STAGE,
    rank: 4,
    rankBucket: null,
    ppgBucket: null,
    lookupLevel: 'rank',
    historicalQualProb: 0.2,
  },
]);

const netherlands = {
  team: 'Netherlands',
  confederation: 'UEFA',
  group: 'Group G',
  rank: 1,
  points: 18,
  played: 8,
  goalDiff: 12,
  qualificationStatus: 'InProgress',
};

const montenegro = {
  team: 'Montenegro',
  confederation: 'UEFA',
  group: 'Group G',
  rank: 4,
  points: 10,
  played: 8,
  goalDiff: 0,
  qualificationStatus: 'InProgress',
};

function groupRows(group: string, teams: string[]): Record<string, unknown>[] {
  return teams.map((team, index) => ({
    team,
    confederation: 'UEFA',
    group,
    rank: index + 1,
    points: 15 - index * 3,
    played: 6,
    goalDiff: 8 - index * 4,
    qualificationStatus: 'InProgress',
  }));
}

function createRunRepository() {
  const runs = new Map<string, PredictionRun>();
  let sequence = 0;

  return {
    runs,
    create: jest.fn((data: Partial<PredictionRun>) => Object.assign(new PredictionRun(), data)),
    save: jest.fn(async (run: PredictionRun) => {
      if (!run.id) {
        sequence++;
        run.id = `run-${sequence}`;
      }
      runs.set(run.id, { ...run });
      return run;
    }),
    update: jest.fn(async (criteria: { id: string; status: string }, changes: Partial<PredictionRun>) => {
      const stored = runs.get(criteria.id);
      if (!stored || stored.status !== criteria.status) return { affected: 0 };
      runs.set(criteria.id, { ...stored, ...changes });
      return { affected: 1 };
    }),
    // Serves findById and the latest-materialized-run query; runs complete in insertion order
    findOne: jest.fn(async ({ where }: { where: { id?: string; status?: unknown } }) => {
      if (where.id !== undefined) return runs.get(where.id) ?? null;
      const statuses: unknown = where.status instanceof FindOperator ? where.status.value : where.status;
      const matches = [...runs.values()].filter((run) =>
        Array.isArray(statuses) ? statuses.includes(run.status) : run.status === statuses,
      );
      return matches.pop() ?? null;
    }),
  };
}

describe('QualificationRunService', () => {
  let service: QualificationRunService;
  let store: InMemoryTeamProbabilityStore;
  let runRepository: ReturnType<typeof createRunRepository>;
  let config: Record<string, unknown>;

  const historicalLookup = { getTable: jest.fn() };
  const rabbitMQService = {
    publishToQueue: jest.fn(),
    getQueueMessageCount: jest.fn(),
  };
  const auditLogger = {
    logRunStarted: jest.fn(),
    logRunCompleted: jest.fn(),
    logRunFailed: jest.fn(),
    logRunDeduplicated: jest.fn(),
    logRunQueued: jest.fn(),
  };
  const metricsService = {
    recordRun: jest.fn(),
    incrementRunsDeduplicated: jest.fn(),
    incrementRunsQueued: jest.fn(),
    recordRows: jest.fn(),
    incrementRowFailure: jest.fn(),
    incrementHistoricalMatch: jest.fn(),
    setQueueDepth: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    store = new InMemoryTeamProbabilityStore();
    runRepository = createRunRepository();
    config = {
      'qualification.defaultStage': STAGE,
      'qualification.dedupEnabled': true,
      'rabbitmq.queue': 'qualification.run',
      environment: 'test',
    };
    historicalLookup.getTable.mockResolvedValue(table);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        QualificationRunService,
        ProbabilityBlenderService,
        OutputMaterializerService,
        RunLedgerService,
        { provide: TEAM_PROBABILITY_STORE, useValue: store },
        { provide: getRepositoryToken(PredictionRun), useValue: runRepository },
        { provide: HistoricalLookupService, useValue: historicalLookup },
        { provide: RabbitMQService, useValue: rabbitMQService },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => config[key]) } },
        { provide: AuditLoggerService, useValue: auditLogger },
        { provide: MetricsService, useValue: metricsService },
      ],
    }).compile();

    service = module.get<QualificationRunService>(QualificationRunService);
  });

  describe('execute', () => {
    it('should blend, materialize and record a successful run', async () => {
      const { run, deduplicated, results } = await service.execute({
        rows: [netherlands, montenegro],
        executionContext: 'api',
      });

      expect(deduplicated).toBe(false);
      expect(run.status).toBe('success');
      expect(run).toMatchObject({
        rowsProcessed: 2,
        rowsFailed: 0,
        rowsInserted: 2,
        rowsUpdated: 0,
        rankLevelMatches: 2,
        historicalLookupHash: table.hash,
        modelVersion: 'blend-v1',
        errorMessage: null,
      });
      expect(results.map((result) => [result.team, result.probFillSlot])).toEqual([
        ['Netherlands', 91.79],
        ['Montenegro', 38.81],
      ]);
      expect(store.size).toBe(2);
    });

    it('should end a batch of 10 with 2 negative-points rows as partial', async () => {
      const rows = [
        ...groupRows('Group A', ['Spain', 'Scotland', 'Norway', 'Georgia', 'Cyprus']),
        ...groupRows('Group B', ['France', 'Ukraine', 'Iceland', 'Azerbaijan', 'Malta']),
      ];
      rows[3] = { ...rows[3], points: -1 };
      rows[8] = { ...rows[8], points: -4 };

      const { run } = await service.execute({ rows, executionContext: 'worker' });

      expect(run.status).toBe('partial');
      expect(run.rowsProcessed).toBe(10);
      expect(run.rowsFailed).toBe(2);
      expect(run.rowsInserted).toBe(8);
      expect(run.errorMessage).toBe('2 of 10 rows failed');
      expect(run.errorDetails).toEqual([
        {
          index: 3,
          team: 'Georgia',
          reason: 'invalid',
          message: 'Points cannot be negative (-1)',
          field: 'points',
        },
        {
          index: 8,
          team: 'Azerbaijan',
          reason: 'invalid',
          message: 'Points cannot be negative (-4)',
          field: 'points',
        },
      ]);
      expect(store.size).toBe(8);
      expect(metricsService.incrementRowFailure).toHaveBeenCalledWith('invalid');
      expect(metricsService.recordRows).toHaveBeenCalledWith(8, 2);
    });

    it('should record unreadable rows as malformed', async () => {
      const { run } = await service.execute({
        rows: [netherlands, 'Scotland,UEFA,Group A', { ...montenegro, played: 'eight' }],
        executionContext: 'api',
      });

      expect(run.status).toBe('partial');
      expect(run.errorDetails).toEqual([
        {
          index: 1,
          team: null,
          reason: 'malformed',
          message: 'Standing row must be an object',
        },
        {
          index: 2,
          team: 'Montenegro',
          reason: 'malformed',
          message: 'played must be an integer number',
          field: 'played',
        },
      ]);
    });

    it('should reject a second row for the same team, confederation and group', async () => {
      const { run, results } = await service.execute({
        rows: [netherlands, { ...netherlands, points: 20 }],
        executionContext: 'api',
      });

      expect(run.status).toBe('partial');
      expect(results).toHaveLength(1);
      expect(results[0].points).toBe(18);
      expect(run.errorDetails).toEqual([
        {
          index: 1,
          team: 'Netherlands',
          reason: 'duplicate',
          message: 'Duplicate standing for Netherlands in UEFA Group G',
        },
      ]);
    });

    it('should fail an empty batch without touching the store', async () => {
      const { run } = await service.execute({ rows: [], executionContext: 'api' });

      expect(run.status).toBe('failed');
      expect(run.rowsProcessed).toBe(0);
      expect(run.errorMessage).toBe('No standing rows were submitted');
      expect(store.size).toBe(0);
    });

    it('should return the earlier run for identical input, in any order', async () => {
      const first = await service.execute({
        rows: [netherlands, montenegro],
        executionContext: 'api',
      });

      const second = await service.execute({
        rows: [montenegro, netherlands],
        executionContext: 'worker',
      });

      expect(second.deduplicated).toBe(true);
      expect(second.run.id).toBe(first.run.id);
      expect(second.results).toEqual([]);
      expect(runRepository.runs.size).toBe(1);
      expect(auditLogger.logRunDeduplicated).toHaveBeenCalledWith(
        first.run.id,
        first.run.inputHash,
        undefined,
      );
      expect(metricsService.incrementRunsDeduplicated).toHaveBeenCalledTimes(1);
    });

    it('should recompute when forced and leave an identical table', async () => {
      await service.execute({ rows: [netherlands, montenegro], executionContext: 'api' });
      const before = (await store.findCurrent()).map(({ team, probFillSlot }) => [team, probFillSlot]);

      const forced = await service.execute({
        rows: [netherlands, montenegro],
        executionContext: 'api',
        force: true,
      });

      expect(forced.deduplicated).toBe(false);
      expect(forced.run.id).toBe('run-2');
      expect(forced.run).toMatchObject({ status: 'success', rowsInserted: 0, rowsUpdated: 2 });
      expect(
        (await store.findCurrent()).map(({ team, probFillSlot }) => [team, probFillSlot]),
      ).toEqual(before);
    });

    it('should recompute when dedup is disabled', async () => {
      config['qualification.dedupEnabled'] = false;

      await service.execute({ rows: [netherlands], executionContext: 'api' });
      const second = await service.execute({ rows: [netherlands], executionContext: 'api' });

      expect(second.deduplicated).toBe(false);
      expect(runRepository.runs.size).toBe(2);
    });

    it('should not reuse a partial run', async () => {
      const rows = [netherlands, { ...montenegro, points: -1 }];

      await service.execute({ rows, executionContext: 'api' });
      const second = await service.execute({ rows, executionContext: 'api' });

      expect(second.deduplicated).toBe(false);
    });

    it('should recompute input that an intervening run replaced', async () => {
      const weaker = { ...netherlands, points: 9 };

      const first = await service.execute({ rows: [netherlands], executionContext: 'api' });
      await service.execute({ rows: [weaker], executionContext: 'api' });
      const third = await service.execute({ rows: [netherlands], executionContext: 'api' });

      expect(third.deduplicated).toBe(false);
      expect(third.run.id).toBe('run-3');
      expect(third.run.inputHash).toBe(first.run.inputHash);
      expect((await store.findCurrent()).map(({ team, probFillSlot }) => [team, probFillSlot])).toEqual([
        ['Netherlands', 91.79],
      ]);
    });

    it('should treat rows that normalize to the same standing as identical input', async () => {
      const first = await service.execute({ rows: [netherlands], executionContext: 'api' });

      const { goalDiff, played, ...rest } = netherlands;
      const second = await service.execute({
        rows: [{ ...rest, team: ' Netherlands ', goal_diff: goalDiff, games_played: played, stage: STAGE }],
        executionContext: 'api',
      });

      expect(second.deduplicated).toBe(true);
      expect(second.run.id).toBe(first.run.id);
    });

    it('should hash an omitted status the same as the status it defaults to', async () => {
      config['qualification.dedupEnabled'] = false;
      const { qualificationStatus: _status, ...withoutStatus } = netherlands;

      const explicit = await service.execute({ rows: [netherlands], executionContext: 'api' });
      const derived = await service.execute({ rows: [withoutStatus], executionContext: 'api' });

      expect(derived.run.inputHash).toBe(explicit.run.inputHash);
    });

    it('should fail the run and leave the store untouched when the store is unavailable', async () => {
      store.failAfter = 1;

      const { run, deduplicated } = await service.execute({
        rows: [netherlands, montenegro],
        executionContext: 'api',
      });

      expect(deduplicated).toBe(false);
      expect(run.status).toBe('failed');
      expect(run.rowsProcessed).toBe(2);
      expect(run.errorMessage).toBe(
        'Failed to materialize 2 probabilities: connection terminated unexpectedly',
      );
      expect(store.size).toBe(0);
      expect(auditLogger.logRunFailed).toHaveBeenCalledWith(run.id, run.errorMessage);
    });

    it('should record a failed run and rethrow when the lookup table cannot be loaded', async () => {
      historicalLookup.getTable.mockRejectedValue(
        new StoreUnavailableError('Historical lookup unavailable: connection refused'),
      );

      await expect(
        service.execute({ rows: [netherlands], executionContext: 'api' }),
      ).rejects.toThrow('Historical lookup unavailable: connection refused');

      const [recorded] = [...runRepository.runs.values()];
      expect(recorded).toMatchObject({
        status: 'failed',
        historicalLookupHash: null,
        errorMessage: 'Historical lookup unavailable: connection refused',
      });
    });

    it('should add configured host nations as qualified rows', async () => {
      const hosts: HostNation[] = [{ team: 'Canada', confederation: 'CONCACAF' }];
      config['qualification.hostNations'] = hosts;

      const { run, results } = await service.execute({
        rows: [netherlands],
        executionContext: 'api',
      });

      expect(run.rowsProcessed).toBe(2);
      expect(run.qualifiedCount).toBe(1);
      expect(results[0]).toMatchObject({
        team: 'Canada',
        group: 'Host',
        probFillSlot: 100,
        qualificationStatus: 'Qualified',
      });
    });

    it('should warn when teams have no historical match', async () => {
      const { run } = await service.execute({
        rows: [netherlands, { ...montenegro, rank: 3 }],
        executionContext: 'api',
      });

      expect(run.warnings).toEqual(['1 teams had no historical match']);
      expect(run.noHistoricalMatch).toBe(1);
    });
  });

  describe('enqueue', () => {
    it('should publish the request and report the queue depth', async () => {
      rabbitMQService.publishToQueue.mockResolvedValue(true);
      rabbitMQService.getQueueMessageCount.mockResolvedValue(3);

      const result = await service.enqueue({ rows: [netherlands], requestedBy: 'ops' });

      expect(result).toEqual({ queued: true, queueDepth: 3 });
      expect(rabbitMQService.publishToQueue).toHaveBeenCalledWith('qualification.run', {
        rows: [netherlands],
        source: undefined,
        requestedBy: 'ops',
        force: false,
      });
      expect(auditLogger.logRunQueued).toHaveBeenCalledWith(1, 'ops');
      expect(metricsService.setQueueDepth).toHaveBeenCalledWith(3);
    });

    it('should not count a request the broker refused', async () => {
      rabbitMQService.publishToQueue.mockResolvedValue(false);
      rabbitMQService.getQueueMessageCount.mockResolvedValue(0);

      await expect(service.enqueue({ rows: [netherlands] })).resolves.toEqual({
        queued: false,
        queueDepth: 0,
      });
      expect(metricsService.incrementRunsQueued).not.toHaveBeenCalled();
    });
  });
});
