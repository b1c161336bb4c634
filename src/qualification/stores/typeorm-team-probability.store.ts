import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, FindOptionsWhere, Repository } from 'typeorm';
import { TeamSlotProbability } from '../entities/team-slot-probability.entity';
import { standingKey } from '../helpers/standing.parser';
import {
  MaterializeSummary,
  ProbabilityResult,
  QUALIFICATION_CONSTANTS,
} from '../types/qualification.types';
import { ProbabilityFilter, StoredProbability, TeamProbabilityStore } from './team-probability.store';
import { chunk } from '../../common/utils/array.util';

/**
 * Postgres-backed store. A batch is upserted on (team, confederation, group)
 * inside one transaction.
 */
@Injectable()
export class TypeOrmTeamProbabilityStore implements TeamProbabilityStore {
  constructor(
    private dataSource: DataSource,
    @InjectRepository(TeamSlotProbability)
    private probabilityRepository: Repository<TeamSlotProbability>,
  ) {}

  async applyBatch(
    results: readonly ProbabilityResult[],
    runId: string,
  ): Promise<MaterializeSummary> {
    if (results.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    const updatedAt = new Date();

    return await this.dataSource.transaction(async (manager) => {
      const repository = manager.getRepository(TeamSlotProbability);
      let updated = 0;

      for (const batch of chunk(results, QUALIFICATION_CONSTANTS.WRITE_CHUNK_SIZE)) {
        const existing = await repository.find({
          select: { team: true, confederation: true, group: true },
          where: batch.map(({ team, confederation, group }) => ({ team, confederation, group })),
        });
        const existingKeys = new Set(existing.map(standingKey));
        updated += batch.filter((result) => existingKeys.has(standingKey(result))).length;

        await repository.upsert(
          batch.map((result) => ({
            team: result.team,
            confederation: result.confederation,
            group: result.group,
            stage: result.stage,
            rank: result.rank,
            points: result.points,
            played: result.played,
            goalDiff: result.goalDiff,
            probFillSlot: result.probFillSlot,
            qualificationStatus: result.qualificationStatus,
            lookupLevel: result.lookupLevel,
            runId,
            updatedAt,
          })),
          { conflictPaths: ['team', 'confederation', 'group'] },
        );
      }

      return { inserted: results.length - updated, updated };
    });
  }

  async findCurrent(filter: ProbabilityFilter = {}): Promise<StoredProbability[]> {
    const where: FindOptionsWhere<TeamSlotProbability> = {};
    if (filter.confederation) where.confederation = filter.confederation;
    if (filter.status) where.qualificationStatus = filter.status;

    return await this.probabilityRepository.find({
      where,
      order: { confederation: 'ASC', group: 'ASC', probFillSlot: 'DESC', team: 'ASC' },
    });
  }
}
