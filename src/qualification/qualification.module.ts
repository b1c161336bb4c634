import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { QualificationController } from './qualification.controller';
import { QualificationRunService } from './qualification-run.service';
import { QualificationRunProcessor } from './qualification-run.processor';
import { ProbabilityBlenderService } from './probability-blender.service';
import { HistoricalLookupService } from './historical-lookup.service';
import { OutputMaterializerService } from './output-materializer.service';
import { RunLedgerService } from './run-ledger.service';
import { TEAM_PROBABILITY_STORE } from './stores/team-probability.store';
import { TypeOrmTeamProbabilityStore } from './stores/typeorm-team-probability.store';
import { TeamSlotProbability } from './entities/team-slot-probability.entity';
import { HistoricalStanding } from './entities/historical-standing.entity';
import { HistoricalProbabilityLookup } from './entities/historical-probability-lookup.entity';
import { PredictionRun } from './entities/prediction-run.entity';
import { CommonModule } from '../common/common.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      TeamSlotProbability,
      HistoricalStanding,
      HistoricalProbabilityLookup,
      PredictionRun,
    ]),
    CommonModule,
  ],
  controllers: [QualificationController],
  providers: [
    QualificationRunService,
    QualificationRunProcessor,
    ProbabilityBlenderService,
    HistoricalLookupService,
    OutputMaterializerService,
    RunLedgerService,
    { provide: TEAM_PROBABILITY_STORE, useClass: TypeOrmTeamProbabilityStore },
  ],
  exports: [QualificationRunService, HistoricalLookupService, RunLedgerService],
})
export class QualificationModule {}
