import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import configuration from './configuration';
import { HistoricalProbabilityLookup } from '../qualification/entities/historical-probability-lookup.entity';
import { HistoricalStanding } from '../qualification/entities/historical-standing.entity';
import { PredictionRun } from '../qualification/entities/prediction-run.entity';
import { TeamSlotProbability } from '../qualification/entities/team-slot-probability.entity';

config();

const appConfig = configuration();

/** DataSource for the TypeORM migration CLI. */
export default new DataSource({
  type: 'postgres',
  host: appConfig.database.host,
  port: appConfig.database.port,
  username: appConfig.database.username,
  password: appConfig.database.password,
  database: appConfig.database.database,
  entities: [TeamSlotProbability, HistoricalStanding, HistoricalProbabilityLookup, PredictionRun],
  migrations: ['src/database/migrations/*.ts'],
  migrationsTableName: 'qualification_migrations',
  synchronize: false,
  logging: appConfig.nodeEnv === 'development' ? ['error', 'warn', 'migration'] : ['error'],
});
