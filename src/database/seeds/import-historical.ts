import 'reflect-metadata';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { config } from 'dotenv';
import { AppModule } from '../../app.module';
import { HistoricalLookupService } from '../../qualification/historical-lookup.service';
import { parseHistoricalArchive } from './historical-archive.loader';

config();

const DEFAULT_ARCHIVE = resolve(__dirname, 'data', 'historical-standings.example.json');

/**
 * Usage: npm run historical:import -- [archive.json] [--no-rebuild]
 */
async function importHistorical(): Promise<void> {
  const logger = new Logger('HistoricalImport');
  const args = process.argv.slice(2);
  const file = args.find((arg) => !arg.startsWith('--')) ?? DEFAULT_ARCHIVE;
  const rebuild = !args.includes('--no-rebuild');

  const standings = parseHistoricalArchive(await readFile(file, 'utf8'));
  logger.log(`Read ${standings.length} archived standings from ${file}`);

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn'],
  });

  try {
    const historicalLookup = app.get(HistoricalLookupService);
    const imported = await historicalLookup.importArchive(standings, 'cli');
    logger.log(`Imported ${imported} archived standings`);

    if (rebuild) {
      const summary = await historicalLookup.rebuild();
      logger.log(
        `Lookup rebuilt: ${summary.entries} entries (${summary.rankEntries} rank, ${summary.bucketEntries} bucket)`,
      );
    }
  } finally {
    await app.close();
  }
}

importHistorical().catch((error: unknown) => {
  new Logger('HistoricalImport').error(
    'Historical import failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
