import dotenv from 'dotenv';
dotenv.config();

import knex from 'knex';
import { dbConfig } from '../src/config/database';
import { logger } from '../src/utils/logger';

async function runSeeds(): Promise<void> {
  const db = knex(dbConfig);

  try {
    await db.migrate.latest();
    const [files] = await db.seed.run();
    console.log(`🌱 Seeded locomotive fleet from ${files.length} seed file(s)`);
  } catch (error) {
    logger.error('Seeding failed', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  } finally {
    await db.destroy();
  }
}

void runSeeds();
