import dotenv from 'dotenv';
dotenv.config();

import knex from 'knex';
import { dbConfig } from '../src/config/database';
import { logger } from '../src/utils/logger';

// Usage: migrate [--rollback]
async function runMigrations(rollback: boolean): Promise<void> {
  const db = knex(dbConfig);

  try {
    if (rollback) {
      const [batch, reverted] = await db.migrate.rollback();
      console.log(`↩️  Rolled back batch ${batch} (${reverted.length} migrations)`);
    } else {
      const [batch, applied] = await db.migrate.latest();
      console.log(applied.length > 0
        ? `✅ Applied ${applied.length} migrations in batch ${batch}`
        : '✅ Database schema is up to date');
    }
  } catch (error) {
    logger.error('Migration failed', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  } finally {
    await db.destroy();
  }
}

void runMigrations(process.argv.includes('--rollback'));
