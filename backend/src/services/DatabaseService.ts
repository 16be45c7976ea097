import knex, { Knex } from 'knex';
import { dbConfig } from '@/config/database';
import { logger } from '@/utils/logger';

interface InitializeOptions {
  config?: Knex.Config;
  migrate?: boolean;
}

export class DatabaseService {
  private static instance: Knex | null = null;

  static async initialize({ config = dbConfig, migrate = true }: InitializeOptions = {}): Promise<Knex> {
    if (this.instance) {
      return this.instance;
    }

    const db = knex(config);

    try {
      await this.testConnection(db);

      if (migrate) {
        const [batch, applied] = await db.migrate.latest();
        logger.info('Database migrations applied', { batch, migrations: applied.length });
      }
    } catch (error) {
      logger.error('Database initialization failed:', error);
      await db.destroy();
      throw error;
    }

    this.instance = db;
    logger.info('Database service initialized successfully', {
      client: config.client,
      poolMin: config.pool?.min,
      poolMax: config.pool?.max,
    });

    return db;
  }

  private static async testConnection(db: Knex, retries = 3): Promise<void> {
    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        await db.raw('SELECT 1+1 as result');
        return;
      } catch (error) {
        logger.warn('Database connection attempt failed', {
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });

        if (attempt === retries) {
          throw error;
        }
        await new Promise(resolve => setTimeout(resolve, attempt * 500));
      }
    }
  }

  static async healthCheck(): Promise<boolean> {
    if (!this.instance) {
      return false;
    }

    try {
      await this.instance.raw('SELECT 1 as health_check');
      return true;
    } catch (error) {
      logger.error('Database health check failed:', error);
      return false;
    }
  }

  static async close(): Promise<void> {
    if (!this.instance) {
      return;
    }

    const db = this.instance;
    this.instance = null;
    await db.destroy();
    logger.info('Database connection closed');
  }
}
