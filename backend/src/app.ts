// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';
dotenv.config();

import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { createServer } from 'http';
import { Knex } from 'knex';

// Import middleware
import { asyncHandler, errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { requestLogger } from '@/middleware/logger';

// Import routes
import { createLocomotiveRouter } from '@/routes/locomotives';
import { createPredictionRouter } from '@/routes/predictions';
import { createReportRouter } from '@/routes/reports';

// Import services
import { EngineConfig, engineConfig } from '@/config/engine';
import { RandomSource } from '@/models/PredictionModels';
import { BulkPredictionService } from '@/services/BulkPredictionService';
import { DatabaseService } from '@/services/DatabaseService';
import { FleetReportService } from '@/services/FleetReportService';
import { LocomotiveDataService } from '@/services/LocomotiveDataService';
import { LocomotivePredictionEngine } from '@/services/LocomotivePredictionEngine';
import { loadModelArtifacts } from '@/services/ModelArtifactService';
import { PredictionStoreService } from '@/services/PredictionStoreService';
import { logger } from '@/utils/logger';

export interface AppDependencies {
  engine: LocomotivePredictionEngine;
  db: Knex;
  config?: EngineConfig;
  random?: RandomSource;
  healthCheck?: () => Promise<boolean>;
}

export function createApp({
  engine,
  db,
  config = engineConfig,
  random,
  healthCheck = () => DatabaseService.healthCheck(),
}: AppDependencies): Express {
  const app = express();

  const locomotives = new LocomotiveDataService(db);
  const store = new PredictionStoreService(db, () => engine.now());
  const bulk = new BulkPredictionService(engine, locomotives, store, config.bulkPredictionLimit);
  const reports = new FleetReportService(engine, locomotives);

  // Security middleware
  app.use(helmet());

  // CORS configuration
  app.use(cors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Correlation-ID', 'X-Request-ID'],
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());

  // Logging middleware
  app.use(requestLogger);

  app.get('/health', asyncHandler(async (_req, res) => {
    const databaseHealthy = await healthCheck();

    res.status(databaseHealthy ? 200 : 503).json({
      status: databaseHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV,
      database: databaseHealthy ? 'connected' : 'unavailable',
      modelArtifacts: engine.modelsAvailable ? 'loaded' : 'unavailable',
    });
  }));

  // API routes
  app.use('/api/locomotives', createLocomotiveRouter({ engine, locomotives, random }));
  app.use('/api/predictions', createPredictionRouter({ engine, locomotives, store, bulk, config }));
  app.use('/api/reports', createReportRouter(reports));

  // 404 handler
  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

// Load model artifacts once, initialize database and start server
export async function startServer(): Promise<void> {
  try {
    const artifacts = await loadModelArtifacts(engineConfig.modelsDirectory);
    const engine = new LocomotivePredictionEngine({ artifacts, defaultFleet: engineConfig.defaultFleet });

    const db = await DatabaseService.initialize();
    logger.info('Database initialized successfully');

    const server = createServer(createApp({ engine, db }));

    const PORT = process.env.PORT || 3001;
    const HOST = process.env.HOST || 'localhost';

    server.listen(Number(PORT), HOST, () => {
      logger.info(`🚀 Server running on http://${HOST}:${PORT}`);
      logger.info(`📊 Environment: ${process.env.NODE_ENV}`);
      logger.info(`🧠 Prediction method: ${engine.modelsAvailable ? 'model artifacts' : 'fallback formulas'}`);
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully`);
      server.close(() => {
        DatabaseService.close()
          .then(() => process.exit(0))
          .catch(error => {
            logger.error('Error closing database connection:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

if (require.main === module) {
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception:', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection:', reason);
    process.exit(1);
  });

  void startServer();
}
