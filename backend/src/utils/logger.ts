import winston from 'winston';
import path from 'path';

const logLevel = process.env.LOG_LEVEL || 'info';
const logFile = process.env.LOG_FILE || 'logs/app.log';
const isTest = process.env.NODE_ENV === 'test';

const logDir = path.dirname(logFile);

const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: 'locomotive-risk-engine',
    environment: process.env.NODE_ENV || 'development'
  },
  transports: isTest
    ? [new winston.transports.Console({ silent: true })]
    : [
        // Write all logs with importance level of 'error' or less to error.log
        new winston.transports.File({
          filename: path.join(logDir, 'error.log'),
          level: 'error',
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
        new winston.transports.File({
          filename: logFile,
          maxsize: 5242880, // 5MB
          maxFiles: 10,
        }),
      ],
});

// If we're not in production, log to console as well
if (process.env.NODE_ENV !== 'production' && !isTest) {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        let log = `${timestamp} [${service}] ${level}: ${message}`;

        const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
        if (metaStr) {
          log += `\n${metaStr}`;
        }

        return log;
      })
    )
  }));
}

// Helper functions for structured logging
export const loggers = {
  prediction: {
    completed: (locomotiveId: string, predictionType: string, method: string, riskScore: number) => {
      logger.info('Prediction generated', {
        event: 'prediction_generated',
        locomotiveId,
        predictionType,
        method,
        riskScore
      });
    },
    fallback: (locomotiveId: string, reason: string, detail?: string) => {
      logger.warn('Model path unavailable, using fallback', {
        event: 'prediction_fallback',
        locomotiveId,
        reason,
        detail
      });
    },
    bulkCompleted: (requested: number, succeeded: number, failed: number, duration: number) => {
      logger.info('Bulk prediction completed', {
        event: 'bulk_prediction_completed',
        requested,
        succeeded,
        failed,
        duration
      });
    }
  },

  reports: {
    skipped: (report: string, locomotiveId: string, reason: string) => {
      logger.warn('Locomotive left out of report', {
        event: 'report_locomotive_skipped',
        report,
        locomotiveId,
        reason
      });
    }
  },

  artifacts: {
    loaded: (directory: string, featureCount: number) => {
      logger.info('Model artifacts loaded', {
        event: 'model_artifacts_loaded',
        directory,
        featureCount
      });
    },
    unavailable: (directory: string, reason: string) => {
      logger.warn('Model artifacts unavailable, engine will use fallback predictions', {
        event: 'model_artifacts_unavailable',
        directory,
        reason
      });
    }
  },

  api: {
    error: (method: string, url: string, error: Error) => {
      logger.error('API error', {
        event: 'api_error',
        method,
        url,
        error: error.message,
        stack: error.stack
      });
    }
  }
};

export { logger };
export default logger;
