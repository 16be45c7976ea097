import path from 'path';

export interface EngineConfig {
  modelsDirectory: string;
  defaultFleet: string;
  bulkPredictionLimit: number;
  defaultPredictionPeriod: number;
  quickPredictionPeriod: number;
}

export const getEngineConfig = (env: NodeJS.ProcessEnv = process.env): EngineConfig => {
  const bulkPredictionLimit = parseInt(env.BULK_PREDICTION_LIMIT || '20');

  if (!Number.isInteger(bulkPredictionLimit) || bulkPredictionLimit < 1) {
    throw new Error(`Invalid BULK_PREDICTION_LIMIT: ${env.BULK_PREDICTION_LIMIT}`);
  }

  return {
    // Relative paths resolve from the project root, where npm scripts run
    modelsDirectory: path.resolve(env.ML_MODELS_DIR || 'backend/ml_models'),
    defaultFleet: env.DEFAULT_FLEET || 'OWNED',
    bulkPredictionLimit,
    // Stored predictions are annual projections
    defaultPredictionPeriod: 365,
    quickPredictionPeriod: 30,
  };
};

export const engineConfig = getEngineConfig();
