import { Router } from 'express';
import { body, param, query } from 'express-validator';
import { NotFoundError, ValidationError, asyncHandler } from '@/middleware/errorHandler';
import { validateRequest } from '@/middleware/validateRequest';
import { EngineConfig } from '@/config/engine';
import { PREDICTION_TYPES } from '@/models/PredictionModels';
import { BulkPredictionService } from '@/services/BulkPredictionService';
import { LocomotiveDataService, toSnapshot } from '@/services/LocomotiveDataService';
import { LocomotivePredictionEngine } from '@/services/LocomotivePredictionEngine';
import { PredictionRecord, PredictionStoreService } from '@/services/PredictionStoreService';
import { logger } from '@/utils/logger';
import {
  BulkPredictionRequest,
  CreatePredictionRequest,
  Locomotive,
  PaginatedResponse,
} from '../../../shared/types';

export interface PredictionRouterDeps {
  engine: LocomotivePredictionEngine;
  locomotives: LocomotiveDataService;
  store: PredictionStoreService;
  bulk: BulkPredictionService;
  config: EngineConfig;
}

const MAX_PERIOD_DAYS = 3650;

export const createPredictionRouter = ({ engine, locomotives, store, bulk, config }: PredictionRouterDeps): Router => {
  const router = Router();

  const findLocomotive = async (locomotiveId: string): Promise<Locomotive> => {
    const locomotive = await locomotives.findByNumber(locomotiveId);
    if (!locomotive) {
      throw new NotFoundError(`Locomotive ${locomotiveId}`);
    }
    return locomotive;
  };

  // Predict and store
  router.post('/', [
    body('locomotiveId').isString().trim().notEmpty().withMessage('Locomotive number is required'),
    body('locomotiveType').optional().isString().trim(),
    body('predictionType').isIn(PREDICTION_TYPES).withMessage(`Prediction type must be one of: ${PREDICTION_TYPES.join(', ')}`),
    body('periodDays').optional().isInt({ min: 1, max: MAX_PERIOD_DAYS }).toInt(),
  ], validateRequest, asyncHandler(async (req, res) => {
    const {
      locomotiveId,
      locomotiveType,
      predictionType,
      periodDays = config.defaultPredictionPeriod,
    }: CreatePredictionRequest = req.body;

    const locomotive = await findLocomotive(locomotiveId);

    if (locomotiveType && locomotiveType !== locomotive.model) {
      throw new ValidationError(
        `Locomotive ${locomotiveId} is a ${locomotive.model}, not a ${locomotiveType}`,
        { field: 'locomotiveType' }
      );
    }

    const prediction = engine.predictPerformance(toSnapshot(locomotive), predictionType, periodDays);
    const id = await store.save({ locomotiveId: locomotive.id, result: prediction });

    logger.info('Prediction stored', { predictionId: id, locomotiveId, predictionType });

    res.status(201).json({
      id,
      locomotiveId: locomotive.locomotiveId,
      model: locomotive.model,
      prediction,
    });
  }));

  // Predict without storing
  router.get('/quick', [
    query('locomotiveId').isString().trim().notEmpty(),
    query('predictionType').optional().isIn(PREDICTION_TYPES),
    query('period').optional().isInt({ min: 1, max: MAX_PERIOD_DAYS }).toInt(),
  ], validateRequest, asyncHandler(async (req, res) => {
    const locomotiveId = String(req.query.locomotiveId);
    const predictionType = typeof req.query.predictionType === 'string' ? req.query.predictionType : 'all';
    const period = req.query.period ? Number(req.query.period) : config.quickPredictionPeriod;

    const locomotive = await findLocomotive(locomotiveId);
    const snapshot = toSnapshot(locomotive);

    res.json({
      locomotive: {
        locomotiveId: locomotive.locomotiveId,
        model: locomotive.model,
        age: engine.riskService.calculateAge(snapshot),
        operatingHours: locomotive.operatingHours,
        currentStatus: locomotive.currentStatus,
      },
      prediction: engine.predictPerformance(snapshot, predictionType, period),
    });
  }));

  // Predict many locomotives at once
  router.post('/bulk', [
    body('locomotiveIds').isArray({ min: 1 }).withMessage('At least one locomotive number is required'),
    body('locomotiveIds.*').isString().trim().notEmpty(),
    body('predictionType').isIn(PREDICTION_TYPES).withMessage(`Prediction type must be one of: ${PREDICTION_TYPES.join(', ')}`),
    body('periodDays').optional().isInt({ min: 1, max: MAX_PERIOD_DAYS }).toInt(),
  ], validateRequest, asyncHandler(async (req, res) => {
    const {
      locomotiveIds,
      predictionType,
      periodDays = config.defaultPredictionPeriod,
    }: BulkPredictionRequest = req.body;

    const { results, errors } = await bulk.predict({ locomotiveIds, predictionType, periodDays });

    res.json({
      results,
      errors,
      summary: {
        requested: results.length + errors.length,
        succeeded: results.length,
        failed: errors.length,
      },
    });
  }));

  // Recent active predictions
  router.get('/', [
    query('limit').optional().isInt({ min: 1, max: 100 }).toInt(),
  ], validateRequest, asyncHandler(async (req, res) => {
    const limit = req.query.limit ? Number(req.query.limit) : 20;
    const { data, total } = await store.listRecent(limit);

    const response: PaginatedResponse<PredictionRecord> = {
      data,
      pagination: { limit, total },
    };
    res.json(response);
  }));

  // Deactivate every stored prediction
  router.post('/clear', asyncHandler(async (_req, res) => {
    const deactivated = await store.deactivateAll();
    logger.info('Predictions cleared', { deactivated });
    res.json({ deactivated });
  }));

  router.get('/:id', [
    param('id').isUUID().withMessage('Prediction id must be a UUID'),
  ], validateRequest, asyncHandler(async (req, res) => {
    const prediction = await store.findById(req.params.id);
    if (!prediction) {
      throw new NotFoundError('Prediction');
    }
    res.json(prediction);
  }));

  return router;
};
