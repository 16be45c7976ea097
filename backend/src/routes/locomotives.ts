import { Router } from 'express';
import { param, query } from 'express-validator';
import { NotFoundError, asyncHandler } from '@/middleware/errorHandler';
import { validateRequest } from '@/middleware/validateRequest';
import { RandomSource } from '@/models/PredictionModels';
import { LocomotiveDataService, toSnapshot } from '@/services/LocomotiveDataService';
import { LocomotivePredictionEngine } from '@/services/LocomotivePredictionEngine';
import { Locomotive, PaginatedResponse } from '../../../shared/types';

export interface LocomotiveRouterDeps {
  engine: LocomotivePredictionEngine;
  locomotives: LocomotiveDataService;
  random?: RandomSource;
}

export const createLocomotiveRouter = ({ engine, locomotives, random = Math.random }: LocomotiveRouterDeps): Router => {
  const router = Router();
  const { riskService } = engine;

  const findLocomotive = async (locomotiveId: string): Promise<Locomotive> => {
    const locomotive = await locomotives.findByNumber(locomotiveId);
    if (!locomotive) {
      throw new NotFoundError(`Locomotive ${locomotiveId}`);
    }
    return locomotive;
  };

  // Search locomotives by number
  router.get('/', [
    query('q').optional().isString().trim(),
    query('limit').optional().isInt({ min: 1, max: 100 }).toInt(),
  ], validateRequest, asyncHandler(async (req, res) => {
    const q = typeof req.query.q === 'string' ? req.query.q : '';
    const limit = req.query.limit ? Number(req.query.limit) : 20;

    const data = await locomotives.search(q, limit);
    const response: PaginatedResponse<Locomotive> = {
      data,
      pagination: { limit, total: data.length },
    };
    res.json(response);
  }));

  // Locomotive detail with current risk figures
  router.get('/:locomotiveId', [
    param('locomotiveId').trim().notEmpty(),
  ], validateRequest, asyncHandler(async (req, res) => {
    const locomotive = await findLocomotive(req.params.locomotiveId);
    const snapshot = toSnapshot(locomotive);

    res.json({
      locomotive,
      age: riskService.calculateAge(snapshot),
      riskScore: riskService.calculateRiskScore(snapshot),
      riskLevel: riskService.getRiskLevel(snapshot),
      reliability: riskService.calculateReliability(snapshot),
      maintenanceHistory: riskService.getMaintenanceHistory(snapshot),
      maintenanceRecommendations: riskService.getMaintenanceRecommendations(snapshot),
    });
  }));

  // Chart series for the detail view
  router.get('/:locomotiveId/trend', [
    param('locomotiveId').trim().notEmpty(),
    query('days').optional().isInt({ min: 1, max: 365 }).toInt(),
  ], validateRequest, asyncHandler(async (req, res) => {
    const locomotive = await findLocomotive(req.params.locomotiveId);
    const days = req.query.days ? Number(req.query.days) : 30;

    res.json({
      locomotiveId: locomotive.locomotiveId,
      periodDays: days,
      trend: riskService.generatePredictionTrend(toSnapshot(locomotive), days, random),
    });
  }));

  return router;
};
