import { ValidationError } from '../middleware/errorHandler';
import {
  Clock,
  LocomotiveSnapshot,
  PREDICTION_METHODS,
  PREDICTION_TYPES,
  PredictionOutcome,
  PredictionResult,
  isPredictionType,
} from '../models/PredictionModels';
import { loggers } from '../utils/logger';
import { FallbackPredictionService } from './FallbackPredictionService';
import { FeatureDerivationService } from './FeatureDerivationService';
import { LocomotiveRiskService } from './LocomotiveRiskService';
import { ArtifactBundleState } from './ModelArtifactService';
import { ModelPredictionService } from './ModelPredictionService';
import { PredictionSynthesisService } from './PredictionSynthesisService';
import { RecommendationService } from './RecommendationService';

export interface PredictionEngineOptions {
  artifacts: ArtifactBundleState;
  clock?: Clock;
  defaultFleet?: string;
}

/**
 * Entry point for locomotive performance predictions.
 *
 * Tries the model path when the artifact bundle loaded, and falls back to the
 * additive risk formula for the call whenever that path cannot produce a
 * score. Results have the same shape either way; only `prediction_method`
 * tells them apart.
 */
export class LocomotivePredictionEngine {
  readonly riskService: LocomotiveRiskService;

  private readonly artifacts: ArtifactBundleState;
  private readonly clock: Clock;
  private readonly modelPredictor: ModelPredictionService;
  private readonly fallbackPredictor: FallbackPredictionService;
  private readonly synthesizer = new PredictionSynthesisService();
  private readonly recommender = new RecommendationService();

  constructor({ artifacts, clock = () => new Date(), defaultFleet = 'OWNED' }: PredictionEngineOptions) {
    this.artifacts = artifacts;
    this.clock = clock;
    this.riskService = new LocomotiveRiskService(clock);
    this.modelPredictor = new ModelPredictionService(new FeatureDerivationService(defaultFleet));
    this.fallbackPredictor = new FallbackPredictionService(this.riskService);
  }

  get modelsAvailable(): boolean {
    return this.artifacts.status === 'loaded';
  }

  now(): Date {
    return this.clock();
  }

  resolveOutcome(locomotive: LocomotiveSnapshot, now: Date): PredictionOutcome {
    if (this.artifacts.status === 'unavailable') {
      return this.fallbackPredictor.predict(locomotive, 'artifacts_unavailable', this.artifacts.reason);
    }

    const attempt = this.modelPredictor.predict(this.artifacts.bundle, locomotive, now);
    if (!attempt.ok) {
      loggers.prediction.fallback(locomotive.locomotiveId, attempt.reason, attempt.detail);
      return this.fallbackPredictor.predict(locomotive, attempt.reason, attempt.detail);
    }

    return {
      method: 'ml',
      riskScore: attempt.riskScore,
      riskLevel: attempt.riskLevel,
      reliabilityCategory: attempt.reliabilityCategory,
    };
  }

  predictPerformance(locomotive: LocomotiveSnapshot, predictionType: string, periodDays: number): PredictionResult {
    if (!isPredictionType(predictionType)) {
      throw new ValidationError(`Unknown prediction type "${predictionType}"`, {
        field: 'predictionType',
        allowed: PREDICTION_TYPES,
      });
    }
    if (!Number.isInteger(periodDays) || periodDays < 1) {
      throw new ValidationError('Prediction period must be a positive whole number of days', { field: 'periodDays' });
    }
    if (!Number.isFinite(locomotive.operatingHours) || locomotive.operatingHours < 0) {
      throw new ValidationError('Operating hours cannot be negative', { field: 'operatingHours' });
    }

    const now = this.clock();
    const age = now.getUTCFullYear() - locomotive.manufacturingYear;
    if (age < 0) {
      throw new ValidationError('Manufacturing year cannot be in the future', { field: 'manufacturingYear' });
    }

    const outcome = this.resolveOutcome(locomotive, now);

    const predictions = this.synthesizer.synthesize({
      riskScore: outcome.riskScore,
      age,
      operatingHours: locomotive.operatingHours,
      predictionType,
    });

    const recommendations = this.recommender.generate({
      riskLevel: outcome.riskLevel,
      reliabilityCategory: outcome.reliabilityCategory,
      age,
      operatingHours: locomotive.operatingHours,
      maintenance: this.riskService.getMaintenanceHistory(locomotive),
      month: now.getUTCMonth() + 1,
      predictionType,
    });

    const method = PREDICTION_METHODS[outcome.method];
    loggers.prediction.completed(locomotive.locomotiveId, predictionType, method, outcome.riskScore);

    return {
      prediction_type: predictionType,
      period_days: periodDays,
      risk_score: outcome.riskScore,
      risk_level: outcome.riskLevel,
      reliability_category: outcome.reliabilityCategory,
      predictions,
      recommendations,
      prediction_method: method,
      timestamp: now.toISOString(),
    };
  }
}
