import { FallbackReason, LocomotiveSnapshot, ReliabilityCategory, RiskLevel } from '../models/PredictionModels';
import { FeatureDerivationError, ModelInferenceError } from '../models/EngineErrors';
import { clamp } from '../utils/numbers';
import { DerivedFeatures, FeatureDerivationService, FeatureVector, isFeatureName } from './FeatureDerivationService';
import { toRiskLevel } from './LocomotiveRiskService';
import { ModelArtifactBundle } from './ModelArtifactService';

const RELIABILITY_CATEGORIES: readonly ReliabilityCategory[] = ['High', 'Medium', 'Low', 'Critical'];

const isReliabilityCategory = (value: string): value is ReliabilityCategory =>
  RELIABILITY_CATEGORIES.some(category => category === value);

export type ModelAttempt =
  | {
      ok: true;
      riskScore: number;
      riskLevel: RiskLevel;
      reliabilityCategory: ReliabilityCategory;
    }
  | {
      ok: false;
      reason: FallbackReason;
      detail: string;
    };

/**
 * Map the regressor's raw output onto the operational 5-100 range.
 * The fitted model scores most of the fleet below 10, so low outputs are
 * stretched and topped up with age and usage.
 */
export const rescaleRiskScore = (raw: number, age: number, operatingHours: number): number => {
  const scaled = raw < 10
    ? raw * 8 + age * 1.5 + (operatingHours / 1000) * 0.3
    : raw * 2 + age * 0.5;
  return clamp(scaled, 5, 100);
};

/** Lay out the feature vector in the order the bundle lists its columns. */
export const orderFeatures = (features: FeatureVector, columns: readonly string[]): number[] =>
  columns.map(column => {
    if (!isFeatureName(column)) {
      throw new ModelInferenceError(`Model expects unknown feature "${column}"`);
    }
    return features[column];
  });

export class ModelPredictionService {
  constructor(private readonly featureDerivation: FeatureDerivationService) {}

  /**
   * Run the model path for one locomotive. Never throws: every failure comes
   * back as `{ ok: false }` with the reason the caller falls back for.
   */
  predict(bundle: ModelArtifactBundle, locomotive: LocomotiveSnapshot, now: Date): ModelAttempt {
    let derived: DerivedFeatures;
    try {
      derived = this.featureDerivation.derive(locomotive, bundle, now);
    } catch (error) {
      return {
        ok: false,
        reason: error instanceof FeatureDerivationError ? 'feature_derivation_failed' : 'model_inference_failed',
        detail: error instanceof Error ? error.message : String(error),
      };
    }

    try {
      const scaled = bundle.scaler.transform(orderFeatures(derived.features, bundle.featureColumns));
      if (scaled.some(value => !Number.isFinite(value))) {
        throw new ModelInferenceError('Scaler produced a non-finite value');
      }

      const raw = bundle.riskModel.predict(scaled);
      if (!Number.isFinite(raw)) {
        throw new ModelInferenceError('Risk regressor produced a non-finite value');
      }

      const label = bundle.reliabilityEncoder.inverseTransform(bundle.reliabilityModel.predict(scaled));
      if (!isReliabilityCategory(label)) {
        throw new ModelInferenceError(`Unrecognized reliability category "${label}"`);
      }

      const riskScore = rescaleRiskScore(raw, derived.age, derived.operatingHours);

      return {
        ok: true,
        riskScore,
        riskLevel: toRiskLevel(riskScore),
        reliabilityCategory: label,
      };
    } catch (error) {
      return {
        ok: false,
        reason: 'model_inference_failed',
        detail: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
