import { describe, it, expect } from '@jest/globals';
import { FEATURE_COLUMNS, FeatureDerivationService, FeatureVector } from '../services/FeatureDerivationService';
import { LabelEncoder, ModelArtifactBundle } from '../services/ModelArtifactService';
import { ModelPredictionService, orderFeatures, rescaleRiskScore } from '../services/ModelPredictionService';
import { FIXED_NOW, snapshot } from './helpers';

const stubBundle = (overrides: Partial<ModelArtifactBundle> = {}): ModelArtifactBundle => ({
  scaler: { transform: row => [...row] },
  riskModel: { predict: () => 2 },
  reliabilityModel: { predict: () => 1 },
  fleetEncoder: new LabelEncoder('Fleet', ['HIRED', 'OWNED']),
  reliabilityEncoder: new LabelEncoder('Reliability category', ['Critical', 'High', 'Low', 'Medium']),
  ageEncoder: new LabelEncoder('Age category', ['Mature', 'New', 'Old', 'Young']),
  featureColumns: FEATURE_COLUMNS,
  ...overrides,
});

describe('rescaleRiskScore', () => {
  it('stretches low raw outputs and adds age and usage', () => {
    // 2 * 8 + 10 * 1.5 + 20 * 0.3
    expect(rescaleRiskScore(2, 10, 20000)).toBe(37);
  });

  it('doubles raw outputs from 10 upward', () => {
    expect(rescaleRiskScore(10, 10, 20000)).toBe(25);
    expect(rescaleRiskScore(30, 10, 20000)).toBe(65);
  });

  it('clamps to the 5-100 range', () => {
    expect(rescaleRiskScore(-5, 0, 0)).toBe(5);
    expect(rescaleRiskScore(60, 30, 0)).toBe(100);
  });
});

describe('orderFeatures', () => {
  it('follows the column order the bundle lists', () => {
    const vector: FeatureVector = { ...zeroVector(), LOCO_TYPE: 2, YEAR: 2026 };
    expect(orderFeatures(vector, ['YEAR', 'LOCO_TYPE'])).toEqual([2026, 2]);
  });

  it('rejects a column the engine does not derive', () => {
    expect(() => orderFeatures(zeroVector(), ['YEAR', 'Paint_Colour'])).toThrow(
      'Model expects unknown feature "Paint_Colour"'
    );
  });
});

describe('ModelPredictionService', () => {
  const service = new ModelPredictionService(new FeatureDerivationService('OWNED'));
  const locomotive = snapshot({ model: 'DE11', manufacturingYear: 2016, operatingHours: 20000 });

  it('returns the rescaled score, its level and the decoded category', () => {
    expect(service.predict(stubBundle(), locomotive, FIXED_NOW)).toEqual({
      ok: true,
      riskScore: 37,
      riskLevel: 'Low',
      reliabilityCategory: 'High',
    });
  });

  it('hands the regressor the scaled row in bundle column order', () => {
    const seen: number[][] = [];
    const bundle = stubBundle({
      featureColumns: ['Age_of_Locomotive', 'Operating_Hours'],
      scaler: { transform: row => row.map(value => value / 10) },
      riskModel: {
        predict: row => {
          seen.push([...row]);
          return 0;
        },
      },
    });

    service.predict(bundle, locomotive, FIXED_NOW);
    expect(seen).toEqual([[1, 2000]]);
  });

  it('reports feature derivation failures for unseen fleets', () => {
    const attempt = service.predict(stubBundle(), { ...locomotive, fleet: 'LEASED' }, FIXED_NOW);

    expect(attempt).toEqual({
      ok: false,
      reason: 'feature_derivation_failed',
      detail: 'Cannot encode fleet "LEASED": Fleet encoder has no class "LEASED"',
    });
  });

  it('reports inference failures for an undecodable class', () => {
    const attempt = service.predict(stubBundle({ reliabilityModel: { predict: () => 9 } }), locomotive, FIXED_NOW);

    expect(attempt).toEqual({
      ok: false,
      reason: 'model_inference_failed',
      detail: 'Reliability category encoder has no class for code 9',
    });
  });

  it('reports inference failures for a non-finite score', () => {
    const attempt = service.predict(stubBundle({ riskModel: { predict: () => Number.NaN } }), locomotive, FIXED_NOW);

    expect(attempt).toEqual({
      ok: false,
      reason: 'model_inference_failed',
      detail: 'Risk regressor produced a non-finite value',
    });
  });

  it('reports inference failures for labels outside the known categories', () => {
    const bundle = stubBundle({
      reliabilityModel: { predict: () => 0 },
      reliabilityEncoder: new LabelEncoder('Reliability category', ['Excellent', 'High']),
    });
    const attempt = service.predict(bundle, { ...locomotive, manufacturingYear: 2026, operatingHours: 0 }, FIXED_NOW);

    expect(attempt).toEqual({
      ok: false,
      reason: 'model_inference_failed',
      detail: 'Unrecognized reliability category "Excellent"',
    });
  });

  it('never throws when a component throws something unexpected', () => {
    const bundle = stubBundle({
      scaler: {
        transform: () => {
          throw new RangeError('scaler exploded');
        },
      },
    });

    expect(service.predict(bundle, locomotive, FIXED_NOW)).toEqual({
      ok: false,
      reason: 'model_inference_failed',
      detail: 'scaler exploded',
    });
  });
});

function zeroVector(): FeatureVector {
  return {
    LOCO_TYPE: 0,
    YEAR: 0,
    Availability_Days: 0,
    Distance_Travelled: 0,
    Distance_per_day: 0,
    Total_Failures: 0,
    Reliability: 0,
    Failure_Rate: 0,
    Age_of_Locomotive: 0,
    Usage_Intensity: 0,
    Maintenance_Frequency: 0,
    Fuel_Efficiency: 0,
    Operating_Hours: 0,
    Fleet_Type_Encoded: 0,
    Efficiency_Score: 0,
    Maintenance_Score: 0,
    Reliability_Category_Encoded: 0,
    Age_Category_Encoded: 0,
    Failure_Rate_per_Hour: 0,
    Distance_per_Hour: 0,
    Availability_Rate: 0,
  };
}
