import { describe, it, expect } from '@jest/globals';
import { FeatureDerivationError } from '../models/EngineErrors';
import {
  CategoricalEncoders,
  FEATURE_COLUMNS,
  FeatureDerivationService,
  categorizeAge,
  categorizeReliability,
  locoTypeCode,
} from '../services/FeatureDerivationService';
import { LabelEncoder } from '../services/ModelArtifactService';
import { FIXED_NOW, snapshot } from './helpers';

const encoders: CategoricalEncoders = {
  fleetEncoder: new LabelEncoder('Fleet', ['HIRED', 'OWNED']),
  reliabilityEncoder: new LabelEncoder('Reliability category', ['Critical', 'High', 'Low', 'Medium']),
  ageEncoder: new LabelEncoder('Age category', ['Mature', 'New', 'Old', 'Young']),
};

describe('FeatureDerivationService', () => {
  const service = new FeatureDerivationService('OWNED');

  it('lists 21 feature columns in model order', () => {
    expect(FEATURE_COLUMNS).toHaveLength(21);
    expect(FEATURE_COLUMNS[0]).toBe('LOCO_TYPE');
    expect(FEATURE_COLUMNS[20]).toBe('Availability_Rate');
  });

  it('derives every feature for a ten-year-old hired DE11', () => {
    const locomotive = snapshot({ model: 'DE11', manufacturingYear: 2016, operatingHours: 20000, fleet: 'HIRED' });
    const derived = service.derive(locomotive, encoders, FIXED_NOW);

    expect(derived.age).toBe(10);
    expect(derived.fleet).toBe('HIRED');
    expect(derived.reliabilityCategory).toBe('Low');
    expect(derived.ageCategory).toBe('Young');

    const { features } = derived;
    expect(features).toMatchObject({
      LOCO_TYPE: 2,
      YEAR: 2026,
      Availability_Days: 315,
      Distance_Travelled: 1000000,
      Total_Failures: 22,
      Reliability: 60,
      Failure_Rate: 1.1,
      Age_of_Locomotive: 10,
      Maintenance_Frequency: 5,
      Fuel_Efficiency: 75,
      Operating_Hours: 20000,
      Fleet_Type_Encoded: 0,
      Efficiency_Score: 67.5,
      Maintenance_Score: 60,
      Reliability_Category_Encoded: 2,
      Age_Category_Encoded: 3,
      Distance_per_Hour: 50,
    });
    expect(features.Distance_per_day).toBeCloseTo(2739.726, 3);
    expect(features.Usage_Intensity).toBeCloseTo(0.22831, 5);
    expect(features.Failure_Rate_per_Hour).toBeCloseTo(0.0011, 10);
    expect(features.Availability_Rate).toBeCloseTo(315 / 365, 10);
    expect(Object.keys(features).sort()).toEqual([...FEATURE_COLUMNS].sort());
  });

  it('guards divisions for a brand-new locomotive with no hours', () => {
    const locomotive = snapshot({ manufacturingYear: 2026, operatingHours: 0 });
    const { features, reliabilityCategory, ageCategory } = service.derive(locomotive, encoders, FIXED_NOW);

    expect(features.Usage_Intensity).toBe(0);
    expect(features.Failure_Rate).toBe(0);
    expect(features.Failure_Rate_per_Hour).toBe(0);
    expect(features.Distance_per_Hour).toBe(0);
    expect(features.Reliability).toBe(95);
    expect(features.Availability_Days).toBe(365);
    expect(reliabilityCategory).toBe('High');
    expect(ageCategory).toBe('New');
  });

  it('uses the configured fleet when the locomotive has none', () => {
    const locomotive = snapshot({ fleet: undefined });
    const derived = service.derive(locomotive, encoders, FIXED_NOW);

    expect(derived.fleet).toBe('OWNED');
    expect(derived.features.Fleet_Type_Encoded).toBe(1);
  });

  it('raises FeatureDerivationError for a fleet the encoder never saw', () => {
    const locomotive = snapshot({ fleet: 'LEASED' });

    expect(() => service.derive(locomotive, encoders, FIXED_NOW)).toThrow(FeatureDerivationError);
    expect(() => service.derive(locomotive, encoders, FIXED_NOW)).toThrow(
      'Cannot encode fleet "LEASED": Fleet encoder has no class "LEASED"'
    );
  });

  describe('categorizers', () => {
    it('maps locomotive models to type codes', () => {
      expect(locoTypeCode('DE10')).toBe(1);
      expect(locoTypeCode('DE11')).toBe(2);
      expect(locoTypeCode('GT26')).toBe(2);
    });

    it('buckets reliability at 90, 75 and 60', () => {
      expect(categorizeReliability(90)).toBe('High');
      expect(categorizeReliability(89.9)).toBe('Medium');
      expect(categorizeReliability(75)).toBe('Medium');
      expect(categorizeReliability(60)).toBe('Low');
      expect(categorizeReliability(59.9)).toBe('Critical');
    });

    it('buckets age at 5, 10 and 20 years', () => {
      expect(categorizeAge(5)).toBe('New');
      expect(categorizeAge(6)).toBe('Young');
      expect(categorizeAge(10)).toBe('Young');
      expect(categorizeAge(20)).toBe('Mature');
      expect(categorizeAge(21)).toBe('Old');
    });
  });
});
