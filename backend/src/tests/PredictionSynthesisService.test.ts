import { describe, it, expect } from '@jest/globals';
import { PREDICTION_METRICS } from '../models/PredictionModels';
import { PredictionSynthesisService, metricsFor } from '../services/PredictionSynthesisService';

describe('PredictionSynthesisService', () => {
  const synthesizer = new PredictionSynthesisService();
  const base = { riskScore: 30, age: 10, operatingHours: 20000 };

  it('projects every metric as an annual figure', () => {
    const predictions = synthesizer.synthesize({ ...base, predictionType: 'all' });

    expect(predictions).toEqual({
      availability_days: 242,
      distance_travelled: 810000,
      distance_per_day: 102,
      total_failures: 8,
      reliability: 56,
      fuel_efficiency: 61.2,
    });
    expect(Object.keys(predictions)).toEqual([...PREDICTION_METRICS]);
  });

  it('only fills the requested metric', () => {
    expect(synthesizer.synthesize({ ...base, predictionType: 'reliability' })).toEqual({
      reliability: 56,
    });
    expect(metricsFor('fuel_efficiency')).toEqual(['fuel_efficiency']);
  });

  it('keeps floors and stays non-negative at maximum risk', () => {
    const predictions = synthesizer.synthesize({
      riskScore: 100,
      age: 40,
      operatingHours: 80000,
      predictionType: 'all',
    });

    expect(predictions).toEqual({
      availability_days: 125,
      distance_travelled: 2400000,
      distance_per_day: 60,
      total_failures: 50,
      reliability: 16.67,
      fuel_efficiency: 30,
    });
  });

  it('handles a locomotive with no operating hours', () => {
    const predictions = synthesizer.synthesize({
      riskScore: 5,
      age: 0,
      operatingHours: 0,
      predictionType: 'all',
    });

    expect(predictions.distance_travelled).toBe(0);
    expect(predictions.total_failures).toBe(0);
    expect(Object.values(predictions).every(Number.isFinite)).toBe(true);
  });
});
