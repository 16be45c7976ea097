import {
  MetricPredictions,
  PREDICTION_METRICS,
  PredictionMetric,
  PredictionType,
} from '../models/PredictionModels';
import { clamp, roundTo } from '../utils/numbers';

export interface SynthesisInput {
  riskScore: number;
  age: number;
  operatingHours: number;
  predictionType: PredictionType;
}

interface MetricContext {
  risk: number;
  age: number;
  hours: number;
}

const nonNegative = (value: number): number => Math.max(0, value);

const percentage = (value: number): number => clamp(value, 0, 100);

const METRIC_FORMULAS: Record<PredictionMetric, (context: MetricContext) => number> = {
  availability_days: ({ risk, age }) =>
    nonNegative(Math.trunc(Math.max(250, 365 - age * 8) * (1 - risk / 200))),

  distance_travelled: ({ risk, hours }) =>
    nonNegative(Math.trunc(hours * 45 * (1 - risk / 300))),

  distance_per_day: ({ risk }) =>
    nonNegative(roundTo(120 * (1 - risk / 200), 2)),

  total_failures: ({ risk, age, hours }) =>
    nonNegative(Math.trunc((age * 0.5 + hours / 15000) * (1 + risk / 100))),

  reliability: ({ risk, age }) =>
    percentage(roundTo(Math.max(50, 95 - age * 2.5) * (1 - risk / 150), 2)),

  fuel_efficiency: ({ risk, age }) =>
    percentage(roundTo(Math.max(60, 90 - age * 1.8) * (1 - risk / 200), 2)),
};

export const metricsFor = (predictionType: PredictionType): readonly PredictionMetric[] =>
  predictionType === 'all' ? PREDICTION_METRICS : [predictionType];

/**
 * Per-metric projections. Only the requested metrics appear in the result,
 * in canonical metric order. Values are annual figures whatever period the
 * caller echoes back.
 */
export class PredictionSynthesisService {
  synthesize(input: SynthesisInput): MetricPredictions {
    const context: MetricContext = {
      risk: input.riskScore,
      age: input.age,
      hours: input.operatingHours,
    };

    const predictions: MetricPredictions = {};
    for (const metric of metricsFor(input.predictionType)) {
      predictions[metric] = METRIC_FORMULAS[metric](context);
    }
    return predictions;
  }
}
