import { LocomotiveStatus } from '../../../shared/types';

// Prediction requests
export const PREDICTION_METRICS = [
  'availability_days',
  'distance_travelled',
  'distance_per_day',
  'total_failures',
  'reliability',
  'fuel_efficiency',
] as const;

export type PredictionMetric = (typeof PREDICTION_METRICS)[number];

export const PREDICTION_TYPES = ['all', ...PREDICTION_METRICS] as const;

export type PredictionType = (typeof PREDICTION_TYPES)[number];

export const isPredictionType = (value: unknown): value is PredictionType =>
  typeof value === 'string' && (PREDICTION_TYPES as readonly string[]).includes(value);

// Scores and categories
export type RiskLevel = 'Low' | 'Medium' | 'High';

export type ReliabilityCategory = 'High' | 'Medium' | 'Low' | 'Critical';

export type AgeCategory = 'New' | 'Young' | 'Mature' | 'Old';

export const PREDICTION_METHODS = {
  ml: 'ML Performance Model',
  fallback: 'Fallback Method',
} as const;

export type PredictionMethodLabel = (typeof PREDICTION_METHODS)[keyof typeof PREDICTION_METHODS];

/**
 * Read-only view of a locomotive handed to the engine by its callers.
 * Age is never stored here; it is derived from `manufacturingYear` against the engine clock.
 */
export interface LocomotiveSnapshot {
  id: string;
  locomotiveId: string;
  model: string;
  manufacturingYear: number;
  operatingHours: number;
  lastMaintenance: Date | null;
  currentStatus: LocomotiveStatus;
  fleet?: string;
}

export type MetricPredictions = Partial<Record<PredictionMetric, number>>;

/** Wire shape returned to callers and stored verbatim. */
export interface PredictionResult {
  prediction_type: PredictionType;
  period_days: number;
  risk_score: number;
  risk_level: RiskLevel;
  reliability_category: ReliabilityCategory;
  predictions: MetricPredictions;
  recommendations: string[];
  prediction_method: PredictionMethodLabel;
  timestamp: string;
}

export type FallbackReason = 'artifacts_unavailable' | 'feature_derivation_failed' | 'model_inference_failed';

export type PredictionOutcome =
  | {
      method: 'ml';
      riskScore: number;
      riskLevel: RiskLevel;
      reliabilityCategory: ReliabilityCategory;
    }
  | {
      method: 'fallback';
      reason: FallbackReason;
      detail?: string;
      riskScore: number;
      riskLevel: RiskLevel;
      reliabilityCategory: ReliabilityCategory;
    };

// Maintenance items derived from age, usage and service history
export type MaintenancePriority = 'High' | 'Medium';

export interface MaintenanceRecommendation {
  type: 'Engine Overhaul' | 'Transmission Service' | 'Routine Maintenance' | 'Comprehensive Inspection';
  priority: MaintenancePriority;
  description: string;
}

export interface MaintenanceHistory {
  neverServiced: boolean;
  daysSinceMaintenance: number | null;
}

export interface PredictionTrend {
  labels: string[];
  performance: number[];
  risk: number[];
}

export type Clock = () => Date;

export type RandomSource = () => number;
