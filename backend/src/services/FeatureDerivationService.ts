import { AgeCategory, LocomotiveSnapshot, ReliabilityCategory } from '../models/PredictionModels';
import { FeatureDerivationError } from '../models/EngineErrors';
import { FittedLabelEncoder } from './ModelArtifactService';

/** Canonical order the risk and reliability models were fit on. */
export const FEATURE_COLUMNS = [
  'LOCO_TYPE',
  'YEAR',
  'Availability_Days',
  'Distance_Travelled',
  'Distance_per_day',
  'Total_Failures',
  'Reliability',
  'Failure_Rate',
  'Age_of_Locomotive',
  'Usage_Intensity',
  'Maintenance_Frequency',
  'Fuel_Efficiency',
  'Operating_Hours',
  'Fleet_Type_Encoded',
  'Efficiency_Score',
  'Maintenance_Score',
  'Reliability_Category_Encoded',
  'Age_Category_Encoded',
  'Failure_Rate_per_Hour',
  'Distance_per_Hour',
  'Availability_Rate',
] as const;

export type FeatureName = (typeof FEATURE_COLUMNS)[number];

export type FeatureVector = Record<FeatureName, number>;

export const isFeatureName = (value: string): value is FeatureName =>
  (FEATURE_COLUMNS as readonly string[]).includes(value);

export interface CategoricalEncoders {
  fleetEncoder: FittedLabelEncoder;
  reliabilityEncoder: FittedLabelEncoder;
  ageEncoder: FittedLabelEncoder;
}

export interface DerivedFeatures {
  features: FeatureVector;
  age: number;
  operatingHours: number;
  fleet: string;
  reliabilityCategory: ReliabilityCategory;
  ageCategory: AgeCategory;
}

export const locoTypeCode = (model: string): number => (model === 'DE10' ? 1 : 2);

export const categorizeReliability = (reliability: number): ReliabilityCategory => {
  if (reliability >= 90) return 'High';
  if (reliability >= 75) return 'Medium';
  if (reliability >= 60) return 'Low';
  return 'Critical';
};

export const categorizeAge = (age: number): AgeCategory => {
  if (age <= 5) return 'New';
  if (age <= 10) return 'Young';
  if (age <= 20) return 'Mature';
  return 'Old';
};

export class FeatureDerivationService {
  constructor(private readonly defaultFleet: string = 'OWNED') {}

  /**
   * Build the model feature vector for a locomotive as of `now`.
   * Throws FeatureDerivationError when an encoder rejects a categorical value.
   */
  derive(locomotive: LocomotiveSnapshot, encoders: CategoricalEncoders, now: Date): DerivedFeatures {
    const year = now.getUTCFullYear();
    const age = year - locomotive.manufacturingYear;
    const operatingHours = locomotive.operatingHours;

    const availabilityDays = Math.max(300, 365 - age * 5);
    const distanceTravelled = operatingHours * 50;
    const distancePerDay = distanceTravelled / 365;
    const totalFailures = Math.max(0, age * 2 + operatingHours / 10000);
    const reliability = Math.max(60, 95 - age * 2 - totalFailures * 5);
    const failureRate = totalFailures / Math.max(1, operatingHours / 1000);
    const usageIntensity = operatingHours / Math.max(1, age * 365 * 24);
    const maintenanceFrequency = Math.max(2, age * 0.5);
    const fuelEfficiency = Math.max(70, 90 - age * 1.5);
    const efficiencyScore = (reliability + fuelEfficiency) / 2;
    const maintenanceScore = Math.max(60, 100 - maintenanceFrequency * 10);

    const reliabilityCategory = categorizeReliability(reliability);
    const ageCategory = categorizeAge(age);
    const fleet = locomotive.fleet || this.defaultFleet;

    const features: FeatureVector = {
      LOCO_TYPE: locoTypeCode(locomotive.model),
      YEAR: year,
      Availability_Days: availabilityDays,
      Distance_Travelled: distanceTravelled,
      Distance_per_day: distancePerDay,
      Total_Failures: totalFailures,
      Reliability: reliability,
      Failure_Rate: failureRate,
      Age_of_Locomotive: age,
      Usage_Intensity: usageIntensity,
      Maintenance_Frequency: maintenanceFrequency,
      Fuel_Efficiency: fuelEfficiency,
      Operating_Hours: operatingHours,
      Fleet_Type_Encoded: this.encode(encoders.fleetEncoder, fleet, 'fleet'),
      Efficiency_Score: efficiencyScore,
      Maintenance_Score: maintenanceScore,
      Reliability_Category_Encoded: this.encode(encoders.reliabilityEncoder, reliabilityCategory, 'reliability category'),
      Age_Category_Encoded: this.encode(encoders.ageEncoder, ageCategory, 'age category'),
      Failure_Rate_per_Hour: totalFailures / Math.max(1, operatingHours),
      Distance_per_Hour: distanceTravelled / Math.max(1, operatingHours),
      Availability_Rate: availabilityDays / 365,
    };

    return { features, age, operatingHours, fleet, reliabilityCategory, ageCategory };
  }

  private encode(encoder: FittedLabelEncoder, value: string, label: string): number {
    try {
      return encoder.transform(value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FeatureDerivationError(`Cannot encode ${label} "${value}": ${reason}`, { cause: error });
    }
  }
}
