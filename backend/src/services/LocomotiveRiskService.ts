import {
  Clock,
  LocomotiveSnapshot,
  MaintenanceHistory,
  MaintenanceRecommendation,
  PredictionTrend,
  RandomSource,
  RiskLevel,
} from '../models/PredictionModels';
import { clamp, daysBetween, roundTo } from '../utils/numbers';

const OVERDUE_MAINTENANCE_DAYS = 90;

/**
 * Risk level thresholds shared by the additive score below and the
 * model-rescaled score.
 */
export const toRiskLevel = (score: number): RiskLevel => {
  if (score >= 70) return 'High';
  if (score >= 40) return 'Medium';
  return 'Low';
};

/**
 * Age, usage and service-history primitives for a single locomotive.
 *
 * These back the fallback prediction path, the locomotive detail view and
 * the maintenance planning report. Every method is a pure function of the
 * snapshot and the injected clock.
 */
export class LocomotiveRiskService {
  constructor(private clock: Clock = () => new Date()) {}

  calculateAge(locomotive: LocomotiveSnapshot): number {
    return this.clock().getUTCFullYear() - locomotive.manufacturingYear;
  }

  /**
   * Days since the last service, or null when the locomotive was never serviced.
   * Maintenance dated in the future counts as serviced today.
   */
  daysSinceMaintenance(locomotive: LocomotiveSnapshot): number | null {
    if (!locomotive.lastMaintenance) {
      return null;
    }
    return Math.max(0, daysBetween(locomotive.lastMaintenance, this.clock()));
  }

  getMaintenanceHistory(locomotive: LocomotiveSnapshot): MaintenanceHistory {
    const daysSinceMaintenance = this.daysSinceMaintenance(locomotive);
    return {
      neverServiced: daysSinceMaintenance === null,
      daysSinceMaintenance,
    };
  }

  /**
   * Additive failure risk in [0, 100]: age (max 50), usage (max 30) and
   * maintenance recency (max 20, or a flat 20 with no maintenance record).
   */
  calculateRiskScore(locomotive: LocomotiveSnapshot): number {
    const age = this.calculateAge(locomotive);
    const ageRisk = Math.min(50, age * 2);
    const usageRisk = Math.min(30, (locomotive.operatingHours / 1000) * 0.6);

    const days = this.daysSinceMaintenance(locomotive);
    const maintenanceRisk = days === null ? 20 : Math.min(20, days * 0.2);

    return clamp(ageRisk + usageRisk + maintenanceRisk, 0, 100);
  }

  getRiskLevel(locomotive: LocomotiveSnapshot): RiskLevel {
    return toRiskLevel(this.calculateRiskScore(locomotive));
  }

  /**
   * Reliability percentage from age, usage, service recency and current status.
   */
  calculateReliability(locomotive: LocomotiveSnapshot): number {
    let reliability = 100;

    reliability -= Math.min(30, this.calculateAge(locomotive) * 1.5);
    reliability -= Math.min(20, (locomotive.operatingHours / 10000) * 2);

    const days = this.daysSinceMaintenance(locomotive);
    if (days === null) {
      reliability -= 15;
    } else if (days > OVERDUE_MAINTENANCE_DAYS) {
      reliability -= Math.min(15, (days - OVERDUE_MAINTENANCE_DAYS) * 0.1);
    }

    if (locomotive.currentStatus === 'repair') {
      reliability -= 25;
    } else if (locomotive.currentStatus === 'maintenance') {
      reliability -= 10;
    }

    return clamp(reliability, 0, 100);
  }

  getMaintenanceRecommendations(locomotive: LocomotiveSnapshot): MaintenanceRecommendation[] {
    const recommendations: MaintenanceRecommendation[] = [];
    const age = this.calculateAge(locomotive);
    const days = this.daysSinceMaintenance(locomotive);

    if (age > 20) {
      recommendations.push({
        type: 'Engine Overhaul',
        priority: age > 25 ? 'High' : 'Medium',
        description: 'Consider major engine overhaul due to age',
      });
    }

    if (locomotive.operatingHours > 50000) {
      recommendations.push({
        type: 'Transmission Service',
        priority: 'High',
        description: 'Transmission requires major service',
      });
    }

    if (days === null || days > OVERDUE_MAINTENANCE_DAYS) {
      recommendations.push({
        type: 'Routine Maintenance',
        priority: 'High',
        description: days === null ? 'No maintenance record on file' : 'Overdue for routine maintenance',
      });
    }

    if (this.calculateRiskScore(locomotive) > 60) {
      recommendations.push({
        type: 'Comprehensive Inspection',
        priority: 'High',
        description: 'Full system inspection recommended',
      });
    }

    return recommendations;
  }

  /**
   * Day-by-day performance and risk series for charts.
   * Non-deterministic by nature; pass a seeded `random` for reproducible output.
   */
  generatePredictionTrend(
    locomotive: LocomotiveSnapshot,
    periodDays: number,
    random: RandomSource = Math.random
  ): PredictionTrend {
    const uniform = (min: number, max: number): number => min + (max - min) * random();

    const basePerformance = 90 - this.calculateAge(locomotive) * 1.5 - locomotive.operatingHours / 10000;
    const baseRisk = this.calculateRiskScore(locomotive);

    const trend: PredictionTrend = { labels: [], performance: [], risk: [] };

    for (let day = 1; day <= periodDays; day++) {
      trend.labels.push(`Day ${day}`);

      const performance = Math.max(20, basePerformance - day * 0.3 + uniform(-5, 5));
      trend.performance.push(roundTo(performance, 1));

      const risk = Math.min(95, baseRisk + day * 0.2 + uniform(-2, 2));
      trend.risk.push(roundTo(risk, 1));
    }

    return trend;
  }
}
