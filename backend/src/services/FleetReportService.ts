import { Locomotive, LocomotiveStatus } from '../../../shared/types';
import { ValidationError } from '../middleware/errorHandler';
import { PredictionResult, ReliabilityCategory, RiskLevel } from '../models/PredictionModels';
import { loggers } from '../utils/logger';
import { roundTo } from '../utils/numbers';
import { LocomotiveDataService, toSnapshot } from './LocomotiveDataService';
import { LocomotivePredictionEngine } from './LocomotivePredictionEngine';
import { toRiskLevel } from './LocomotiveRiskService';

export const REPORT_TYPES = ['fleet-overview', 'failure-predictions', 'risk-assessment', 'maintenance-planning'] as const;

export type ReportType = (typeof REPORT_TYPES)[number];

export const isReportType = (value: string): value is ReportType =>
  (REPORT_TYPES as readonly string[]).includes(value);

const RISK_ASSESSMENT_TOP = 50;
const OVERDUE_MAINTENANCE_DAYS = 90;
const DUE_MAINTENANCE_DAYS = 60;

export interface LocomotiveSummary {
  locomotiveId: string;
  model: string;
  age: number;
  operatingHours: number;
  currentStatus: LocomotiveStatus;
}

export interface FleetStatistics {
  total: number;
  active: number;
  maintenance: number;
  repair: number;
  retired: number;
  /** Share of the fleet in active service, percent to one decimal */
  utilization: number;
}

export interface FleetOverviewReport {
  title: 'Fleet Overview Report';
  generatedAt: string;
  fleetStats: FleetStatistics;
  modelDistribution: Record<string, number>;
  ageGroups: Record<'0-10' | '11-20' | '21-30' | '30+', number>;
}

export interface FailureRiskItem {
  locomotive: LocomotiveSummary;
  riskScore: number;
  riskLevel: RiskLevel;
  recommendations: string[];
}

export interface FailurePredictionsReport {
  title: 'Failure Predictions Report';
  generatedAt: string;
  riskAssessment: FailureRiskItem[];
}

/** A locomotive whose stored record the engine rejected */
export interface ReportError {
  locomotiveId: string;
  error: string;
}

export interface RiskAssessmentItem {
  locomotive: LocomotiveSummary;
  riskScore: number;
  riskLevel: RiskLevel;
  reliabilityCategory: ReliabilityCategory;
  predictionMethod: string;
}

export interface RiskAssessmentReport {
  title: 'Risk Assessment Report';
  generatedAt: string;
  totalLocomotives: number;
  riskDistribution: Record<RiskLevel, number>;
  riskData: RiskAssessmentItem[];
  errors: ReportError[];
}

export type MaintenanceBucket = 'urgent' | 'scheduled' | 'routine';

export interface MaintenancePlanItem {
  locomotive: LocomotiveSummary;
  riskScore: number;
  riskLevel: RiskLevel;
  daysSinceMaintenance: number | null;
  priority: MaintenanceBucket;
}

export interface MaintenancePlanningReport {
  title: 'Maintenance Planning Report';
  generatedAt: string;
  totalLocomotives: number;
  maintenancePlan: Record<MaintenanceBucket, MaintenancePlanItem[]>;
  errors: ReportError[];
}

export type FleetReport =
  | FleetOverviewReport
  | FailurePredictionsReport
  | RiskAssessmentReport
  | MaintenancePlanningReport;

/**
 * Screening score for the failure predictions report. A never-serviced
 * locomotive adds no maintenance factor here.
 */
export const failureRiskScore = (age: number, operatingHours: number, daysSinceMaintenance: number | null): number => {
  const ageFactor = Math.min(50, age * 2);
  const hoursFactor = Math.min(30, operatingHours / 1000);
  const maintenanceFactor = daysSinceMaintenance === null ? 0 : Math.min(20, daysSinceMaintenance / 3);
  return roundTo(Math.min(100, ageFactor + hoursFactor + maintenanceFactor), 1);
};

export const maintenanceBucket = (riskLevel: RiskLevel, daysSinceMaintenance: number | null): MaintenanceBucket => {
  if (riskLevel === 'High' || daysSinceMaintenance === null || daysSinceMaintenance > OVERDUE_MAINTENANCE_DAYS) {
    return 'urgent';
  }
  if (riskLevel === 'Medium' || daysSinceMaintenance > DUE_MAINTENANCE_DAYS) return 'scheduled';
  return 'routine';
};

const byRiskDescending = <T extends { riskScore: number }>(a: T, b: T): number => b.riskScore - a.riskScore;

export class FleetReportService {
  constructor(
    private readonly engine: LocomotivePredictionEngine,
    private readonly locomotives: LocomotiveDataService
  ) {}

  async generate(type: ReportType): Promise<FleetReport> {
    switch (type) {
      case 'fleet-overview':
        return this.fleetOverview();
      case 'failure-predictions':
        return this.failurePredictions();
      case 'risk-assessment':
        return this.riskAssessment();
      case 'maintenance-planning':
        return this.maintenancePlanning();
    }
  }

  async fleetStatistics(): Promise<FleetStatistics> {
    const counts = await this.locomotives.countByStatus();
    const total = counts.active + counts.maintenance + counts.repair + counts.retired;

    return {
      total,
      ...counts,
      utilization: total > 0 ? roundTo((counts.active / total) * 100, 1) : 0,
    };
  }

  async fleetOverview(): Promise<FleetOverviewReport> {
    const [fleetStats, locomotives] = await Promise.all([this.fleetStatistics(), this.locomotives.listAll()]);

    const modelDistribution: Record<string, number> = {};
    const ageGroups: FleetOverviewReport['ageGroups'] = { '0-10': 0, '11-20': 0, '21-30': 0, '30+': 0 };

    for (const locomotive of locomotives) {
      modelDistribution[locomotive.model] = (modelDistribution[locomotive.model] ?? 0) + 1;

      const age = this.summarize(locomotive).age;
      if (age <= 10) ageGroups['0-10']++;
      else if (age <= 20) ageGroups['11-20']++;
      else if (age <= 30) ageGroups['21-30']++;
      else ageGroups['30+']++;
    }

    return {
      title: 'Fleet Overview Report',
      generatedAt: this.engine.now().toISOString(),
      fleetStats,
      modelDistribution,
      ageGroups,
    };
  }

  async failurePredictions(): Promise<FailurePredictionsReport> {
    const locomotives = await this.locomotives.listAll();
    const { riskService } = this.engine;

    const riskAssessment = locomotives.map((locomotive): FailureRiskItem => {
      const summary = this.summarize(locomotive);
      const days = riskService.daysSinceMaintenance(toSnapshot(locomotive));
      const riskScore = failureRiskScore(summary.age, summary.operatingHours, days);

      const recommendations: string[] = [];
      if (summary.age > 20) recommendations.push('Engine overhaul recommended');
      if (summary.operatingHours > 50000) recommendations.push('Transmission service required');
      if (days === null || days > OVERDUE_MAINTENANCE_DAYS) recommendations.push('Routine maintenance overdue');

      return { locomotive: summary, riskScore, riskLevel: toRiskLevel(riskScore), recommendations };
    });

    return {
      title: 'Failure Predictions Report',
      generatedAt: this.engine.now().toISOString(),
      riskAssessment: riskAssessment.sort(byRiskDescending),
    };
  }

  async riskAssessment(): Promise<RiskAssessmentReport> {
    const locomotives = await this.locomotives.listAll();
    const riskDistribution: Record<RiskLevel, number> = { High: 0, Medium: 0, Low: 0 };
    const riskData: RiskAssessmentItem[] = [];
    const errors: ReportError[] = [];

    for (const locomotive of locomotives) {
      const prediction = this.predictAnnual('risk-assessment', locomotive, errors);
      if (!prediction) continue;
      riskDistribution[prediction.risk_level]++;

      riskData.push({
        locomotive: this.summarize(locomotive),
        riskScore: prediction.risk_score,
        riskLevel: prediction.risk_level,
        reliabilityCategory: prediction.reliability_category,
        predictionMethod: prediction.prediction_method,
      });
    }

    return {
      title: 'Risk Assessment Report',
      generatedAt: this.engine.now().toISOString(),
      totalLocomotives: locomotives.length,
      riskDistribution,
      riskData: riskData.sort(byRiskDescending).slice(0, RISK_ASSESSMENT_TOP),
      errors,
    };
  }

  async maintenancePlanning(): Promise<MaintenancePlanningReport> {
    const locomotives = await this.locomotives.listAll();
    const maintenancePlan: Record<MaintenanceBucket, MaintenancePlanItem[]> = { urgent: [], scheduled: [], routine: [] };
    const errors: ReportError[] = [];

    for (const locomotive of locomotives) {
      const prediction = this.predictAnnual('maintenance-planning', locomotive, errors);
      if (!prediction) continue;

      const daysSinceMaintenance = this.engine.riskService.daysSinceMaintenance(toSnapshot(locomotive));
      const priority = maintenanceBucket(prediction.risk_level, daysSinceMaintenance);

      maintenancePlan[priority].push({
        locomotive: this.summarize(locomotive),
        riskScore: prediction.risk_score,
        riskLevel: prediction.risk_level,
        daysSinceMaintenance,
        priority,
      });
    }

    for (const items of Object.values(maintenancePlan)) {
      items.sort(byRiskDescending);
    }

    return {
      title: 'Maintenance Planning Report',
      generatedAt: this.engine.now().toISOString(),
      totalLocomotives: locomotives.length,
      maintenancePlan,
      errors,
    };
  }

  // A rejected record is listed in the report's errors instead of failing the report
  private predictAnnual(report: ReportType, locomotive: Locomotive, errors: ReportError[]): PredictionResult | null {
    try {
      return this.engine.predictPerformance(toSnapshot(locomotive), 'all', 365);
    } catch (error) {
      if (error instanceof ValidationError) {
        loggers.reports.skipped(report, locomotive.locomotiveId, error.message);
        errors.push({ locomotiveId: locomotive.locomotiveId, error: error.message });
        return null;
      }
      throw error;
    }
  }

  private summarize(locomotive: Locomotive): LocomotiveSummary {
    return {
      locomotiveId: locomotive.locomotiveId,
      model: locomotive.model,
      age: this.engine.riskService.calculateAge(toSnapshot(locomotive)),
      operatingHours: locomotive.operatingHours,
      currentStatus: locomotive.currentStatus,
    };
  }
}
