import {
  MaintenanceHistory,
  PredictionMetric,
  PredictionType,
  ReliabilityCategory,
  RiskLevel,
} from '../models/PredictionModels';

const MAX_RECOMMENDATIONS = 6;
const OVERDUE_MAINTENANCE_DAYS = 90;

export interface RecommendationContext {
  riskLevel: RiskLevel;
  reliabilityCategory: ReliabilityCategory;
  age: number;
  operatingHours: number;
  maintenance: MaintenanceHistory;
  /** Calendar month, 1-12 */
  month: number;
  predictionType: PredictionType;
}

type Tiered = Record<RiskLevel, [string, string]>;

export const BASIC_RISK_STATEMENTS: Record<RiskLevel, string> = {
  High: '🚨 URGENT: High risk detected. Schedule immediate inspection before operations.',
  Medium: '📅 Medium risk level. Monitor performance closely during operations.',
  Low: '✅ Low risk level. Locomotive is in good operational condition.',
};

export const SERVICE_HISTORY_STATEMENTS = {
  engineOverhaul: '🔧 CRITICAL: Major overhaul required due to age. Consider retiring from primary operations.',
  noMaintenanceRecord: '📋 NO MAINTENANCE RECORD: Schedule a baseline inspection before the next deployment.',
  maintenanceOverdue: '🗓️ MAINTENANCE OVERDUE: Last service was more than 90 days ago. Schedule routine maintenance.',
} as const;

export const CONTINUE_MONITORING = '✅ Continue regular maintenance and monitoring';

const AVAILABILITY: Tiered = {
  High: [
    '📉 LOW AVAILABILITY EXPECTED: Schedule extended maintenance downtime to improve reliability.',
    '🛠️ Multiple system checks required. Consider component replacement.',
  ],
  Medium: [
    '📊 MODERATE AVAILABILITY: Plan maintenance during low-demand periods.',
    '🔍 Increase inspection frequency to prevent unexpected downtime.',
  ],
  Low: [
    '📈 HIGH AVAILABILITY EXPECTED: Continue current maintenance schedule.',
    '✅ Suitable for continuous operations and high-demand periods.',
  ],
};

const DISTANCE: Tiered = {
  High: [
    '🛤️ LIMITED DISTANCE CAPABILITY: Avoid long-distance routes (>500km).',
    '📉 Reduced operational range expected. Plan for shorter routes.',
  ],
  Medium: [
    '🛤️ MODERATE DISTANCE CAPABILITY: Suitable for medium-distance routes (200-500km).',
    '📊 Monitor fuel consumption and system performance on longer routes.',
  ],
  Low: [
    '🛤️ HIGH DISTANCE CAPABILITY: Suitable for long-distance operations.',
    '✅ Can handle extended routes and heavy freight operations.',
  ],
};

const DAILY_DISTANCE: Tiered = {
  High: [
    '📉 LOW DAILY DISTANCE: Limit to short-haul operations (<200km/day).',
    '🛠️ System performance issues affecting daily range. Schedule diagnostics.',
  ],
  Medium: [
    '📊 MODERATE DAILY DISTANCE: Suitable for medium-haul operations (200-400km/day).',
    '🔍 Monitor daily performance metrics and fuel consumption.',
  ],
  Low: [
    '📈 HIGH DAILY DISTANCE: Capable of long-haul operations (>400km/day).',
    '✅ Optimal for high-intensity daily operations.',
  ],
};

const FAILURES: Tiered = {
  High: [
    '⚠️ HIGH FAILURE RISK: Schedule comprehensive maintenance before operations.',
    '🚫 Avoid critical routes. Have backup locomotive ready.',
  ],
  Medium: [
    '📊 MODERATE FAILURE RISK: Increase monitoring frequency during operations.',
    '🛠️ Schedule preventive maintenance to reduce failure probability.',
  ],
  Low: [
    '✅ LOW FAILURE RISK: Continue current maintenance practices.',
    '📈 Suitable for critical and time-sensitive operations.',
  ],
};

// Reliability tiers keyed by risk level, used unless the classifier reports Critical or Low
const RELIABILITY_BY_RISK: Tiered = {
  High: [
    '🔴 LOW RELIABILITY: Do not assign to critical routes or time-sensitive operations.',
    '🛠️ Schedule comprehensive diagnostic check. Multiple systems need attention.',
  ],
  Medium: [
    '🟡 MODERATE RELIABILITY: Suitable for non-critical operations with backup plans.',
    '📋 Increase monitoring frequency. Prepare contingency plans.',
  ],
  Low: [
    '✅ HIGH RELIABILITY: Suitable for all types of operations.',
    '🚂 Optimal for critical routes and time-sensitive deliveries.',
  ],
};

const RELIABILITY_BY_CATEGORY: Partial<Record<ReliabilityCategory, [string, string]>> = {
  Critical: [
    '🔴 CRITICAL RELIABILITY: Do not assign to critical routes or time-sensitive operations.',
    '🛠️ Schedule comprehensive diagnostic check. Multiple systems need attention.',
  ],
  Low: [
    '🟡 LOW RELIABILITY: Suitable for non-critical operations with backup plans.',
    '📋 Increase monitoring frequency. Prepare contingency plans.',
  ],
};

const FUEL_EFFICIENCY = {
  poor: [
    '⛽ POOR FUEL EFFICIENCY: Check engine tuning, air filters, and fuel injection systems.',
    '🚫 Avoid this locomotive for fuel-sensitive operations. Consider engine overhaul.',
  ],
  moderate: [
    '⛽ MODERATE FUEL EFFICIENCY: Schedule engine tune-up and filter replacement.',
    '📈 Monitor fuel consumption closely. Consider driver training for fuel-efficient operation.',
  ],
  good: [
    '⛽ GOOD FUEL EFFICIENCY: Continue current maintenance practices to maintain efficiency.',
    '✅ Suitable for fuel-sensitive operations and long-distance routes.',
  ],
} as const;

const SEASONAL = {
  winter: '❄️ WINTER: Cold weather reduces fuel efficiency. Plan for increased consumption.',
  summer: '☀️ SUMMER: High temperatures may reduce fuel efficiency. Monitor cooling systems.',
} as const;

const AGED = {
  availability: '⏰ AGED LOCOMOTIVE: Plan for increased maintenance windows due to age.',
  dailyDistance: '⏰ AGED LOCOMOTIVE: Daily distance may be limited by component wear.',
  failures: '🔧 AGED LOCOMOTIVE: Higher failure risk due to component aging.',
  reliability: '⏰ AGED LOCOMOTIVE: Reliability may decrease due to component aging.',
} as const;

const HIGH_USAGE = {
  distance: '⏱️ HIGH USAGE: Consider route planning to minimize wear on high-mileage components.',
  failures: '⏱️ HIGH USAGE: Component fatigue may increase failure probability.',
} as const;

const isAged = (age: number): boolean => age > 20;
const isHighUsage = (hours: number): boolean => hours > 50000;

type MetricRecommender = (context: RecommendationContext) => string[];

const availabilityRecommendations: MetricRecommender = ({ riskLevel, age }) => [
  ...AVAILABILITY[riskLevel],
  ...(isAged(age) ? [AGED.availability] : []),
];

const distanceRecommendations: MetricRecommender = ({ riskLevel, operatingHours }) => [
  ...DISTANCE[riskLevel],
  ...(isHighUsage(operatingHours) ? [HIGH_USAGE.distance] : []),
];

const dailyDistanceRecommendations: MetricRecommender = ({ riskLevel, age }) => [
  ...DAILY_DISTANCE[riskLevel],
  ...(isAged(age) ? [AGED.dailyDistance] : []),
];

const failureRecommendations: MetricRecommender = ({ riskLevel, age, operatingHours }) => [
  ...FAILURES[riskLevel],
  ...(isAged(age) ? [AGED.failures] : []),
  ...(isHighUsage(operatingHours) ? [HIGH_USAGE.failures] : []),
];

const reliabilityRecommendations: MetricRecommender = ({ riskLevel, reliabilityCategory, age }) => [
  ...(RELIABILITY_BY_CATEGORY[reliabilityCategory] ?? RELIABILITY_BY_RISK[riskLevel]),
  ...(isAged(age) ? [AGED.reliability] : []),
];

const seasonalStatement = (month: number): string | undefined => {
  if (month === 12 || month === 1 || month === 2) return SEASONAL.winter;
  if (month >= 6 && month <= 8) return SEASONAL.summer;
  return undefined;
};

const fuelEfficiencyRecommendations: MetricRecommender = ({ age, operatingHours, month }) => {
  let tier: keyof typeof FUEL_EFFICIENCY = 'good';
  if (age > 20 && operatingHours > 50000) {
    tier = 'poor';
  } else if (age > 15 || operatingHours > 40000) {
    tier = 'moderate';
  }

  const seasonal = seasonalStatement(month);
  return [...FUEL_EFFICIENCY[tier], ...(seasonal ? [seasonal] : [])];
};

const METRIC_RECOMMENDERS: Record<PredictionMetric, MetricRecommender> = {
  availability_days: availabilityRecommendations,
  distance_travelled: distanceRecommendations,
  distance_per_day: dailyDistanceRecommendations,
  total_failures: failureRecommendations,
  reliability: reliabilityRecommendations,
  fuel_efficiency: fuelEfficiencyRecommendations,
};

// Headline statement per metric family shown for an 'all' prediction
const ALL_SUMMARY: readonly MetricRecommender[] = [
  availabilityRecommendations,
  dailyDistanceRecommendations,
  fuelEfficiencyRecommendations,
  failureRecommendations,
];

const serviceHistoryRecommendations = ({ age, maintenance }: RecommendationContext): string[] => {
  const statements: string[] = [];

  if (age > 25) {
    statements.push(SERVICE_HISTORY_STATEMENTS.engineOverhaul);
  }

  if (maintenance.neverServiced) {
    statements.push(SERVICE_HISTORY_STATEMENTS.noMaintenanceRecord);
  } else if (maintenance.daysSinceMaintenance !== null && maintenance.daysSinceMaintenance > OVERDUE_MAINTENANCE_DAYS) {
    statements.push(SERVICE_HISTORY_STATEMENTS.maintenanceOverdue);
  }

  return statements;
};

/**
 * Ordered, de-duplicated operational advice for a prediction.
 * Always returns between 1 and 6 statements; the first is the risk headline.
 */
export class RecommendationService {
  generate(context: RecommendationContext): string[] {
    const recommendations = [BASIC_RISK_STATEMENTS[context.riskLevel], ...serviceHistoryRecommendations(context)];

    if (context.predictionType === 'all') {
      for (const recommender of ALL_SUMMARY) {
        recommendations.push(...recommender(context).slice(0, 1));
      }
    } else {
      recommendations.push(...METRIC_RECOMMENDERS[context.predictionType](context));
    }

    if (recommendations.length === 1) {
      recommendations.push(CONTINUE_MONITORING);
    }

    return [...new Set(recommendations)].slice(0, MAX_RECOMMENDATIONS);
  }
}
