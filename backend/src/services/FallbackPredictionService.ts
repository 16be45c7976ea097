import { FallbackReason, LocomotiveSnapshot, PredictionOutcome } from '../models/PredictionModels';
import { LocomotiveRiskService, toRiskLevel } from './LocomotiveRiskService';

export type FallbackOutcome = Extract<PredictionOutcome, { method: 'fallback' }>;

// Formula-only outcome used whenever the model path is unavailable or fails.
export class FallbackPredictionService {
  constructor(private readonly riskService: LocomotiveRiskService) {}

  predict(locomotive: LocomotiveSnapshot, reason: FallbackReason, detail?: string): FallbackOutcome {
    const riskScore = this.riskService.calculateRiskScore(locomotive);

    return {
      method: 'fallback',
      reason,
      detail,
      riskScore,
      riskLevel: toRiskLevel(riskScore),
      reliabilityCategory: 'Medium',
    };
  }
}
