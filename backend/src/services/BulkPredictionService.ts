import { ValidationError } from '../middleware/errorHandler';
import { PredictionResult, isPredictionType } from '../models/PredictionModels';
import { loggers } from '../utils/logger';
import { LocomotiveDataService, toSnapshot } from './LocomotiveDataService';
import { LocomotivePredictionEngine } from './LocomotivePredictionEngine';
import { PredictionStoreService } from './PredictionStoreService';

export interface BulkPredictionOptions {
  locomotiveIds: readonly string[];
  predictionType: string;
  periodDays: number;
  persist?: boolean;
}

export interface BulkPredictionItem {
  locomotiveId: string;
  model: string;
  age: number;
  operatingHours: number;
  prediction: PredictionResult;
  predictionId?: string;
}

export interface BulkPredictionError {
  locomotiveId: string;
  error: string;
}

export interface BulkPredictionResponse {
  results: BulkPredictionItem[];
  errors: BulkPredictionError[];
}

export class BulkPredictionService {
  constructor(
    private readonly engine: LocomotivePredictionEngine,
    private readonly locomotives: LocomotiveDataService,
    private readonly store: PredictionStoreService,
    private readonly limit: number
  ) {}

  async predict({ locomotiveIds, predictionType, periodDays, persist = true }: BulkPredictionOptions): Promise<BulkPredictionResponse> {
    const requested = [...new Set(locomotiveIds.map(id => id.trim()).filter(id => id.length > 0))];

    if (!isPredictionType(predictionType)) {
      throw new ValidationError(`Unknown prediction type "${predictionType}"`, { field: 'predictionType' });
    }
    if (requested.length === 0) {
      throw new ValidationError('At least one locomotive number is required', { field: 'locomotiveIds' });
    }
    if (requested.length > this.limit) {
      throw new ValidationError(`At most ${this.limit} locomotives can be predicted at once`, {
        field: 'locomotiveIds',
        limit: this.limit,
        received: requested.length,
      });
    }

    const startTime = Date.now();
    // Lookups finish before the write transaction opens
    const found = await this.locomotives.findByNumbers(requested);

    const results: BulkPredictionItem[] = [];
    const errors: BulkPredictionError[] = [];
    const rowIds: string[] = [];

    for (const locomotiveId of requested) {
      const locomotive = found.get(locomotiveId);
      if (!locomotive) {
        errors.push({ locomotiveId, error: `Locomotive ${locomotiveId} not found` });
        continue;
      }

      const snapshot = toSnapshot(locomotive);
      let prediction: PredictionResult;
      try {
        prediction = this.engine.predictPerformance(snapshot, predictionType, periodDays);
      } catch (error) {
        if (error instanceof ValidationError) {
          errors.push({ locomotiveId, error: error.message });
          continue;
        }
        throw error;
      }

      results.push({
        locomotiveId,
        model: locomotive.model,
        age: this.engine.riskService.calculateAge(snapshot),
        operatingHours: locomotive.operatingHours,
        prediction,
      });
      rowIds.push(locomotive.id);
    }

    if (persist) {
      const ids = await this.store.saveMany(
        results.map((item, index) => ({ locomotiveId: rowIds[index], result: item.prediction }))
      );
      ids.forEach((id, index) => {
        results[index].predictionId = id;
      });
    }

    loggers.prediction.bulkCompleted(requested.length, results.length, errors.length, Date.now() - startTime);

    return { results, errors };
  }
}
