// Shared TypeScript types for the locomotive risk engine

export type LocomotiveStatus = 'active' | 'maintenance' | 'repair' | 'retired';

export const LOCOMOTIVE_STATUSES: readonly LocomotiveStatus[] = ['active', 'maintenance', 'repair', 'retired'];

export interface Locomotive {
  id: string;
  locomotiveId: string;
  model: string;
  manufacturingYear: number;
  operatingHours: number;
  lastMaintenance?: string; // ISO date (YYYY-MM-DD)
  currentStatus: LocomotiveStatus;
  fleet?: string;
  createdAt: string;
  updatedAt: string;
}

// API request types
export interface CreatePredictionRequest {
  locomotiveId: string;
  locomotiveType?: string;
  predictionType: string;
  periodDays?: number;
}

export interface BulkPredictionRequest {
  locomotiveIds: string[];
  predictionType: string;
  periodDays?: number;
}

export interface PaginatedResponse<T> {
  data: T[];
  pagination: {
    limit: number;
    total: number;
  };
}
