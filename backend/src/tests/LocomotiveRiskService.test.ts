import { describe, it, expect } from '@jest/globals';
import { LocomotiveRiskService, toRiskLevel } from '../services/LocomotiveRiskService';
import { fixedClock, snapshot } from './helpers';

describe('LocomotiveRiskService', () => {
  const service = new LocomotiveRiskService(fixedClock);

  const veteran = snapshot({ manufacturingYear: 1996, operatingHours: 60000, lastMaintenance: null });
  const nearlyNew = snapshot();

  describe('toRiskLevel', () => {
    it('buckets scores at 40 and 70', () => {
      expect(toRiskLevel(39.99)).toBe('Low');
      expect(toRiskLevel(40)).toBe('Medium');
      expect(toRiskLevel(69.99)).toBe('Medium');
      expect(toRiskLevel(70)).toBe('High');
    });
  });

  describe('age and service history', () => {
    it('derives age from the clock year', () => {
      expect(service.calculateAge(veteran)).toBe(30);
      expect(service.calculateAge(nearlyNew)).toBe(2);
    });

    it('reports never-serviced locomotives as null days', () => {
      expect(service.daysSinceMaintenance(veteran)).toBeNull();
      expect(service.getMaintenanceHistory(veteran)).toEqual({ neverServiced: true, daysSinceMaintenance: null });
    });

    it('counts whole calendar days since the last service', () => {
      const locomotive = snapshot({ lastMaintenance: new Date('2026-07-01T00:00:00.000Z') });
      expect(service.daysSinceMaintenance(locomotive)).toBe(106);
    });

    it('treats maintenance dated in the future as serviced today', () => {
      const locomotive = snapshot({ lastMaintenance: new Date('2026-12-01T00:00:00.000Z') });
      expect(service.getMaintenanceHistory(locomotive)).toEqual({ neverServiced: false, daysSinceMaintenance: 0 });
    });
  });

  describe('calculateRiskScore', () => {
    it('caps each factor and flags a missing maintenance record', () => {
      expect(service.calculateRiskScore(veteran)).toBe(100);
      expect(service.getRiskLevel(veteran)).toBe('High');
    });

    it('scores a young, freshly serviced locomotive as low risk', () => {
      expect(service.calculateRiskScore(nearlyNew)).toBeCloseTo(4.3, 10);
      expect(service.getRiskLevel(nearlyNew)).toBe('Low');
    });

    it('adds maintenance recency up to 20 points', () => {
      const locomotive = snapshot({ operatingHours: 0, lastMaintenance: new Date('2026-09-15T00:00:00.000Z') });
      // 4 for age, 30 days * 0.2
      expect(service.calculateRiskScore(locomotive)).toBeCloseTo(10, 10);
    });
  });

  describe('calculateReliability', () => {
    it('subtracts age, usage and missing maintenance penalties', () => {
      expect(service.calculateReliability(veteran)).toBe(43);
      expect(service.calculateReliability(nearlyNew)).toBeCloseTo(96.9, 10);
    });

    it('penalises overdue service and repair status', () => {
      const locomotive = snapshot({
        operatingHours: 0,
        lastMaintenance: new Date('2026-07-01T00:00:00.000Z'),
        currentStatus: 'repair',
      });
      // 100 - 3 (age) - 1.6 (16 days overdue) - 25 (repair)
      expect(service.calculateReliability(locomotive)).toBeCloseTo(70.4, 10);
    });

    it('caps the age and usage penalties', () => {
      const locomotive = snapshot({
        manufacturingYear: 1950,
        operatingHours: 900000,
        lastMaintenance: null,
        currentStatus: 'repair',
      });
      expect(service.calculateReliability(locomotive)).toBe(10);
      expect(service.calculateReliability({ ...locomotive, currentStatus: 'maintenance' })).toBe(25);
    });
  });

  describe('getMaintenanceRecommendations', () => {
    it('lists every applicable work item for an old, heavily used locomotive', () => {
      expect(service.getMaintenanceRecommendations(veteran)).toEqual([
        { type: 'Engine Overhaul', priority: 'High', description: 'Consider major engine overhaul due to age' },
        { type: 'Transmission Service', priority: 'High', description: 'Transmission requires major service' },
        { type: 'Routine Maintenance', priority: 'High', description: 'No maintenance record on file' },
        { type: 'Comprehensive Inspection', priority: 'High', description: 'Full system inspection recommended' },
      ]);
    });

    it('marks an overhaul as medium priority between 21 and 25 years', () => {
      const locomotive = snapshot({ manufacturingYear: 2003, operatingHours: 1000 });
      expect(service.getMaintenanceRecommendations(locomotive)).toEqual([
        { type: 'Engine Overhaul', priority: 'Medium', description: 'Consider major engine overhaul due to age' },
      ]);
    });

    it('returns nothing for a healthy locomotive', () => {
      expect(service.getMaintenanceRecommendations(nearlyNew)).toEqual([]);
    });
  });

  describe('generatePredictionTrend', () => {
    it('is reproducible with a fixed random source', () => {
      const locomotive = snapshot({ operatingHours: 0 });
      const trend = service.generatePredictionTrend(locomotive, 2, () => 0.5);

      expect(trend).toEqual({
        labels: ['Day 1', 'Day 2'],
        performance: [86.7, 86.4],
        risk: [4.2, 4.4],
      });
    });

    it('caps risk at 95', () => {
      const trend = service.generatePredictionTrend(veteran, 3, () => 1);
      expect(trend.risk).toEqual([95, 95, 95]);
    });
  });
});
