import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import request from 'supertest';
import { Express } from 'express';
import { Knex } from 'knex';
import { createApp } from '../app';
import { getEngineConfig } from '../config/engine';
import { LocomotivePredictionEngine } from '../services/LocomotivePredictionEngine';
import { BASIC_RISK_STATEMENTS } from '../services/RecommendationService';
import { SAMPLE_FLEET, createTestDatabase, fixedClock, insertLocomotives, unavailableArtifacts } from './helpers';

describe('Locomotive prediction API', () => {
  let db: Knex;
  let app: Express;
  const engine = new LocomotivePredictionEngine({ artifacts: unavailableArtifacts, clock: fixedClock });

  beforeAll(async () => {
    db = await createTestDatabase();
    await insertLocomotives(db, SAMPLE_FLEET);
    app = createApp({
      engine,
      db,
      config: getEngineConfig({ BULK_PREDICTION_LIMIT: '3' }),
      random: () => 0.5,
      healthCheck: async () => true,
    });
  });

  afterAll(async () => {
    await db.destroy();
  });

  describe('GET /health', () => {
    it('reports database and artifact status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'healthy',
        database: 'connected',
        modelArtifacts: 'unavailable',
      });
    });

    it('returns 503 when the database is down', async () => {
      const unhealthy = createApp({ engine, db, healthCheck: async () => false });
      const response = await request(unhealthy).get('/health');

      expect(response.status).toBe(503);
      expect(response.body.status).toBe('unhealthy');
    });
  });

  describe('locomotives', () => {
    it('searches by locomotive number', async () => {
      const response = await request(app).get('/api/locomotives').query({ q: 'L10' });

      expect(response.status).toBe(200);
      expect(response.body.data.map((locomotive: { locomotiveId: string }) => locomotive.locomotiveId)).toEqual([
        'L1001',
        'L1002',
      ]);
      expect(response.body.pagination).toEqual({ limit: 20, total: 2 });
    });

    it('returns current risk figures for one locomotive', async () => {
      const response = await request(app).get('/api/locomotives/L1001');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        age: 30,
        riskScore: 100,
        riskLevel: 'High',
        reliability: 18,
        maintenanceHistory: { neverServiced: true, daysSinceMaintenance: null },
      });
      expect(response.body.locomotive).toMatchObject({ locomotiveId: 'L1001', currentStatus: 'repair' });
      expect(response.body.maintenanceRecommendations).toHaveLength(4);
    });

    it('returns a trend series for the requested number of days', async () => {
      const response = await request(app).get('/api/locomotives/L1002/trend').query({ days: 3 });

      expect(response.status).toBe(200);
      expect(response.body.periodDays).toBe(3);
      expect(response.body.trend.labels).toEqual(['Day 1', 'Day 2', 'Day 3']);
      expect(response.body.trend.risk).toHaveLength(3);
    });

    it('returns 404 for an unknown locomotive', async () => {
      const response = await request(app).get('/api/locomotives/L9999');

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({ message: 'Locomotive L9999 not found', code: 'NOT_FOUND' });
    });
  });

  describe('predictions', () => {
    let predictionId: string;

    it('creates and stores a prediction', async () => {
      const response = await request(app)
        .post('/api/predictions')
        .send({ locomotiveId: 'L1002', predictionType: 'reliability', periodDays: 30 });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        locomotiveId: 'L1002',
        model: 'DE10',
        prediction: {
          prediction_type: 'reliability',
          period_days: 30,
          risk_score: 4.3,
          risk_level: 'Low',
          reliability_category: 'Medium',
          predictions: { reliability: 87.42 },
          prediction_method: 'Fallback Method',
          timestamp: '2026-10-15T12:00:00.000Z',
        },
      });
      predictionId = response.body.id;
    });

    it('reads a stored prediction back', async () => {
      const response = await request(app).get(`/api/predictions/${predictionId}`);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        id: predictionId,
        locomotiveNumber: 'L1002',
        model: 'DE10',
        predictionType: 'reliability',
        predictionPeriod: 30,
        riskScore: 4.3,
        riskLevel: 'Low',
        isActive: true,
        createdAt: '2026-10-15T12:00:00.000Z',
        expiresAt: '2026-11-14T12:00:00.000Z',
      });
      expect(response.body.predictionData.predictions).toEqual({ reliability: 87.42 });
      expect(response.body.recommendations[0]).toBe(BASIC_RISK_STATEMENTS.Low);
    });

    it('uses the annual default period when none is given', async () => {
      const response = await request(app)
        .post('/api/predictions')
        .send({ locomotiveId: 'L2001', predictionType: 'availability_days' });

      expect(response.status).toBe(201);
      expect(response.body.prediction.period_days).toBe(365);
      expect(response.body.prediction.risk_level).toBe('Medium');
    });

    it('rejects unknown prediction types', async () => {
      const response = await request(app)
        .post('/api/predictions')
        .send({ locomotiveId: 'L1002', predictionType: 'top_speed' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(Object.keys(response.body.error.details)).toEqual(['predictionType']);
    });

    it('rejects a locomotive type that does not match the record', async () => {
      const response = await request(app)
        .post('/api/predictions')
        .send({ locomotiveId: 'L1002', locomotiveType: 'DE11', predictionType: 'all' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Locomotive L1002 is a DE10, not a DE11');
    });

    it('predicts without storing on the quick endpoint', async () => {
      const response = await request(app).get('/api/predictions/quick').query({ locomotiveId: 'L2001' });

      expect(response.status).toBe(200);
      expect(response.body.locomotive).toEqual({
        locomotiveId: 'L2001',
        model: 'DE11',
        age: 10,
        operatingHours: 20000,
        currentStatus: 'maintenance',
      });
      expect(response.body.prediction).toMatchObject({
        prediction_type: 'all',
        period_days: 30,
        risk_score: 52,
        risk_level: 'Medium',
      });
    });

    it('predicts in bulk with per-locomotive errors', async () => {
      const response = await request(app)
        .post('/api/predictions/bulk')
        .send({ locomotiveIds: ['L1001', 'L9999'], predictionType: 'total_failures', periodDays: 90 });

      expect(response.status).toBe(200);
      expect(response.body.summary).toEqual({ requested: 2, succeeded: 1, failed: 1 });
      expect(response.body.results[0].prediction.predictions).toEqual({ total_failures: 38 });
      expect(response.body.errors).toEqual([{ locomotiveId: 'L9999', error: 'Locomotive L9999 not found' }]);
    });

    it('enforces the bulk limit', async () => {
      const response = await request(app)
        .post('/api/predictions/bulk')
        .send({ locomotiveIds: ['L1001', 'L1002', 'L2001', 'L2002'], predictionType: 'all' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('At most 3 locomotives can be predicted at once');
    });

    it('lists active predictions', async () => {
      const response = await request(app).get('/api/predictions').query({ limit: 10 });

      expect(response.status).toBe(200);
      expect(response.body.pagination).toEqual({ limit: 10, total: 3 });
      expect(response.body.data).toHaveLength(3);
    });

    it('deactivates every stored prediction on clear', async () => {
      const cleared = await request(app).post('/api/predictions/clear');
      expect(cleared.body).toEqual({ deactivated: 3 });

      const listed = await request(app).get('/api/predictions');
      expect(listed.body).toEqual({ data: [], pagination: { limit: 20, total: 0 } });
    });

    it('validates prediction ids', async () => {
      const malformed = await request(app).get('/api/predictions/not-a-uuid');
      expect(malformed.status).toBe(400);

      const missing = await request(app).get('/api/predictions/3f1c2d4e-5b6a-4c7d-8e9f-0a1b2c3d4e5f');
      expect(missing.status).toBe(404);
      expect(missing.body.error.message).toBe('Prediction not found');
    });
  });

  describe('reports', () => {
    it('serves a fleet overview', async () => {
      const response = await request(app).get('/api/reports/fleet-overview');

      expect(response.status).toBe(200);
      expect(response.body.title).toBe('Fleet Overview Report');
      expect(response.body.fleetStats.total).toBe(4);
    });

    it('rejects unknown report types', async () => {
      const response = await request(app).get('/api/reports/fuel-ledger');
      expect(response.status).toBe(400);
    });
  });
});
