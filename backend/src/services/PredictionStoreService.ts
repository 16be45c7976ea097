import { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Clock, PREDICTION_METHODS, PREDICTION_TYPES, PredictionResult } from '../models/PredictionModels';
import { booleanColumn, numericColumn, timestampColumn } from '../utils/columns';
import { logger } from '../utils/logger';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const riskLevel = z.enum(['Low', 'Medium', 'High']);

const predictionResultSchema = z.object({
  prediction_type: z.enum(PREDICTION_TYPES),
  period_days: z.number().int().positive(),
  risk_score: z.number(),
  risk_level: riskLevel,
  reliability_category: z.enum(['High', 'Medium', 'Low', 'Critical']),
  predictions: z
    .object({
      availability_days: z.number(),
      distance_travelled: z.number(),
      distance_per_day: z.number(),
      total_failures: z.number(),
      reliability: z.number(),
      fuel_efficiency: z.number(),
    })
    .partial(),
  recommendations: z.array(z.string()),
  prediction_method: z.enum([PREDICTION_METHODS.ml, PREDICTION_METHODS.fallback]),
  timestamp: z.string(),
});

const jsonText = <S extends z.ZodTypeAny>(schema: S) =>
  z.string().transform((text, ctx): z.infer<S> => {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Stored value is not valid JSON' });
      return z.NEVER;
    }
    const result = schema.safeParse(value);
    if (!result.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: result.error.issues[0]?.message ?? 'Stored value has an unexpected shape',
      });
      return z.NEVER;
    }
    return result.data;
  });

const predictionRowSchema = z.object({
  id: z.string(),
  locomotiveId: z.string(),
  locomotiveNumber: z.string(),
  model: z.string(),
  predictionType: z.string(),
  predictionPeriod: numericColumn,
  riskScore: numericColumn,
  riskLevel,
  predictionData: jsonText(predictionResultSchema),
  recommendations: jsonText(z.array(z.string())),
  isActive: booleanColumn,
  expiresAt: timestampColumn,
  createdAt: timestampColumn,
});

export type PredictionRecord = z.infer<typeof predictionRowSchema>;

export interface PredictionToStore {
  /** Primary key of the locomotive row, not its public number */
  locomotiveId: string;
  result: PredictionResult;
}

const PREDICTION_COLUMNS = [
  'predictions.id',
  'predictions.locomotiveId',
  'locomotives.locomotiveId as locomotiveNumber',
  'locomotives.model',
  'predictions.predictionType',
  'predictions.predictionPeriod',
  'predictions.riskScore',
  'predictions.riskLevel',
  'predictions.predictionData',
  'predictions.recommendations',
  'predictions.isActive',
  'predictions.expiresAt',
  'predictions.createdAt',
];

export class PredictionStoreService {
  constructor(private readonly db: Knex, private readonly clock: Clock = () => new Date()) {}

  private toRow({ locomotiveId, result }: PredictionToStore) {
    const createdAt = this.clock();
    const expiresAt = new Date(createdAt.getTime() + result.period_days * MS_PER_DAY);

    return {
      id: uuidv4(),
      locomotiveId,
      predictionType: result.prediction_type,
      predictionPeriod: result.period_days,
      riskScore: result.risk_score,
      riskLevel: result.risk_level,
      predictionData: JSON.stringify(result),
      recommendations: JSON.stringify(result.recommendations),
      isActive: true,
      expiresAt: expiresAt.toISOString(),
      createdAt: createdAt.toISOString(),
      updatedAt: createdAt.toISOString(),
    };
  }

  async save(prediction: PredictionToStore): Promise<string> {
    const row = this.toRow(prediction);
    await this.db('predictions').insert(row);
    return row.id;
  }

  /** Store a batch atomically. Returns the new ids in input order. */
  async saveMany(predictions: readonly PredictionToStore[]): Promise<string[]> {
    if (predictions.length === 0) {
      return [];
    }

    const rows = predictions.map(prediction => this.toRow(prediction));
    await this.db.transaction(async trx => {
      await trx('predictions').insert(rows);
    });

    logger.debug('Stored prediction batch', { count: rows.length });
    return rows.map(row => row.id);
  }

  async listRecent(limit: number): Promise<{ data: PredictionRecord[]; total: number }> {
    const [rows, totalRow] = await Promise.all([
      this.db('predictions')
        .join('locomotives', 'predictions.locomotiveId', 'locomotives.id')
        .select(PREDICTION_COLUMNS)
        .where('predictions.isActive', true)
        .orderBy('predictions.createdAt', 'desc')
        .limit(limit),
      this.db('predictions').where('isActive', true).count({ count: '*' }).first(),
    ]);

    return {
      data: z.array(predictionRowSchema).parse(rows),
      total: Number(totalRow?.count ?? 0),
    };
  }

  async findById(id: string): Promise<PredictionRecord | undefined> {
    const row = await this.db('predictions')
      .join('locomotives', 'predictions.locomotiveId', 'locomotives.id')
      .select(PREDICTION_COLUMNS)
      .where('predictions.id', id)
      .first();

    return row ? predictionRowSchema.parse(row) : undefined;
  }

  /** Soft-clear: stored predictions are deactivated, never deleted. */
  async deactivateAll(): Promise<number> {
    const deactivated = await this.db('predictions')
      .where('isActive', true)
      .update({ isActive: false, updatedAt: this.clock().toISOString() });
    return deactivated;
  }
}
