import { Knex } from 'knex';
import { z } from 'zod';
import { Locomotive, LocomotiveStatus } from '../../../shared/types';
import { LocomotiveSnapshot } from '../models/PredictionModels';
import { dateOnlyColumn, numericColumn, timestampColumn } from '../utils/columns';

const locomotiveStatus = z.enum(['active', 'maintenance', 'repair', 'retired']);

const locomotiveRowSchema = z.object({
  id: z.string(),
  locomotiveId: z.string(),
  model: z.string(),
  manufacturingYear: numericColumn.pipe(z.number().int()),
  operatingHours: numericColumn,
  lastMaintenance: dateOnlyColumn.nullish(),
  currentStatus: locomotiveStatus,
  fleet: z.string().nullish(),
  createdAt: timestampColumn,
  updatedAt: timestampColumn,
});

export const toLocomotive = (row: unknown): Locomotive => {
  const parsed = locomotiveRowSchema.parse(row);
  return {
    ...parsed,
    lastMaintenance: parsed.lastMaintenance ?? undefined,
    fleet: parsed.fleet ?? undefined,
  };
};

/** Engine input for a stored locomotive. */
export const toSnapshot = (locomotive: Locomotive): LocomotiveSnapshot => ({
  id: locomotive.id,
  locomotiveId: locomotive.locomotiveId,
  model: locomotive.model,
  manufacturingYear: locomotive.manufacturingYear,
  operatingHours: locomotive.operatingHours,
  lastMaintenance: locomotive.lastMaintenance ? new Date(locomotive.lastMaintenance) : null,
  currentStatus: locomotive.currentStatus,
  fleet: locomotive.fleet,
});

export type StatusCounts = Record<LocomotiveStatus, number>;

const statusCountSchema = z.array(z.object({ currentStatus: locomotiveStatus, count: numericColumn }));

export class LocomotiveDataService {
  constructor(private readonly db: Knex) {}

  async search(query: string, limit: number): Promise<Locomotive[]> {
    const builder = this.db('locomotives').orderBy('locomotiveId').limit(limit);
    if (query) {
      builder.where('locomotiveId', 'like', `%${query}%`);
    }
    const rows = await builder;
    return rows.map(toLocomotive);
  }

  async findByNumber(locomotiveId: string): Promise<Locomotive | undefined> {
    const row = await this.db('locomotives').where({ locomotiveId }).first();
    return row ? toLocomotive(row) : undefined;
  }

  /** One query for many locomotive numbers; unknown numbers are simply absent. */
  async findByNumbers(locomotiveIds: readonly string[]): Promise<Map<string, Locomotive>> {
    if (locomotiveIds.length === 0) {
      return new Map();
    }

    const rows = await this.db('locomotives').whereIn('locomotiveId', [...locomotiveIds]);
    const locomotives = rows.map(toLocomotive);
    return new Map(locomotives.map(locomotive => [locomotive.locomotiveId, locomotive]));
  }

  async listAll(): Promise<Locomotive[]> {
    const rows = await this.db('locomotives').orderBy('locomotiveId');
    return rows.map(toLocomotive);
  }

  async countByStatus(): Promise<StatusCounts> {
    const rows = await this.db('locomotives')
      .select('currentStatus')
      .count({ count: '*' })
      .groupBy('currentStatus');

    const counts: StatusCounts = { active: 0, maintenance: 0, repair: 0, retired: 0 };
    for (const { currentStatus, count } of statusCountSchema.parse(rows)) {
      counts[currentStatus] = count;
    }
    return counts;
  }
}
