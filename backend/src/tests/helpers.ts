import path from 'path';
import knex, { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { up } from '../../../database/migrations/001_create_locomotive_tables';
import { LocomotiveStatus } from '../../../shared/types';
import { Clock, LocomotiveSnapshot } from '../models/PredictionModels';
import { ArtifactBundleState } from '../services/ModelArtifactService';

export const FIXED_NOW = new Date('2026-10-15T12:00:00.000Z');

export const fixedClock: Clock = () => new Date(FIXED_NOW.getTime());

export const SHIPPED_MODELS_DIR = path.resolve(__dirname, '../../ml_models');

export const unavailableArtifacts: ArtifactBundleState = {
  status: 'unavailable',
  reason: 'scaler.json could not be read',
};

export const snapshot = (overrides: Partial<LocomotiveSnapshot> = {}): LocomotiveSnapshot => ({
  id: 'row-1',
  locomotiveId: 'L0001',
  model: 'DE10',
  manufacturingYear: 2024,
  operatingHours: 500,
  lastMaintenance: new Date('2026-10-15T00:00:00.000Z'),
  currentStatus: 'active',
  fleet: 'OWNED',
  ...overrides,
});

export interface LocomotiveSeed {
  locomotiveId: string;
  model?: string;
  manufacturingYear: number;
  operatingHours: number;
  lastMaintenance?: string | null;
  currentStatus?: LocomotiveStatus;
  fleet?: string;
}

export const createTestDatabase = async (): Promise<Knex> => {
  const db = knex({
    client: 'sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    pool: { min: 1, max: 1 },
  });
  await up(db);
  return db;
};

export const insertLocomotives = async (db: Knex, seeds: LocomotiveSeed[]): Promise<void> => {
  const timestamp = FIXED_NOW.toISOString();
  await db('locomotives').insert(
    seeds.map(seed => ({
      id: uuidv4(),
      model: 'DE10',
      lastMaintenance: null,
      currentStatus: 'active',
      fleet: 'OWNED',
      ...seed,
      createdAt: timestamp,
      updatedAt: timestamp,
    }))
  );
};

// One high, two medium and one low risk locomotive on the fallback formula
export const SAMPLE_FLEET: LocomotiveSeed[] = [
  { locomotiveId: 'L1001', model: 'DE10', manufacturingYear: 1996, operatingHours: 60000, lastMaintenance: null, currentStatus: 'repair' },
  { locomotiveId: 'L1002', model: 'DE10', manufacturingYear: 2024, operatingHours: 500, lastMaintenance: '2026-10-15' },
  { locomotiveId: 'L2001', model: 'DE11', manufacturingYear: 2016, operatingHours: 20000, lastMaintenance: '2026-07-01', currentStatus: 'maintenance', fleet: 'HIRED' },
  { locomotiveId: 'L2002', model: 'DE11', manufacturingYear: 2010, operatingHours: 30000, lastMaintenance: '2026-10-10', fleet: 'HIRED' },
];
