import { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { LocomotiveStatus } from '../../shared/types';

interface SeedLocomotive {
  locomotiveId: string;
  model: string;
  manufacturingYear: number;
  operatingHours: number;
  lastMaintenance: string | null;
  currentStatus: LocomotiveStatus;
  fleet: string;
}

const locomotives: SeedLocomotive[] = [
  { locomotiveId: 'L1001', model: 'DE10', manufacturingYear: 1994, operatingHours: 62000, lastMaintenance: null, currentStatus: 'repair', fleet: 'OWNED' },
  { locomotiveId: 'L1002', model: 'DE10', manufacturingYear: 1999, operatingHours: 54000, lastMaintenance: '2025-11-02', currentStatus: 'active', fleet: 'OWNED' },
  { locomotiveId: 'L1003', model: 'DE10', manufacturingYear: 2004, operatingHours: 41000, lastMaintenance: '2026-03-15', currentStatus: 'active', fleet: 'OWNED' },
  { locomotiveId: 'L1004', model: 'DE10', manufacturingYear: 2010, operatingHours: 28000, lastMaintenance: '2026-06-20', currentStatus: 'maintenance', fleet: 'OWNED' },
  { locomotiveId: 'L1005', model: 'DE10', manufacturingYear: 2018, operatingHours: 9500, lastMaintenance: '2026-08-01', currentStatus: 'active', fleet: 'OWNED' },
  { locomotiveId: 'L2001', model: 'DE11', manufacturingYear: 1997, operatingHours: 58000, lastMaintenance: '2025-09-10', currentStatus: 'active', fleet: 'HIRED' },
  { locomotiveId: 'L2002', model: 'DE11', manufacturingYear: 2002, operatingHours: 47000, lastMaintenance: '2026-01-25', currentStatus: 'active', fleet: 'HIRED' },
  { locomotiveId: 'L2003', model: 'DE11', manufacturingYear: 2008, operatingHours: 33000, lastMaintenance: null, currentStatus: 'active', fleet: 'HIRED' },
  { locomotiveId: 'L2004', model: 'DE11', manufacturingYear: 2015, operatingHours: 15000, lastMaintenance: '2026-07-12', currentStatus: 'active', fleet: 'HIRED' },
  { locomotiveId: 'L2005', model: 'DE11', manufacturingYear: 2023, operatingHours: 2400, lastMaintenance: '2026-09-30', currentStatus: 'active', fleet: 'HIRED' },
  { locomotiveId: 'L3001', model: 'DE10', manufacturingYear: 1988, operatingHours: 71000, lastMaintenance: '2024-12-05', currentStatus: 'retired', fleet: 'OWNED' },
  { locomotiveId: 'L3002', model: 'DE11', manufacturingYear: 2012, operatingHours: 22000, lastMaintenance: '2026-05-18', currentStatus: 'repair', fleet: 'HIRED' },
];

export async function seed(knex: Knex): Promise<void> {
  // Clear existing data
  await knex('predictions').del();
  await knex('locomotives').del();

  const now = new Date().toISOString();

  await knex('locomotives').insert(
    locomotives.map(locomotive => ({
      id: uuidv4(),
      ...locomotive,
      createdAt: now,
      updatedAt: now,
    }))
  );
}
