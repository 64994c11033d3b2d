/**
 * SqliteRepairTracker — Local Mirror of the Repair Queue
 *
 * Default IRepairTracker over the technicians and repairs tables. The
 * roster and queue are pushed here by the repair-tracking subsystem
 * through the admin API.
 *
 * @module packages/adapters/repairs/SqliteRepairTracker
 */

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  IRepairTracker,
  Repair,
  RepairQueueStatus,
  Technician,
} from '../../core/ports/IRepairTracker.js';
import type { DiscountResult } from '../../core/rewards/discount.js';
import { DiscountAlreadyAppliedError, NotFoundError, ValidationError } from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';
import { parseOrThrow } from '../../../utils/validation.js';

const log = createChildLogger({ module: 'SqliteRepairTracker' });

// =============================================================================
// Input Schemas
// =============================================================================

export const REPAIR_QUEUE_STATUSES = [
  'REQUESTED',
  'PENDING',
  'APPROVED',
  'IN_PROGRESS',
  'COMPLETED',
  'DENIED',
] as const;

export const technicianInputSchema = z.object({
  name: z.string().trim().min(1).max(200),
  isManager: z.boolean().default(false),
  isActive: z.boolean().default(true),
});

export const repairInputSchema = z.object({
  id: z.string().trim().min(1).max(64).optional(),
  technicianId: z.string().min(1),
  customerId: z.string().min(1).nullable().default(null),
  unitNumber: z.string().trim().min(1).max(50),
  queueStatus: z.enum(REPAIR_QUEUE_STATUSES).default('PENDING'),
  costCents: z.number().int().min(0).default(0),
});

// =============================================================================
// Row Types
// =============================================================================

interface TechnicianRow {
  id: string;
  name: string;
  is_manager: number;
  is_active: number;
}

interface RepairRow {
  id: string;
  technician_id: string;
  customer_id: string | null;
  unit_number: string;
  queue_status: RepairQueueStatus;
  cost_cents: number;
  discount_cents: number;
  applied_redemption_id: string | null;
}

function rowToTechnician(row: TechnicianRow): Technician {
  return {
    id: row.id,
    name: row.name,
    isManager: row.is_manager === 1,
    isActive: row.is_active === 1,
  };
}

function rowToRepair(row: RepairRow): Repair {
  return {
    id: row.id,
    technicianId: row.technician_id,
    customerId: row.customer_id,
    unitNumber: row.unit_number,
    queueStatus: row.queue_status,
    costCents: row.cost_cents,
    discountCents: row.discount_cents,
    appliedRedemptionId: row.applied_redemption_id,
  };
}

// =============================================================================
// Implementation
// =============================================================================

export class SqliteRepairTracker implements IRepairTracker {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async listTechnicians(): Promise<Technician[]> {
    return this.db.prepare<[], TechnicianRow>(
      'SELECT * FROM technicians WHERE is_active = 1 ORDER BY id ASC'
    ).all().map(rowToTechnician);
  }

  async countActiveJobs(technicianId: string): Promise<number> {
    const row = this.db.prepare<[string], { count: number }>(`
      SELECT COUNT(*) AS count FROM repairs
      WHERE technician_id = ? AND queue_status NOT IN ('COMPLETED', 'DENIED')
    `).get(technicianId);
    return row?.count ?? 0;
  }

  async getRepair(repairId: string): Promise<Repair | null> {
    const row = this.findRepair(repairId);
    return row ? rowToRepair(row) : null;
  }

  async applyDiscount(repairId: string, discount: DiscountResult, redemptionId: string): Promise<Repair> {
    const repair = this.db.transaction((): Repair => {
      const current = this.findRepair(repairId);
      if (!current) {
        throw new NotFoundError('Repair', repairId);
      }
      if (discount.originalCents !== current.cost_cents) {
        throw new ValidationError(
          `Discount computed for ${discount.originalCents} cents but repair costs ${current.cost_cents}`,
          'discount'
        );
      }

      const info = this.db.prepare<[number, string, string]>(`
        UPDATE repairs SET discount_cents = ?, applied_redemption_id = ?
        WHERE id = ? AND applied_redemption_id IS NULL
      `).run(discount.savingsCents, redemptionId, repairId);
      if (info.changes === 0) {
        throw new DiscountAlreadyAppliedError(`Repair ${repairId} already carries a reward discount`);
      }

      const updated = this.findRepair(repairId);
      if (!updated) {
        throw new NotFoundError('Repair', repairId);
      }
      return rowToRepair(updated);
    }).immediate();

    log.info({
      event: 'repair.discount.applied',
      repairId,
      redemptionId,
      savingsCents: discount.savingsCents,
    }, 'Reward discount applied to repair');
    return repair;
  }

  // ---------------------------------------------------------------------------
  // Roster and queue sync
  // ---------------------------------------------------------------------------

  async upsertTechnician(technicianId: string, input: unknown): Promise<Technician> {
    const parsed = parseOrThrow(technicianInputSchema, input);
    const row = this.db.prepare<[string, string, number, number], TechnicianRow>(`
      INSERT INTO technicians (id, name, is_manager, is_active)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        is_manager = excluded.is_manager,
        is_active = excluded.is_active
      RETURNING id, name, is_manager, is_active
    `).get(technicianId, parsed.name, parsed.isManager ? 1 : 0, parsed.isActive ? 1 : 0);

    if (!row) {
      throw new NotFoundError('Technician', technicianId);
    }
    log.info({ event: 'technician.synced', technicianId, isActive: parsed.isActive }, 'Technician synced');
    return rowToTechnician(row);
  }

  async recordRepair(input: unknown): Promise<Repair> {
    const parsed = parseOrThrow(repairInputSchema, input);
    const id = parsed.id ?? randomUUID();

    const repair = this.db.transaction((): Repair => {
      const exists = (table: 'technicians' | 'customers', rowId: string) =>
        this.db.prepare<[string], { id: string }>(`SELECT id FROM ${table} WHERE id = ?`).get(rowId) !== undefined;

      if (!exists('technicians', parsed.technicianId)) {
        throw new ValidationError(`Unknown technician: ${parsed.technicianId}`, 'technicianId');
      }
      if (parsed.customerId !== null && !exists('customers', parsed.customerId)) {
        throw new ValidationError(`Unknown customer: ${parsed.customerId}`, 'customerId');
      }
      if (this.findRepair(id)) {
        throw new ValidationError(`Repair already exists: ${id}`, 'id');
      }

      const row = this.db.prepare<[string, string, string | null, string, RepairQueueStatus, number], RepairRow>(`
        INSERT INTO repairs (id, technician_id, customer_id, unit_number, queue_status, cost_cents)
        VALUES (?, ?, ?, ?, ?, ?)
        RETURNING id, technician_id, customer_id, unit_number, queue_status, cost_cents, discount_cents, applied_redemption_id
      `).get(id, parsed.technicianId, parsed.customerId, parsed.unitNumber, parsed.queueStatus, parsed.costCents);
      if (!row) {
        throw new NotFoundError('Repair', id);
      }
      return rowToRepair(row);
    }).immediate();

    log.info({ event: 'repair.recorded', repairId: id, technicianId: parsed.technicianId }, 'Repair recorded');
    return repair;
  }

  async updateQueueStatus(repairId: string, status: unknown): Promise<Repair> {
    const queueStatus = parseOrThrow(z.enum(REPAIR_QUEUE_STATUSES), status);
    const info = this.db.prepare<[RepairQueueStatus, string]>(
      'UPDATE repairs SET queue_status = ? WHERE id = ?'
    ).run(queueStatus, repairId);
    if (info.changes === 0) {
      throw new NotFoundError('Repair', repairId);
    }

    const row = this.findRepair(repairId);
    if (!row) {
      throw new NotFoundError('Repair', repairId);
    }
    return rowToRepair(row);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private findRepair(repairId: string): RepairRow | undefined {
    return this.db.prepare<[string], RepairRow>(`
      SELECT id, technician_id, customer_id, unit_number, queue_status, cost_cents, discount_cents, applied_redemption_id
      FROM repairs WHERE id = ?
    `).get(repairId);
  }
}
