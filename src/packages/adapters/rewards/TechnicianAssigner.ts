/**
 * TechnicianAssigner — Workload-Balanced Assignment
 *
 * Picks the active technician with the fewest open repair jobs. Ties go to
 * the lowest technician id, so the choice is deterministic for a given
 * roster and workload.
 *
 * @module packages/adapters/rewards/TechnicianAssigner
 */

import type Database from 'better-sqlite3';
import type { INotificationSender } from '../../core/ports/INotificationSender.js';
import type { IRepairTracker, Technician } from '../../core/ports/IRepairTracker.js';
import type { ITechnicianAssigner } from '../../core/ports/ITechnicianAssigner.js';
import type { RedemptionStatus } from '../../core/ports/IRedemptionWorkflow.js';
import { notifySafely } from '../notifications/dispatch.js';
import {
  AppError,
  DependencyFailureError,
  InvalidTransitionError,
  NotFoundError,
  errorMessage,
} from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';

const log = createChildLogger({ module: 'TechnicianAssigner' });

interface AssignmentRow {
  reward_option_name: string;
  customer_name: string;
}

function byId(a: Technician, b: Technician): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

export class TechnicianAssigner implements ITechnicianAssigner {
  private db: Database.Database;
  private repairs: IRepairTracker;
  private notifier: INotificationSender;

  constructor(db: Database.Database, repairs: IRepairTracker, notifier: INotificationSender) {
    this.db = db;
    this.repairs = repairs;
    this.notifier = notifier;
  }

  async assign(redemptionId: string): Promise<Technician | null> {
    const technician = await this.pickLeastLoaded();
    if (!technician) {
      log.warn({ event: 'redemption.assign.no_technician', redemptionId }, 'No active technician available; redemption stays pending');
      return null;
    }

    const details = this.db.transaction((): AssignmentRow => {
      const info = this.db.prepare<[string, string]>(`
        UPDATE redemptions
        SET status = 'assigned', assigned_technician_id = ?, assigned_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        WHERE id = ? AND status = 'pending'
      `).run(technician.id, redemptionId);

      if (info.changes === 0) {
        const current = this.db.prepare<[string], { status: RedemptionStatus }>(
          'SELECT status FROM redemptions WHERE id = ?'
        ).get(redemptionId);
        if (!current) {
          throw new NotFoundError('Redemption', redemptionId);
        }
        throw new InvalidTransitionError(redemptionId, current.status, 'assigned');
      }

      const row = this.db.prepare<[string], AssignmentRow>(`
        SELECT o.name AS reward_option_name, c.name AS customer_name
        FROM redemptions r
        JOIN reward_options o ON o.id = r.reward_option_id
        JOIN customers c ON c.id = r.customer_id
        WHERE r.id = ?
      `).get(redemptionId);
      if (!row) {
        throw new NotFoundError('Redemption', redemptionId);
      }
      return row;
    }).immediate();

    log.info({ event: 'redemption.assigned', redemptionId, technicianId: technician.id }, 'Redemption assigned to technician');

    await notifySafely(this.notifier, {
      recipient: { type: 'technician', id: technician.id },
      message: `New reward redemption to fulfill: ${details.reward_option_name} for ${details.customer_name}`,
      redemptionId,
    });

    return technician;
  }

  private async pickLeastLoaded(): Promise<Technician | null> {
    try {
      const roster = (await this.repairs.listTechnicians())
        .filter((technician) => technician.isActive)
        .sort(byId);

      let best: { technician: Technician; load: number } | null = null;
      for (const technician of roster) {
        const load = await this.repairs.countActiveJobs(technician.id);
        if (best === null || load < best.load) {
          best = { technician, load };
        }
      }
      return best?.technician ?? null;
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new DependencyFailureError('repair-tracker', errorMessage(error));
    }
  }
}
