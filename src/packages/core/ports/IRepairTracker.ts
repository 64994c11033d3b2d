/**
 * Repair Tracking Collaborator Port
 *
 * The rewards core reads technician workload and writes redemption
 * discounts through this port; the repair queue itself is owned elsewhere.
 *
 * @module packages/core/ports/IRepairTracker
 */

import type { DiscountResult } from '../rewards/discount.js';

export type RepairQueueStatus =
  | 'REQUESTED'
  | 'PENDING'
  | 'APPROVED'
  | 'IN_PROGRESS'
  | 'COMPLETED'
  | 'DENIED';

/** Queue states that do not count toward a technician's workload */
export const CLOSED_REPAIR_STATUSES: readonly RepairQueueStatus[] = ['COMPLETED', 'DENIED'];

export interface Technician {
  id: string;
  name: string;
  isManager: boolean;
  isActive: boolean;
}

export interface Repair {
  id: string;
  technicianId: string;
  customerId: string | null;
  unitNumber: string;
  queueStatus: RepairQueueStatus;
  costCents: number;
  discountCents: number;
  appliedRedemptionId: string | null;
}

export interface IRepairTracker {
  /** Active technicians, id ascending */
  listTechnicians(): Promise<Technician[]>;

  /** Repairs assigned to the technician that are not COMPLETED or DENIED */
  countActiveJobs(technicianId: string): Promise<number>;

  getRepair(repairId: string): Promise<Repair | null>;

  /** Record a redemption discount against a repair. Throws if the repair already carries one. */
  applyDiscount(repairId: string, discount: DiscountResult, redemptionId: string): Promise<Repair>;
}
