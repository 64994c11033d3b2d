/**
 * Workload Balancing Port
 *
 * @module packages/core/ports/ITechnicianAssigner
 */

import type { Technician } from './IRepairTracker.js';

export interface ITechnicianAssigner {
  /**
   * Assign a pending redemption to the active technician with the fewest
   * active jobs (lowest id on ties). Returns null, leaving the redemption
   * pending, when no technician is available.
   */
  assign(redemptionId: string): Promise<Technician | null>;
}
