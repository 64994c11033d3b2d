/**
 * Redemption lifecycle table.
 *
 * pending → fulfilled is only reachable when unassigned fulfillment is
 * enabled; every other edge is fixed.
 *
 * @module packages/core/rewards/redemption-states
 */

import type { RedemptionStatus } from '../ports/IRedemptionWorkflow.js';

export const REDEMPTION_STATUSES: readonly RedemptionStatus[] = ['pending', 'assigned', 'fulfilled', 'rejected'];

const VALID_TRANSITIONS: Record<RedemptionStatus, readonly RedemptionStatus[]> = {
  pending: ['assigned', 'rejected'],
  assigned: ['fulfilled', 'rejected'],
  fulfilled: [],
  rejected: [],
};

export interface TransitionPolicy {
  allowUnassignedFulfillment: boolean;
}

export function canTransition(from: RedemptionStatus, to: RedemptionStatus, policy: TransitionPolicy): boolean {
  if (from === 'pending' && to === 'fulfilled') {
    return policy.allowUnassignedFulfillment;
  }
  return VALID_TRANSITIONS[from].includes(to);
}

/** Statuses from which `to` may be entered under the policy */
export function sourcesFor(to: RedemptionStatus, policy: TransitionPolicy): RedemptionStatus[] {
  return REDEMPTION_STATUSES.filter((from) => canTransition(from, to, policy));
}
