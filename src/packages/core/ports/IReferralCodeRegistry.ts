/**
 * Referral Code Port
 *
 * Issues one shareable code per customer and resolves codes back to owners.
 *
 * @module packages/core/ports/IReferralCodeRegistry
 */

import type { UpsertResult } from './UpsertResult.js';

export interface ReferralCode {
  id: string;
  customerId: string;
  /** Uppercase letters and digits, fixed length */
  code: string;
  createdAt: string;
}

export interface IReferralCodeRegistry {
  /**
   * Return the customer's code, generating one on first request.
   * Throws ExhaustedRetriesError if no collision-free code is found
   * within the configured attempt bound.
   */
  getOrCreateCode(customerId: string): Promise<UpsertResult<ReferralCode>>;

  getCodeForCustomer(customerId: string): Promise<ReferralCode | null>;

  /** Exact, case-sensitive lookup. Throws NotFoundError. */
  validate(code: string): Promise<ReferralCode>;
}
