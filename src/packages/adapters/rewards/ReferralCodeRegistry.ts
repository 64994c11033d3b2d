/**
 * ReferralCodeRegistry — Referral Code Issuance
 *
 * One code per customer, drawn uniformly from A-Z0-9 at a configured
 * length. Generation retries on collision up to a bound, then fails with
 * ExhaustedRetriesError instead of looping.
 *
 * @module packages/adapters/rewards/ReferralCodeRegistry
 */

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import type { IReferralCodeRegistry, ReferralCode } from '../../core/ports/IReferralCodeRegistry.js';
import type { UpsertResult } from '../../core/ports/UpsertResult.js';
import { generateReferralCode, type RandomIndex } from '../../core/rewards/referral-code.js';
import { ExhaustedRetriesError, NotFoundError } from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';

const log = createChildLogger({ module: 'ReferralCodeRegistry' });

export interface ReferralCodeRegistryOptions {
  codeLength: number;
  maxAttempts: number;
  /** Override the random source (tests) */
  randomIndex?: RandomIndex;
}

// =============================================================================
// Row Types
// =============================================================================

interface CodeRow {
  id: string;
  customer_id: string;
  code: string;
  created_at: string;
}

function rowToCode(row: CodeRow): ReferralCode {
  return {
    id: row.id,
    customerId: row.customer_id,
    code: row.code,
    createdAt: row.created_at,
  };
}

// =============================================================================
// Implementation
// =============================================================================

export class ReferralCodeRegistry implements IReferralCodeRegistry {
  private db: Database.Database;
  private options: ReferralCodeRegistryOptions;

  constructor(db: Database.Database, options: ReferralCodeRegistryOptions) {
    this.db = db;
    this.options = options;
  }

  async getOrCreateCode(customerId: string): Promise<UpsertResult<ReferralCode>> {
    const result = this.db.transaction((): UpsertResult<ReferralCode> => {
      const existing = this.findByCustomer(customerId);
      if (existing) {
        return { outcome: 'existing', value: rowToCode(existing) };
      }

      const customer = this.db.prepare<[string], { id: string }>(
        'SELECT id FROM customers WHERE id = ?'
      ).get(customerId);
      if (!customer) {
        throw new NotFoundError('Customer', customerId);
      }

      const code = this.generateUniqueCode();
      const info = this.db.prepare<[string, string, string]>(`
        INSERT INTO referral_codes (id, customer_id, code)
        VALUES (?, ?, ?)
        ON CONFLICT(customer_id) DO NOTHING
      `).run(randomUUID(), customerId, code);

      const row = this.findByCustomer(customerId);
      if (!row) {
        throw new NotFoundError('Referral code for customer', customerId);
      }
      return { outcome: info.changes > 0 ? 'created' : 'existing', value: rowToCode(row) };
    }).immediate();

    if (result.outcome === 'created') {
      log.info(
        { event: 'referral.code.created', customerId, codeId: result.value.id },
        'Referral code created'
      );
    }
    return result;
  }

  async getCodeForCustomer(customerId: string): Promise<ReferralCode | null> {
    const row = this.findByCustomer(customerId);
    return row ? rowToCode(row) : null;
  }

  async validate(code: string): Promise<ReferralCode> {
    const row = this.db.prepare<[string], CodeRow>(
      'SELECT * FROM referral_codes WHERE code = ?'
    ).get(code);
    if (!row) {
      throw new NotFoundError('Referral code', code);
    }
    return rowToCode(row);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private findByCustomer(customerId: string): CodeRow | undefined {
    return this.db.prepare<[string], CodeRow>(
      'SELECT * FROM referral_codes WHERE customer_id = ?'
    ).get(customerId);
  }

  private generateUniqueCode(): string {
    const taken = this.db.prepare<[string], { found: number }>(
      'SELECT 1 AS found FROM referral_codes WHERE code = ?'
    );

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const code = generateReferralCode(this.options.codeLength, this.options.randomIndex);
      if (!taken.get(code)) {
        return code;
      }
      log.debug({ event: 'referral.code.collision', attempt }, 'Referral code collision, retrying');
    }

    log.error(
      { event: 'referral.code.exhausted', attempts: this.options.maxAttempts },
      'Referral code generation exhausted retries'
    );
    throw new ExhaustedRetriesError(this.options.maxAttempts);
  }
}
