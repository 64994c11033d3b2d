/**
 * CustomerDirectory — Customer Records
 *
 * Names are stored lowercase; emails are optional but unique.
 *
 * @module packages/adapters/rewards/CustomerDirectory
 */

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { Customer, ICustomerDirectory, NewCustomer } from '../../core/ports/ICustomerDirectory.js';
import { NotFoundError, ValidationError } from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';
import { parseOrThrow } from '../../../utils/validation.js';

const log = createChildLogger({ module: 'CustomerDirectory' });

// =============================================================================
// Row Types
// =============================================================================

interface CustomerRow {
  id: string;
  name: string;
  email: string | null;
  phone: string | null;
  created_at: string;
}

// =============================================================================
// Helpers
// =============================================================================

export const newCustomerSchema = z.object({
  id: z.string().trim().min(1).max(64).optional(),
  name: z.string().trim().min(1).max(200),
  email: z.string().trim().toLowerCase().email().nullish(),
  phone: z.string().trim().min(1).max(32).nullish(),
});

function rowToCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    createdAt: row.created_at,
  };
}

// =============================================================================
// Implementation
// =============================================================================

export class CustomerDirectory implements ICustomerDirectory {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async createCustomer(input: NewCustomer): Promise<Customer> {
    const parsed = parseOrThrow(newCustomerSchema, input);
    const id = parsed.id ?? randomUUID();
    const email = parsed.email ?? null;

    const row = this.db.transaction((): CustomerRow => {
      if (this.findRow(id)) {
        throw new ValidationError(`Customer already exists: ${id}`, 'id');
      }
      if (email !== null) {
        const taken = this.db.prepare<[string], { id: string }>(
          'SELECT id FROM customers WHERE email = ?'
        ).get(email);
        if (taken) {
          throw new ValidationError('Email is already registered', 'email');
        }
      }

      const inserted = this.db.prepare<[string, string, string | null, string | null], CustomerRow>(`
        INSERT INTO customers (id, name, email, phone)
        VALUES (?, ?, ?, ?)
        RETURNING *
      `).get(id, parsed.name.toLowerCase(), email, parsed.phone ?? null);

      if (!inserted) {
        throw new Error(`Customer insert returned no row: ${id}`);
      }
      return inserted;
    }).immediate();

    log.info({ event: 'customer.created', customerId: row.id }, 'Customer created');
    return rowToCustomer(row);
  }

  async getCustomer(customerId: string): Promise<Customer | null> {
    const row = this.findRow(customerId);
    return row ? rowToCustomer(row) : null;
  }

  async requireCustomer(customerId: string): Promise<Customer> {
    const customer = await this.getCustomer(customerId);
    if (!customer) {
      throw new NotFoundError('Customer', customerId);
    }
    return customer;
  }

  private findRow(customerId: string): CustomerRow | undefined {
    return this.db.prepare<[string], CustomerRow>(
      'SELECT * FROM customers WHERE id = ?'
    ).get(customerId);
  }
}
