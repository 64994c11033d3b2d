import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { CustomerDirectory } from '../../../src/packages/adapters/rewards/CustomerDirectory.js';
import { NotFoundError, ValidationError } from '../../../src/utils/errors.js';
import { createTestDb } from '../../helpers/db.js';

let db: Database.Database;
let customers: CustomerDirectory;

beforeEach(() => {
  db = createTestDb();
  customers = new CustomerDirectory(db);
});

afterEach(() => {
  db.close();
});

describe('CustomerDirectory', () => {
  it('stores names lowercase and emails normalised', async () => {
    const customer = await customers.createCustomer({
      id: 'cust-1',
      name: '  Jane Doe ',
      email: 'Jane@Example.COM',
      phone: '555-0100',
    });

    expect(customer).toMatchObject({
      id: 'cust-1',
      name: 'jane doe',
      email: 'jane@example.com',
      phone: '555-0100',
    });
    expect(await customers.getCustomer('cust-1')).toEqual(customer);
  });

  it('generates an id when none is supplied', async () => {
    const customer = await customers.createCustomer({ name: 'Sam' });
    expect(customer.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(customer.email).toBeNull();
  });

  it('rejects duplicate ids and emails', async () => {
    await customers.createCustomer({ id: 'cust-1', name: 'Jane', email: 'jane@example.com' });

    await expect(customers.createCustomer({ id: 'cust-1', name: 'Other' }))
      .rejects.toThrow('Customer already exists: cust-1');
    await expect(customers.createCustomer({ id: 'cust-2', name: 'Other', email: 'JANE@example.com' }))
      .rejects.toMatchObject({ field: 'email', message: 'Email is already registered' });
  });

  it('validates input', async () => {
    await expect(customers.createCustomer({ name: '   ' })).rejects.toBeInstanceOf(ValidationError);
    await expect(customers.createCustomer({ name: 'Jane', email: 'not-an-email' }))
      .rejects.toMatchObject({ field: 'email' });
  });

  it('distinguishes get from require', async () => {
    expect(await customers.getCustomer('nobody')).toBeNull();
    await expect(customers.requireCustomer('nobody')).rejects.toBeInstanceOf(NotFoundError);
  });
});
