/**
 * RedemptionWorkflow Tests
 *
 * Debit-on-redeem, lifecycle transitions, refunds, notification isolation
 * and applying fulfilled rewards to repairs.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import type { RewardsServices } from '../../../src/packages/adapters/rewards/index.js';
import type { IRepairTracker } from '../../../src/packages/core/ports/IRepairTracker.js';
import { SqliteRepairTracker } from '../../../src/packages/adapters/repairs/SqliteRepairTracker.js';
import {
  DependencyFailureError,
  DiscountAlreadyAppliedError,
  InsufficientPointsError,
  InvalidTransitionError,
  NotAssignedTechnicianError,
  NotFoundError,
  RedemptionNotFulfilledError,
  UnknownOptionError,
  ValidationError,
} from '../../../src/utils/errors.js';
import {
  TEST_SETTINGS,
  createTestDb,
  createTestServices,
  grantPoints,
  seedCustomer,
  seedOption,
  seedRepair,
  seedTechnician,
} from '../../helpers/db.js';

let db: Database.Database;
let services: RewardsServices;
let carWash: number;

async function customerMessages(customerId: string): Promise<string[]> {
  const inbox = await services.inbox?.listForRecipient({ type: 'customer', id: customerId });
  return (inbox ?? []).map((notification) => notification.message);
}

beforeEach(() => {
  db = createTestDb();
  services = createTestServices(db);
  seedCustomer(db, 'alice', 'Alice');
  carWash = seedOption(db, 'Car Wash', 500);
});

afterEach(() => {
  db.close();
});

describe('RedemptionWorkflow', () => {
  // ===========================================================================
  // redeem
  // ===========================================================================

  describe('redeem', () => {
    it('refuses when the balance is short and writes nothing', async () => {
      await services.points.ensureAccount('alice');

      const attempt = services.redemptions.redeem('alice', carWash);
      await expect(attempt).rejects.toBeInstanceOf(InsufficientPointsError);
      await expect(services.redemptions.redeem('alice', carWash))
        .rejects.toThrow('Not enough points. You need 500, but have 0.');
      expect(await services.redemptions.getRedemptionHistory('alice')).toEqual([]);
    });

    it('debits the price and assigns a technician', async () => {
      seedTechnician(db, 't1');
      await grantPoints(services, 'alice', 600);

      const redemption = await services.redemptions.redeem('alice', carWash);

      expect(redemption).toMatchObject({
        customerId: 'alice',
        rewardOptionId: carWash,
        rewardOptionName: 'Car Wash',
        pointsSpent: 500,
        status: 'assigned',
        assignedTechnicianId: 't1',
      });
      expect(await services.points.getBalance('alice')).toBe(100);

      const [debit] = await services.points.getLedger('alice', 1);
      expect(debit).toMatchObject({ entryType: 'redemption_debit', amount: -500, referenceId: redemption.id });
    });

    it('stays pending when no technician is available', async () => {
      await grantPoints(services, 'alice', 500);

      const redemption = await services.redemptions.redeem('alice', carWash);

      expect(redemption.status).toBe('pending');
      expect(redemption.assignedTechnicianId).toBeNull();
      expect(await services.points.getBalance('alice')).toBe(0);
    });

    it('stays pending when the repair tracker is unreachable', async () => {
      const mirror = new SqliteRepairTracker(db);
      const offline: IRepairTracker = {
        listTechnicians: async () => { throw new Error('timeout'); },
        countActiveJobs: (technicianId) => mirror.countActiveJobs(technicianId),
        getRepair: (repairId) => mirror.getRepair(repairId),
        applyDiscount: (repairId, discount, redemptionId) => mirror.applyDiscount(repairId, discount, redemptionId),
      };
      services = createTestServices(db, {}, { repairs: offline });
      await grantPoints(services, 'alice', 500);

      const redemption = await services.redemptions.redeem('alice', carWash);
      expect(redemption.status).toBe('pending');
    });

    it('rejects unknown, inactive and malformed options', async () => {
      await grantPoints(services, 'alice', 1000);
      const retired = seedOption(db, 'Retired Mug', 100, { isActive: false });

      await expect(services.redemptions.redeem('alice', 9999)).rejects.toBeInstanceOf(UnknownOptionError);
      await expect(services.redemptions.redeem('alice', retired)).rejects.toThrow(`Reward option not found: ${retired}`);
      await expect(services.redemptions.redeem('alice', 0)).rejects.toBeInstanceOf(ValidationError);
      expect(await services.points.getBalance('alice')).toBe(1000);
    });

    it('rejects unknown customers', async () => {
      await expect(services.redemptions.redeem('nobody', carWash)).rejects.toThrow('Customer not found: nobody');
    });

    it('keeps the price paid when the catalog price changes later', async () => {
      await grantPoints(services, 'alice', 600);
      const redemption = await services.redemptions.redeem('alice', carWash);

      await services.catalog.updateOption(carWash, { pointsRequired: 900 });

      expect((await services.redemptions.getRedemption(redemption.id))?.pointsSpent).toBe(500);
      await services.redemptions.reject(redemption.id, 'Discontinued');
      expect(await services.points.getBalance('alice')).toBe(600);
    });
  });

  // ===========================================================================
  // fulfill
  // ===========================================================================

  describe('fulfill', () => {
    beforeEach(async () => {
      seedTechnician(db, 't1');
      await grantPoints(services, 'alice', 600);
    });

    it('completes an assigned redemption and notifies the customer', async () => {
      const { id } = await services.redemptions.redeem('alice', carWash);

      const fulfilled = await services.redemptions.fulfill(id, 't1', 'Handed over at pickup');

      expect(fulfilled).toMatchObject({
        status: 'fulfilled',
        processedBy: 't1',
        notes: 'Handed over at pickup',
      });
      expect(fulfilled.fulfilledAt).not.toBeNull();
      expect(await customerMessages('alice')).toEqual(['Your reward "Car Wash" has been fulfilled.']);
    });

    it('cannot fulfill twice', async () => {
      const { id } = await services.redemptions.redeem('alice', carWash);
      await services.redemptions.fulfill(id, 't1');

      await expect(services.redemptions.fulfill(id, 't1')).rejects.toMatchObject({
        from: 'fulfilled',
        to: 'fulfilled',
      });
    });

    it('only lets the assigned technician or a manager fulfill', async () => {
      seedTechnician(db, 't2');
      seedTechnician(db, 'boss', { isManager: true });
      seedRepair(db, 'r-boss', 'boss');
      const { id, assignedTechnicianId } = await services.redemptions.redeem('alice', carWash);
      expect(assignedTechnicianId).toBe('t1');

      await expect(services.redemptions.fulfill(id, 't2')).rejects.toBeInstanceOf(NotAssignedTechnicianError);
      expect((await services.redemptions.fulfill(id, 'boss')).processedBy).toBe('boss');
    });

    it('rejects unknown and inactive technicians', async () => {
      seedTechnician(db, 'gone', { isActive: false });
      const { id } = await services.redemptions.redeem('alice', carWash);

      await expect(services.redemptions.fulfill(id, 'nobody')).rejects.toBeInstanceOf(NotFoundError);
      await expect(services.redemptions.fulfill(id, 'gone')).rejects.toThrow('Technician not found: gone');
    });

    it('requires assignment first unless unassigned fulfillment is allowed', async () => {
      db.prepare("UPDATE technicians SET is_active = 0 WHERE id = 't1'").run();
      const { id } = await services.redemptions.redeem('alice', carWash);
      db.prepare("UPDATE technicians SET is_active = 1 WHERE id = 't1'").run();

      await expect(services.redemptions.fulfill(id, 't1')).rejects.toBeInstanceOf(InvalidTransitionError);

      const lenient = createTestServices(db, {
        redemptions: { ...TEST_SETTINGS.redemptions, allowUnassignedFulfillment: true },
      });
      expect((await lenient.redemptions.fulfill(id, 't1')).status).toBe('fulfilled');
    });

    it('survives a failing notification sender', async () => {
      const notify = vi.fn().mockRejectedValue(new Error('smtp down'));
      services = createTestServices(db, {}, { notifier: { notify } });

      const { id, status } = await services.redemptions.redeem('alice', carWash);
      expect(status).toBe('assigned');

      const fulfilled = await services.redemptions.fulfill(id, 't1');
      expect(fulfilled.status).toBe('fulfilled');
      expect(notify).toHaveBeenCalledTimes(2);
    });
  });

  // ===========================================================================
  // reject
  // ===========================================================================

  describe('reject', () => {
    beforeEach(async () => {
      seedTechnician(db, 't1');
      await grantPoints(services, 'alice', 600);
    });

    it('refunds the points and tells the customer why', async () => {
      const { id } = await services.redemptions.redeem('alice', carWash);

      const rejected = await services.redemptions.reject(id, '  Out of stock  ', 'ops');

      expect(rejected).toMatchObject({ status: 'rejected', rejectionReason: 'Out of stock', processedBy: 'ops' });
      expect(await services.points.getBalance('alice')).toBe(600);

      const [refund] = await services.points.getLedger('alice', 1);
      expect(refund).toMatchObject({ entryType: 'redemption_refund', amount: 500, referenceId: id });
      expect(await customerMessages('alice')).toEqual([
        'Your reward "Car Wash" could not be provided: Out of stock. 500 points have been returned to your balance.',
      ]);
    });

    it('keeps the points when refunds are disabled', async () => {
      services = createTestServices(db, {
        redemptions: { ...TEST_SETTINGS.redemptions, refundOnReject: false },
      });
      const { id } = await services.redemptions.redeem('alice', carWash);

      await services.redemptions.reject(id, 'Fraud review');

      expect(await services.points.getBalance('alice')).toBe(100);
      expect(await customerMessages('alice')).toEqual(['Your reward "Car Wash" could not be provided: Fraud review.']);
    });

    it('can reject a pending redemption', async () => {
      db.prepare("UPDATE technicians SET is_active = 0 WHERE id = 't1'").run();
      const { id, status } = await services.redemptions.redeem('alice', carWash);
      expect(status).toBe('pending');

      expect((await services.redemptions.reject(id, 'Duplicate request')).status).toBe('rejected');
    });

    it('cannot reject a fulfilled or already rejected redemption', async () => {
      const first = await services.redemptions.redeem('alice', carWash);
      await services.redemptions.fulfill(first.id, 't1');
      await expect(services.redemptions.reject(first.id, 'Too late')).rejects.toBeInstanceOf(InvalidTransitionError);

      await grantPoints(services, 'alice', 500);
      const second = await services.redemptions.redeem('alice', carWash);
      await services.redemptions.reject(second.id, 'Out of stock');
      await expect(services.redemptions.reject(second.id, 'Again')).rejects.toBeInstanceOf(InvalidTransitionError);
      // refunded exactly once
      expect(await services.points.getBalance('alice')).toBe(600);
    });

    it('requires a reason', async () => {
      const { id } = await services.redemptions.redeem('alice', carWash);
      await expect(services.redemptions.reject(id, '   ')).rejects.toMatchObject({ field: 'reason' });
    });

    it('rejects unknown redemptions', async () => {
      await expect(services.redemptions.reject('missing', 'No such thing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  // ===========================================================================
  // applyToRepair
  // ===========================================================================

  describe('applyToRepair', () => {
    let halfOff: number;
    let donuts: number;

    beforeEach(async () => {
      seedTechnician(db, 't1');
      seedRepair(db, 'rep-1', 't1', { costCents: 8000, customerId: 'alice' });
      seedRepair(db, 'rep-2', 't1', { costCents: 8000, customerId: 'alice' });

      const discount = await services.catalog.createRewardType({
        name: 'Repair Discount',
        category: 'REPAIR_DISCOUNT',
        discountKind: 'PERCENTAGE',
        discountValue: 50,
      });
      const treats = await services.catalog.createRewardType({ name: 'Treats', category: 'MERCHANDISE' });
      halfOff = (await services.catalog.createOption({ name: 'Half Off', pointsRequired: 2000, rewardTypeId: discount.id })).id;
      donuts = (await services.catalog.createOption({ name: 'Donuts', pointsRequired: 1500, rewardTypeId: treats.id })).id;

      await grantPoints(services, 'alice', 10000);
    });

    async function fulfilled(optionId: number): Promise<string> {
      const { id } = await services.redemptions.redeem('alice', optionId);
      await services.redemptions.fulfill(id, 't1');
      return id;
    }

    it('applies a percentage discount to the repair', async () => {
      const id = await fulfilled(halfOff);

      const discount = await services.redemptions.applyToRepair(id, 'rep-1');

      expect(discount).toEqual({
        originalCents: 8000,
        finalCents: 4000,
        savingsCents: 4000,
        discountApplied: true,
        description: '50% off',
      });
      expect(await services.repairs.getRepair('rep-1')).toMatchObject({ discountCents: 4000, appliedRedemptionId: id });
      expect((await services.redemptions.getRedemption(id))?.appliedToRepairId).toBe('rep-1');
    });

    it('applies each redemption and each repair at most once', async () => {
      const first = await fulfilled(halfOff);
      const second = await fulfilled(halfOff);
      await services.redemptions.applyToRepair(first, 'rep-1');

      await expect(services.redemptions.applyToRepair(first, 'rep-2')).rejects.toBeInstanceOf(DiscountAlreadyAppliedError);
      await expect(services.redemptions.applyToRepair(second, 'rep-1'))
        .rejects.toThrow('Repair rep-1 already carries a reward discount');
      expect((await services.redemptions.getRedemption(second))?.appliedToRepairId).toBeNull();
    });

    it('discounts only one repair when one redemption is applied concurrently', async () => {
      const id = await fulfilled(halfOff);

      const [first, second] = await Promise.allSettled([
        services.redemptions.applyToRepair(id, 'rep-1'),
        services.redemptions.applyToRepair(id, 'rep-2'),
      ]);

      expect(first.status).toBe('fulfilled');
      expect(second.status).toBe('rejected');
      if (second.status === 'rejected') {
        expect(second.reason).toBeInstanceOf(DiscountAlreadyAppliedError);
      }
      expect(await services.repairs.getRepair('rep-1')).toMatchObject({ discountCents: 4000, appliedRedemptionId: id });
      expect(await services.repairs.getRepair('rep-2')).toMatchObject({ discountCents: 0, appliedRedemptionId: null });
      expect((await services.redemptions.getRedemption(id))?.appliedToRepairId).toBe('rep-1');
    });

    it('returns a zero result for merchandise without touching the repair', async () => {
      const id = await fulfilled(donuts);

      const discount = await services.redemptions.applyToRepair(id, 'rep-1');

      expect(discount).toEqual({
        originalCents: 8000,
        finalCents: 8000,
        savingsCents: 0,
        discountApplied: false,
        description: 'No discount',
      });
      expect((await services.repairs.getRepair('rep-1'))?.appliedRedemptionId).toBeNull();
      expect((await services.redemptions.getRedemption(id))?.appliedToRepairId).toBeNull();
    });

    it('only applies fulfilled redemptions', async () => {
      const { id } = await services.redemptions.redeem('alice', halfOff);

      await expect(services.redemptions.applyToRepair(id, 'rep-1')).rejects.toBeInstanceOf(RedemptionNotFulfilledError);
      await expect(services.redemptions.applyToRepair(id, 'rep-1')).rejects.toMatchObject({ details: { status: 'assigned' } });
    });

    it('rejects unknown repairs', async () => {
      const id = await fulfilled(halfOff);
      await expect(services.redemptions.applyToRepair(id, 'rep-404')).rejects.toThrow('Repair not found: rep-404');
    });

    it('wraps tracker failures and records nothing', async () => {
      const id = await fulfilled(halfOff);
      const mirror = new SqliteRepairTracker(db);
      const failing: IRepairTracker = {
        listTechnicians: () => mirror.listTechnicians(),
        countActiveJobs: (technicianId) => mirror.countActiveJobs(technicianId),
        getRepair: (repairId) => mirror.getRepair(repairId),
        applyDiscount: async () => { throw new Error('tracker offline'); },
      };
      const withFailingTracker = createTestServices(db, {}, { repairs: failing });

      await expect(withFailingTracker.redemptions.applyToRepair(id, 'rep-1')).rejects.toBeInstanceOf(DependencyFailureError);
      expect((await services.redemptions.getRedemption(id))?.appliedToRepairId).toBeNull();

      await services.redemptions.applyToRepair(id, 'rep-2');
      expect((await services.redemptions.getRedemption(id))?.appliedToRepairId).toBe('rep-2');
    });
  });

  // ===========================================================================
  // Queries
  // ===========================================================================

  describe('queries', () => {
    beforeEach(async () => {
      await grantPoints(services, 'alice', 5000);
    });

    it('lists a customer history newest first with an optional limit', async () => {
      const first = await services.redemptions.redeem('alice', carWash);
      const second = await services.redemptions.redeem('alice', carWash);
      const third = await services.redemptions.redeem('alice', carWash);

      expect((await services.redemptions.getRedemptionHistory('alice')).map((r) => r.id))
        .toEqual([third.id, second.id, first.id]);
      expect((await services.redemptions.getRedemptionHistory('alice', 2)).map((r) => r.id))
        .toEqual([third.id, second.id]);
    });

    it('lists pending redemptions oldest first', async () => {
      const first = await services.redemptions.redeem('alice', carWash);
      const second = await services.redemptions.redeem('alice', carWash);

      expect((await services.redemptions.getPendingRedemptions()).map((r) => r.id)).toEqual([first.id, second.id]);
    });

    it('lists the open redemptions assigned to a technician', async () => {
      seedTechnician(db, 't1');
      const open = await services.redemptions.redeem('alice', carWash);
      const done = await services.redemptions.redeem('alice', carWash);
      await services.redemptions.fulfill(done.id, 't1');

      expect((await services.redemptions.getTechnicianRedemptions('t1')).map((r) => r.id)).toEqual([open.id]);
      expect(await services.redemptions.getTechnicianRedemptions('t2')).toEqual([]);
    });
  });
});
