import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { RewardsServices } from '../../../src/packages/adapters/rewards/index.js';
import type { IRepairTracker } from '../../../src/packages/core/ports/IRepairTracker.js';
import { SqliteRepairTracker } from '../../../src/packages/adapters/repairs/SqliteRepairTracker.js';
import { DependencyFailureError, InvalidTransitionError, NotFoundError } from '../../../src/utils/errors.js';
import {
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
let optionId: number;

/** Redeem while the roster is empty so the redemption stays pending */
async function pendingRedemption(): Promise<string> {
  const redemption = await services.redemptions.redeem('alice', optionId);
  expect(redemption.status).toBe('pending');
  return redemption.id;
}

beforeEach(async () => {
  db = createTestDb();
  services = createTestServices(db);
  seedCustomer(db, 'alice', 'Alice');
  optionId = seedOption(db, 'Car Wash', 500);
  await grantPoints(services, 'alice', 5000);
});

afterEach(() => {
  db.close();
});

describe('TechnicianAssigner', () => {
  it('returns null and leaves the redemption pending when nobody is on the roster', async () => {
    const id = await pendingRedemption();

    expect(await services.assigner.assign(id)).toBeNull();
    expect((await services.redemptions.getRedemption(id))?.status).toBe('pending');
  });

  it('picks the active technician with the fewest open jobs', async () => {
    const id = await pendingRedemption();
    seedTechnician(db, 't1');
    seedTechnician(db, 't2');
    seedTechnician(db, 't3', { isActive: false });
    seedRepair(db, 'r1', 't1');
    seedRepair(db, 'r2', 't1', { status: 'APPROVED' });
    seedRepair(db, 'r3', 't2');
    seedRepair(db, 'r4', 't2', { status: 'COMPLETED' });
    seedRepair(db, 'r5', 't2', { status: 'COMPLETED' });
    seedRepair(db, 'r6', 't2', { status: 'DENIED' });

    const technician = await services.assigner.assign(id);

    expect(technician?.id).toBe('t2');
    const redemption = await services.redemptions.getRedemption(id);
    expect(redemption?.status).toBe('assigned');
    expect(redemption?.assignedTechnicianId).toBe('t2');
    expect(redemption?.assignedAt).not.toBeNull();
  });

  it('breaks ties by lowest technician id', async () => {
    const id = await pendingRedemption();
    seedTechnician(db, 'tech-b');
    seedTechnician(db, 'tech-a');

    expect((await services.assigner.assign(id))?.id).toBe('tech-a');
  });

  it('notifies the chosen technician', async () => {
    const id = await pendingRedemption();
    seedTechnician(db, 't1');
    await services.assigner.assign(id);

    const inbox = await services.inbox?.listForRecipient({ type: 'technician', id: 't1' });
    expect(inbox?.map((notification) => notification.message)).toEqual([
      'New reward redemption to fulfill: Car Wash for alice',
    ]);
    expect(inbox?.[0]?.redemptionId).toBe(id);
  });

  it('refuses to reassign a redemption that has left pending', async () => {
    seedTechnician(db, 't1');
    const redemption = await services.redemptions.redeem('alice', optionId);
    expect(redemption.status).toBe('assigned');

    await expect(services.assigner.assign(redemption.id)).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it('rejects unknown redemptions', async () => {
    seedTechnician(db, 't1');
    await expect(services.assigner.assign('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('wraps repair tracker failures', async () => {
    const mirror = new SqliteRepairTracker(db);
    const offline: IRepairTracker = {
      listTechnicians: async () => { throw new Error('connection refused'); },
      countActiveJobs: (technicianId) => mirror.countActiveJobs(technicianId),
      getRepair: (repairId) => mirror.getRepair(repairId),
      applyDiscount: (repairId, discount, redemptionId) => mirror.applyDiscount(repairId, discount, redemptionId),
    };
    const withOfflineTracker = createTestServices(db, {}, { repairs: offline });
    const id = await pendingRedemption();

    await expect(withOfflineTracker.assigner.assign(id)).rejects.toThrow(DependencyFailureError);
    await expect(withOfflineTracker.assigner.assign(id)).rejects.toThrow('repair-tracker: connection refused');
  });
});
