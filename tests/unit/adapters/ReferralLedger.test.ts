/**
 * ReferralLedger Tests
 *
 * Award atomicity, self/duplicate referral rules, stats and leaderboard.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import type { RewardsServices } from '../../../src/packages/adapters/rewards/index.js';
import type { RandomIndex } from '../../../src/packages/core/rewards/referral-code.js';
import {
  DuplicateReferralError,
  NotFoundError,
  SelfReferralError,
} from '../../../src/utils/errors.js';
import { TEST_SETTINGS, createTestDb, createTestServices, seedCustomer } from '../../helpers/db.js';

// Draws A, B, 1, 2, C, D
function ab12cd(): RandomIndex {
  const indices = [0, 1, 27, 28, 2, 3];
  let position = 0;
  return () => indices[position++ % indices.length] ?? 0;
}

function countReferrals(db: Database.Database): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM referrals').get();
  return row?.count ?? 0;
}

let db: Database.Database;
let services: RewardsServices;

beforeEach(() => {
  db = createTestDb();
  services = createTestServices(
    db,
    { referrals: { ...TEST_SETTINGS.referrals, codeLength: 6 } },
    { randomIndex: ab12cd() },
  );
  seedCustomer(db, 'alice', 'Alice');
  seedCustomer(db, 'bob', 'Bob');
});

afterEach(() => {
  db.close();
});

describe('ReferralLedger', () => {
  describe('processReferral', () => {
    it('records the referral and awards both parties', async () => {
      const { value: code } = await services.referralCodes.getOrCreateCode('alice');
      expect(code.code).toBe('AB12CD');

      const referral = await services.referrals.processReferral('AB12CD', 'bob');

      expect(referral).toMatchObject({
        code: 'AB12CD',
        referralCodeId: code.id,
        referrerCustomerId: 'alice',
        referredCustomerId: 'bob',
      });
      expect(await services.points.getBalance('alice')).toBe(500);
      expect(await services.points.getBalance('bob')).toBe(100);

      const [award] = await services.points.getLedger('alice');
      const [bonus] = await services.points.getLedger('bob');
      expect(award).toMatchObject({ entryType: 'referral_award', amount: 500, referenceId: referral.id });
      expect(bonus).toMatchObject({ entryType: 'welcome_bonus', amount: 100, referenceId: referral.id });
    });

    it('rejects a second use of the same code by the same customer', async () => {
      await services.referralCodes.getOrCreateCode('alice');
      await services.referrals.processReferral('AB12CD', 'bob');

      await expect(services.referrals.processReferral('AB12CD', 'bob')).rejects.toBeInstanceOf(DuplicateReferralError);
      expect(await services.points.getBalance('alice')).toBe(500);
      expect(await services.points.getBalance('bob')).toBe(100);
      expect(countReferrals(db)).toBe(1);
    });

    it('rejects self-referral without writing anything', async () => {
      await services.referralCodes.getOrCreateCode('alice');

      await expect(services.referrals.processReferral('AB12CD', 'alice')).rejects.toBeInstanceOf(SelfReferralError);
      expect(countReferrals(db)).toBe(0);
      expect(await services.points.getBalance('alice')).toBe(0);
    });

    it('rejects unknown codes and unknown customers', async () => {
      await services.referralCodes.getOrCreateCode('alice');

      await expect(services.referrals.processReferral('ZZZZZZ', 'bob')).rejects.toThrow('Referral code not found: ZZZZZZ');
      await expect(services.referrals.processReferral('AB12CD', 'nobody')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rolls back the referral and the first award when the second award fails', async () => {
      await services.referralCodes.getOrCreateCode('alice');

      const credit = services.points.credit.bind(services.points);
      let calls = 0;
      vi.spyOn(services.points, 'credit').mockImplementation((customerId, amount, entryType, referenceId) => {
        calls++;
        if (calls === 2) {
          throw new Error('disk full');
        }
        return credit(customerId, amount, entryType, referenceId);
      });

      await expect(services.referrals.processReferral('AB12CD', 'bob')).rejects.toThrow('disk full');
      expect(countReferrals(db)).toBe(0);
      expect(await services.points.getBalance('alice')).toBe(0);
      expect(await services.points.getLedger('alice')).toEqual([]);
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      seedCustomer(db, 'carol', 'Carol');
      seedCustomer(db, 'dave', 'Dave');
      seedCustomer(db, 'erin', 'Erin');
      // default random source so each referrer gets a distinct code
      services = createTestServices(db);

      const alice = (await services.referralCodes.getOrCreateCode('alice')).value.code;
      const carol = (await services.referralCodes.getOrCreateCode('carol')).value.code;
      const dave = (await services.referralCodes.getOrCreateCode('dave')).value.code;

      await services.referrals.processReferral(alice, 'bob');
      await services.referrals.processReferral(alice, 'erin');
      await services.referrals.processReferral(dave, 'erin');
      await services.referrals.processReferral(carol, 'bob');
    });

    it('counts referrals per referrer', async () => {
      expect(await services.referrals.getReferralCount('alice')).toBe(2);
      expect(await services.referrals.getReferralCount('bob')).toBe(0);
    });

    it('lists history newest first', async () => {
      const history = await services.referrals.getReferralHistory('alice');
      expect(history.map((referral) => referral.referredCustomerId)).toEqual(['erin', 'bob']);
    });

    it('summarises code, count and balance', async () => {
      const stats = await services.referrals.getReferralStats('alice');
      expect(stats.totalReferrals).toBe(2);
      expect(stats.points).toBe(1000);
      expect(stats.code).toMatch(/^[A-Z0-9]{8}$/);

      expect(await services.referrals.getReferralStats('bob')).toEqual({ code: null, totalReferrals: 0, points: 200 });
    });

    it('ranks referrers by count then id', async () => {
      const board = await services.referrals.getLeaderboard();
      expect(board).toEqual([
        { customerId: 'alice', name: 'alice', referralCount: 2 },
        { customerId: 'carol', name: 'carol', referralCount: 1 },
        { customerId: 'dave', name: 'dave', referralCount: 1 },
      ]);

      expect((await services.referrals.getLeaderboard(2)).map((entry) => entry.customerId)).toEqual(['alice', 'carol']);
    });
  });
});
