/**
 * Every adapter logs through a child logger bound to its module name
 */

import { describe, it, expect, vi } from 'vitest';
import { createChildLogger } from '../../../src/utils/logger.js';

vi.mock('../../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/utils/logger.js')>();
  return { ...actual, createChildLogger: vi.fn(actual.createChildLogger) };
});

describe('adapter loggers', () => {
  it('binds a module name in each adapter', async () => {
    await import('../../../src/packages/adapters/rewards/index.js');
    await import('../../../src/packages/adapters/notifications/dispatch.js');

    const modules = vi.mocked(createChildLogger).mock.calls.map(([bindings]) => bindings.module);
    expect(modules).toEqual(expect.arrayContaining([
      'CustomerDirectory',
      'NotificationDispatch',
      'PointsAccountService',
      'RedemptionWorkflow',
      'ReferralCodeRegistry',
      'ReferralLedger',
      'RewardCatalog',
      'SqliteRepairTracker',
      'TechnicianAssigner',
    ]));
  });
});
