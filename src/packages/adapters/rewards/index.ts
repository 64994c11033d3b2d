/**
 * Rewards service wiring
 *
 * @module packages/adapters/rewards
 */

import type Database from 'better-sqlite3';
import type { INotificationSender } from '../../core/ports/INotificationSender.js';
import type { IRepairTracker } from '../../core/ports/IRepairTracker.js';
import type { RandomIndex } from '../../core/rewards/referral-code.js';
import { SqliteNotificationSender } from '../notifications/SqliteNotificationSender.js';
import { SqliteRepairTracker } from '../repairs/SqliteRepairTracker.js';
import { CustomerDirectory } from './CustomerDirectory.js';
import { PointsAccountService } from './PointsAccountService.js';
import { RedemptionWorkflow, type RedemptionPolicy } from './RedemptionWorkflow.js';
import { ReferralCodeRegistry } from './ReferralCodeRegistry.js';
import { ReferralLedger, type ReferralAwards } from './ReferralLedger.js';
import { RewardCatalog } from './RewardCatalog.js';
import { TechnicianAssigner } from './TechnicianAssigner.js';

export { CustomerDirectory } from './CustomerDirectory.js';
export { PointsAccountService } from './PointsAccountService.js';
export { RedemptionWorkflow } from './RedemptionWorkflow.js';
export type { RedemptionPolicy, RedemptionWorkflowDeps } from './RedemptionWorkflow.js';
export { ReferralCodeRegistry } from './ReferralCodeRegistry.js';
export type { ReferralCodeRegistryOptions } from './ReferralCodeRegistry.js';
export { ReferralLedger } from './ReferralLedger.js';
export type { ReferralAwards } from './ReferralLedger.js';
export { RewardCatalog } from './RewardCatalog.js';
export { TechnicianAssigner } from './TechnicianAssigner.js';

export interface RewardsSettings {
  referrals: ReferralAwards & {
    codeLength: number;
    maxCodeAttempts: number;
  };
  redemptions: RedemptionPolicy;
}

export interface RewardsCollaborators {
  /** Defaults to the SQLite mirror of the repair queue */
  repairs?: IRepairTracker;
  /** Defaults to the SQLite notification inbox */
  notifier?: INotificationSender;
  /** Referral code random source */
  randomIndex?: RandomIndex;
}

export interface RewardsServices {
  customers: CustomerDirectory;
  points: PointsAccountService;
  referralCodes: ReferralCodeRegistry;
  referrals: ReferralLedger;
  catalog: RewardCatalog;
  assigner: TechnicianAssigner;
  redemptions: RedemptionWorkflow;
  repairs: IRepairTracker;
  notifier: INotificationSender;
  /** Set when the built-in repair mirror is in use; backs the roster sync routes */
  repairMirror: SqliteRepairTracker | null;
  /** Set when the built-in inbox is in use; backs the notification routes */
  inbox: SqliteNotificationSender | null;
}

/**
 * Wire every rewards service against one database handle.
 */
export function createRewardsServices(
  db: Database.Database,
  settings: RewardsSettings,
  collaborators: RewardsCollaborators = {},
): RewardsServices {
  let repairMirror: SqliteRepairTracker | null = null;
  let repairs: IRepairTracker;
  if (collaborators.repairs) {
    repairs = collaborators.repairs;
  } else {
    repairMirror = new SqliteRepairTracker(db);
    repairs = repairMirror;
  }

  let inbox: SqliteNotificationSender | null = null;
  let notifier: INotificationSender;
  if (collaborators.notifier) {
    notifier = collaborators.notifier;
  } else {
    inbox = new SqliteNotificationSender(db);
    notifier = inbox;
  }

  const customers = new CustomerDirectory(db);
  const points = new PointsAccountService(db);
  const referralCodes = new ReferralCodeRegistry(db, {
    codeLength: settings.referrals.codeLength,
    maxAttempts: settings.referrals.maxCodeAttempts,
    randomIndex: collaborators.randomIndex,
  });
  const referrals = new ReferralLedger(db, points, {
    referrerAwardPoints: settings.referrals.referrerAwardPoints,
    welcomeBonusPoints: settings.referrals.welcomeBonusPoints,
  });
  const catalog = new RewardCatalog(db, points);
  const assigner = new TechnicianAssigner(db, repairs, notifier);
  const redemptions = new RedemptionWorkflow({
    db,
    points,
    catalog,
    assigner,
    repairs,
    notifier,
    policy: settings.redemptions,
  });

  return {
    customers,
    points,
    referralCodes,
    referrals,
    catalog,
    assigner,
    redemptions,
    repairs,
    notifier,
    repairMirror,
    inbox,
  };
}
