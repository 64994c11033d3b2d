export type { UpsertResult } from './UpsertResult.js';
export type { Customer, NewCustomer, ICustomerDirectory } from './ICustomerDirectory.js';
export type { ReferralCode, IReferralCodeRegistry } from './IReferralCodeRegistry.js';
export type { Referral, ReferralStats, LeaderboardEntry, IReferralLedger } from './IReferralLedger.js';
export type {
  LedgerEntryType,
  PointsAccount,
  PointsLedgerEntry,
  BalanceCheck,
  IPointsAccountService,
} from './IPointsAccount.js';
export type {
  RewardCategory,
  DiscountKind,
  RewardType,
  RewardOption,
  AvailableRewards,
  ListOptionsFilter,
  IRewardCatalog,
} from './IRewardCatalog.js';
export type { RedemptionStatus, Redemption, IRedemptionWorkflow } from './IRedemptionWorkflow.js';
export type { ITechnicianAssigner } from './ITechnicianAssigner.js';
export { CLOSED_REPAIR_STATUSES } from './IRepairTracker.js';
export type { RepairQueueStatus, Technician, Repair, IRepairTracker } from './IRepairTracker.js';
export type {
  RecipientType,
  NotificationRecipient,
  Notification,
  INotificationSender,
} from './INotificationSender.js';
