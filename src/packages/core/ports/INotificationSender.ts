/**
 * Notification Port
 *
 * Fire-and-forget. Callers invoke it after their transaction commits and
 * never let a failure undo a state change.
 *
 * @module packages/core/ports/INotificationSender
 */

export type RecipientType = 'customer' | 'technician';

export interface NotificationRecipient {
  type: RecipientType;
  id: string;
}

export interface Notification {
  recipient: NotificationRecipient;
  message: string;
  redemptionId: string | null;
}

export interface INotificationSender {
  notify(notification: Notification): Promise<void>;
}
