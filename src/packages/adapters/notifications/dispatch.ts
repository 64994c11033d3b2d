import type { INotificationSender, Notification } from '../../core/ports/INotificationSender.js';
import { DependencyFailureError, errorMessage } from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';

const log = createChildLogger({ module: 'NotificationDispatch' });

/**
 * Send a notification without letting delivery failure escape.
 * Call only after the owning transaction has committed.
 */
export async function notifySafely(sender: INotificationSender, notification: Notification): Promise<boolean> {
  try {
    await sender.notify(notification);
    return true;
  } catch (error) {
    const failure = new DependencyFailureError('notification-sender', errorMessage(error));
    log.warn({
      event: 'notification.failed',
      code: failure.code,
      recipientType: notification.recipient.type,
      recipientId: notification.recipient.id,
      redemptionId: notification.redemptionId,
      error: failure.message,
    }, 'Notification delivery failed');
    return false;
  }
}
