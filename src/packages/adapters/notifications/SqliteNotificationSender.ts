/**
 * SqliteNotificationSender — In-App Notification Inbox
 *
 * Default INotificationSender: persists notifications for customers and
 * technicians to read in their portals.
 *
 * @module packages/adapters/notifications/SqliteNotificationSender
 */

import type Database from 'better-sqlite3';
import type {
  INotificationSender,
  Notification,
  NotificationRecipient,
  RecipientType,
} from '../../core/ports/INotificationSender.js';

export interface StoredNotification {
  id: number;
  recipient: NotificationRecipient;
  message: string;
  redemptionId: string | null;
  createdAt: string;
  readAt: string | null;
}

interface NotificationRow {
  id: number;
  recipient_type: RecipientType;
  recipient_id: string;
  message: string;
  redemption_id: string | null;
  created_at: string;
  read_at: string | null;
}

function rowToNotification(row: NotificationRow): StoredNotification {
  return {
    id: row.id,
    recipient: { type: row.recipient_type, id: row.recipient_id },
    message: row.message,
    redemptionId: row.redemption_id,
    createdAt: row.created_at,
    readAt: row.read_at,
  };
}

export class SqliteNotificationSender implements INotificationSender {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async notify(notification: Notification): Promise<void> {
    this.db.prepare<[RecipientType, string, string, string | null]>(`
      INSERT INTO notifications (recipient_type, recipient_id, message, redemption_id)
      VALUES (?, ?, ?, ?)
    `).run(
      notification.recipient.type,
      notification.recipient.id,
      notification.message,
      notification.redemptionId,
    );
  }

  /** Newest first */
  async listForRecipient(recipient: NotificationRecipient, unreadOnly: boolean = false): Promise<StoredNotification[]> {
    return this.db.prepare<[RecipientType, string, number], NotificationRow>(`
      SELECT * FROM notifications
      WHERE recipient_type = ? AND recipient_id = ? AND (? = 0 OR read_at IS NULL)
      ORDER BY id DESC
    `).all(recipient.type, recipient.id, unreadOnly ? 1 : 0).map(rowToNotification);
  }

  /** Returns the number of notifications newly marked read */
  async markRead(recipient: NotificationRecipient, notificationIds: number[]): Promise<number> {
    const mark = this.db.prepare<[RecipientType, string, number]>(`
      UPDATE notifications
      SET read_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
      WHERE recipient_type = ? AND recipient_id = ? AND id = ? AND read_at IS NULL
    `);
    return this.db.transaction(() =>
      notificationIds.reduce((count, id) => count + mark.run(recipient.type, recipient.id, id).changes, 0)
    ).immediate();
  }
}
