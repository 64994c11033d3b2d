/**
 * Notification Routes
 *
 * In-app inbox for customers (X-Customer-Id) and technicians
 * (X-Technician-Id). Only mounted when the built-in inbox is the
 * notification sender.
 */

import { Router } from 'express';
import type { Response } from 'express';
import { z } from 'zod';
import type { NotificationRecipient } from '../../packages/core/ports/INotificationSender.js';
import type { SqliteNotificationSender } from '../../packages/adapters/notifications/SqliteNotificationSender.js';
import { UnauthenticatedError } from '../../utils/errors.js';
import { parseOrThrow } from '../../utils/validation.js';
import { CUSTOMER_ID_HEADER, TECHNICIAN_ID_HEADER, type AuthenticatedRequest } from '../middleware.js';
import { serializeNotification } from '../serializers.js';

const listQuerySchema = z.object({
  unread: z.enum(['true', 'false']).default('false').transform((value) => value === 'true'),
});

const markReadSchema = z.object({
  ids: z.array(z.number().int().positive()).min(1).max(100),
});

/**
 * Technician identity wins when both headers are present
 */
function recipientOf(req: AuthenticatedRequest): NotificationRecipient {
  const technicianId = req.header(TECHNICIAN_ID_HEADER)?.trim();
  if (technicianId) {
    return { type: 'technician', id: technicianId };
  }
  const customerId = req.header(CUSTOMER_ID_HEADER)?.trim();
  if (customerId) {
    return { type: 'customer', id: customerId };
  }
  throw new UnauthenticatedError('X-Customer-Id or X-Technician-Id header required');
}

export function createNotificationRouter(inbox: SqliteNotificationSender): Router {
  const router = Router();

  /**
   * GET /api/notifications
   */
  router.get('/', async (req: AuthenticatedRequest, res: Response) => {
    const recipient = recipientOf(req);
    const query = parseOrThrow(listQuerySchema, req.query);
    const notifications = await inbox.listForRecipient(recipient, query.unread);
    res.json({ notifications: notifications.map(serializeNotification) });
  });

  /**
   * POST /api/notifications/read
   */
  router.post('/read', async (req: AuthenticatedRequest, res: Response) => {
    const recipient = recipientOf(req);
    const body = parseOrThrow(markReadSchema, req.body);
    const marked = await inbox.markRead(recipient, body.ids);
    res.json({ marked });
  });

  return router;
}
