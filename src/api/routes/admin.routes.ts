/**
 * Admin API Routes
 *
 * Staff-only endpoints for:
 * - Redemption queue (pending list, manual assignment, rejection)
 * - Reward catalog management (types, options, deactivation)
 * - Customer records and points adjustments
 * - Technician roster and repair queue sync (built-in repair mirror only)
 *
 * All routes require API key authentication; the key's name is recorded
 * as the acting staff member.
 */

import { Router } from 'express';
import type { Response } from 'express';
import { z } from 'zod';
import type { RewardsServices } from '../../packages/adapters/rewards/index.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseOrThrow } from '../../utils/validation.js';
import { routeParam, type AuthenticatedRequest } from '../middleware.js';
import {
  serializeCustomer,
  serializeLedgerEntry,
  serializeRedemption,
  serializeRepair,
  serializeRewardOption,
  serializeRewardType,
  serializeTechnician,
} from '../serializers.js';

// =============================================================================
// Schema Definitions
// =============================================================================

const rejectSchema = z.object({
  reason: z.string().trim().min(1).max(500),
});

const adjustmentSchema = z.object({
  amount: z.number().int().refine((value) => value !== 0, { message: 'Amount must be non-zero' }),
  reason: z.string().trim().min(3).max(200),
});

const queueStatusSchema = z.object({
  queueStatus: z.string(),
});

function numericId(req: AuthenticatedRequest, name: string): number {
  const raw = routeParam(req, name);
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${name}: ${raw}`, name);
  }
  return id;
}

function staffName(req: AuthenticatedRequest): string {
  return req.adminName ?? 'api-key';
}

// =============================================================================
// Router
// =============================================================================

export function createAdminRouter(services: RewardsServices): Router {
  const router = Router();

  // ---------------------------------------------------------------------------
  // Redemption queue
  // ---------------------------------------------------------------------------

  /**
   * GET /admin/redemptions/pending
   */
  router.get('/redemptions/pending', async (_req: AuthenticatedRequest, res: Response) => {
    const redemptions = await services.redemptions.getPendingRedemptions();
    res.json({ redemptions: redemptions.map(serializeRedemption) });
  });

  /**
   * POST /admin/redemptions/:id/assign
   * Retry workload-balanced assignment for a pending redemption
   */
  router.post('/redemptions/:id/assign', async (req: AuthenticatedRequest, res: Response) => {
    const redemptionId = routeParam(req, 'id');
    const technician = await services.assigner.assign(redemptionId);
    const redemption = await services.redemptions.getRedemption(redemptionId);
    if (!redemption) {
      throw new NotFoundError('Redemption', redemptionId);
    }

    logger.info({ redemptionId, assigned: technician !== null, by: staffName(req) }, 'Admin triggered assignment');
    res.json({
      assigned: technician !== null,
      technician: technician ? serializeTechnician(technician) : null,
      redemption: serializeRedemption(redemption),
    });
  });

  /**
   * POST /admin/redemptions/:id/reject
   */
  router.post('/redemptions/:id/reject', async (req: AuthenticatedRequest, res: Response) => {
    const body = parseOrThrow(rejectSchema, req.body);
    const redemption = await services.redemptions.reject(routeParam(req, 'id'), body.reason, staffName(req));
    res.json({ redemption: serializeRedemption(redemption) });
  });

  // ---------------------------------------------------------------------------
  // Catalog
  // ---------------------------------------------------------------------------

  router.get('/reward-types', async (_req: AuthenticatedRequest, res: Response) => {
    const types = await services.catalog.listRewardTypes();
    res.json({ reward_types: types.map(serializeRewardType) });
  });

  router.post('/reward-types', async (req: AuthenticatedRequest, res: Response) => {
    const rewardType = await services.catalog.createRewardType(req.body);
    res.status(201).json({ reward_type: serializeRewardType(rewardType) });
  });

  /**
   * GET /admin/reward-options
   * All options, including deactivated ones
   */
  router.get('/reward-options', async (_req: AuthenticatedRequest, res: Response) => {
    const options = await services.catalog.listOptions({ activeOnly: false });
    res.json({ reward_options: options.map(serializeRewardOption) });
  });

  router.post('/reward-options', async (req: AuthenticatedRequest, res: Response) => {
    const option = await services.catalog.createOption(req.body);
    res.status(201).json({ reward_option: serializeRewardOption(option) });
  });

  router.patch('/reward-options/:id', async (req: AuthenticatedRequest, res: Response) => {
    const option = await services.catalog.updateOption(numericId(req, 'id'), req.body);
    res.json({ reward_option: serializeRewardOption(option) });
  });

  /**
   * DELETE /admin/reward-options/:id
   * Deactivates; options are never removed
   */
  router.delete('/reward-options/:id', async (req: AuthenticatedRequest, res: Response) => {
    const option = await services.catalog.deactivateOption(numericId(req, 'id'));
    res.json({ reward_option: serializeRewardOption(option) });
  });

  // ---------------------------------------------------------------------------
  // Customers and points
  // ---------------------------------------------------------------------------

  router.post('/customers', async (req: AuthenticatedRequest, res: Response) => {
    const customer = await services.customers.createCustomer(req.body ?? {});
    res.status(201).json({ customer: serializeCustomer(customer) });
  });

  /**
   * GET /admin/customers/:id/points
   * Balance, ledger consistency and recent ledger entries
   */
  router.get('/customers/:id/points', async (req: AuthenticatedRequest, res: Response) => {
    const customer = await services.customers.requireCustomer(routeParam(req, 'id'));
    const check = await services.points.verifyBalance(customer.id);
    const entries = await services.points.getLedger(customer.id);
    res.json({
      customer_id: customer.id,
      balance: check.balance,
      ledger_sum: check.ledgerSum,
      consistent: check.consistent,
      entries: entries.map(serializeLedgerEntry),
    });
  });

  /**
   * POST /admin/customers/:id/points-adjustments
   */
  router.post('/customers/:id/points-adjustments', async (req: AuthenticatedRequest, res: Response) => {
    const body = parseOrThrow(adjustmentSchema, req.body);
    const customer = await services.customers.requireCustomer(routeParam(req, 'id'));
    const entry = await services.points.adjust(customer.id, body.amount, `${staffName(req)}: ${body.reason}`);
    res.status(201).json({ entry: serializeLedgerEntry(entry) });
  });

  // ---------------------------------------------------------------------------
  // Roster and repair queue sync
  // ---------------------------------------------------------------------------

  const mirror = services.repairMirror;
  if (mirror) {
    router.put('/technicians/:id', async (req: AuthenticatedRequest, res: Response) => {
      const technician = await mirror.upsertTechnician(routeParam(req, 'id'), req.body);
      res.json({ technician: serializeTechnician(technician) });
    });

    router.post('/repairs', async (req: AuthenticatedRequest, res: Response) => {
      const repair = await mirror.recordRepair(req.body);
      res.status(201).json({ repair: serializeRepair(repair) });
    });

    router.patch('/repairs/:id', async (req: AuthenticatedRequest, res: Response) => {
      const body = parseOrThrow(queueStatusSchema, req.body);
      const repair = await mirror.updateQueueStatus(routeParam(req, 'id'), body.queueStatus);
      res.json({ repair: serializeRepair(repair) });
    });
  }

  return router;
}
