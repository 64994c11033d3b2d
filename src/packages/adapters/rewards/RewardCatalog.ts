/**
 * RewardCatalog — Reward Options and Types
 *
 * Options are priced in points and optionally classified by a reward type
 * that determines any repair discount. Options are never deleted; staff
 * deactivate them and inactive options are not offered.
 *
 * @module packages/adapters/rewards/RewardCatalog
 */

import type Database from 'better-sqlite3';
import type {
  AvailableRewards,
  DiscountKind,
  IRewardCatalog,
  ListOptionsFilter,
  RewardCategory,
  RewardOption,
  RewardType,
} from '../../core/ports/IRewardCatalog.js';
import {
  rewardOptionInputSchema,
  rewardOptionPatchSchema,
  rewardTypeInputSchema,
} from '../../core/rewards/catalog-schemas.js';
import type { PointsAccountService } from './PointsAccountService.js';
import { NotFoundError, ValidationError } from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';
import { parseOrThrow } from '../../../utils/validation.js';

const log = createChildLogger({ module: 'RewardCatalog' });

// =============================================================================
// Row Types
// =============================================================================

interface RewardTypeRow {
  id: number;
  name: string;
  category: RewardCategory;
  discount_kind: DiscountKind;
  discount_value: number;
  description: string;
  is_active: number;
}

interface OptionRow {
  id: number;
  name: string;
  description: string;
  points_required: number;
  reward_type_id: number | null;
  is_active: number;
  created_at: string;
  updated_at: string;
  type_name: string | null;
  type_category: RewardCategory | null;
  type_discount_kind: DiscountKind | null;
  type_discount_value: number | null;
  type_description: string | null;
  type_is_active: number | null;
}

// =============================================================================
// Helpers
// =============================================================================

function rowToRewardType(row: RewardTypeRow): RewardType {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    discountKind: row.discount_kind,
    discountValue: row.discount_value,
    description: row.description,
    isActive: row.is_active === 1,
  };
}

function rowToOption(row: OptionRow): RewardOption {
  const rewardType: RewardType | null =
    row.reward_type_id !== null && row.type_name !== null && row.type_category !== null && row.type_discount_kind !== null
      ? {
          id: row.reward_type_id,
          name: row.type_name,
          category: row.type_category,
          discountKind: row.type_discount_kind,
          discountValue: row.type_discount_value ?? 0,
          description: row.type_description ?? '',
          isActive: row.type_is_active === 1,
        }
      : null;

  return {
    id: row.id,
    name: row.name,
    description: row.description,
    pointsRequired: row.points_required,
    rewardType,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const SELECT_OPTION = `
  SELECT o.*,
    t.name AS type_name,
    t.category AS type_category,
    t.discount_kind AS type_discount_kind,
    t.discount_value AS type_discount_value,
    t.description AS type_description,
    t.is_active AS type_is_active
  FROM reward_options o
  LEFT JOIN reward_types t ON t.id = o.reward_type_id
`;

// =============================================================================
// Implementation
// =============================================================================

export class RewardCatalog implements IRewardCatalog {
  private db: Database.Database;
  private points: PointsAccountService;

  constructor(db: Database.Database, points: PointsAccountService) {
    this.db = db;
    this.points = points;
  }

  async listOptions(filter: ListOptionsFilter = {}): Promise<RewardOption[]> {
    const activeOnly = filter.activeOnly ?? true;
    return this.db.prepare<[number], OptionRow>(`
      ${SELECT_OPTION}
      WHERE (? = 0 OR o.is_active = 1)
      ORDER BY o.points_required ASC, o.id ASC
    `).all(activeOnly ? 1 : 0).map(rowToOption);
  }

  async getOption(rewardOptionId: number): Promise<RewardOption | null> {
    return this.findOption(rewardOptionId);
  }

  async createOption(input: unknown): Promise<RewardOption> {
    const parsed = parseOrThrow(rewardOptionInputSchema, input);

    const option = this.db.transaction((): RewardOption => {
      this.assertOptionNameFree(parsed.name, null);
      this.assertRewardTypeExists(parsed.rewardTypeId);

      const row = this.db.prepare<[string, string, number, number | null, number], { id: number }>(`
        INSERT INTO reward_options (name, description, points_required, reward_type_id, is_active)
        VALUES (?, ?, ?, ?, ?)
        RETURNING id
      `).get(parsed.name, parsed.description, parsed.pointsRequired, parsed.rewardTypeId, parsed.isActive ? 1 : 0);

      if (!row) {
        throw new Error(`Reward option insert returned no row: ${parsed.name}`);
      }
      return this.requireOption(row.id);
    }).immediate();

    log.info({ event: 'catalog.option.created', rewardOptionId: option.id, pointsRequired: option.pointsRequired }, 'Reward option created');
    return option;
  }

  async updateOption(rewardOptionId: number, patch: unknown): Promise<RewardOption> {
    const parsed = parseOrThrow(rewardOptionPatchSchema, patch);

    const option = this.db.transaction((): RewardOption => {
      const current = this.requireOption(rewardOptionId);
      const next = {
        name: parsed.name ?? current.name,
        description: parsed.description ?? current.description,
        pointsRequired: parsed.pointsRequired ?? current.pointsRequired,
        rewardTypeId: parsed.rewardTypeId !== undefined ? parsed.rewardTypeId : current.rewardType?.id ?? null,
        isActive: parsed.isActive ?? current.isActive,
      };

      if (next.name !== current.name) {
        this.assertOptionNameFree(next.name, rewardOptionId);
      }
      this.assertRewardTypeExists(next.rewardTypeId);

      this.db.prepare<[string, string, number, number | null, number, number]>(`
        UPDATE reward_options
        SET name = ?, description = ?, points_required = ?, reward_type_id = ?, is_active = ?,
            updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        WHERE id = ?
      `).run(next.name, next.description, next.pointsRequired, next.rewardTypeId, next.isActive ? 1 : 0, rewardOptionId);

      return this.requireOption(rewardOptionId);
    }).immediate();

    log.info({ event: 'catalog.option.updated', rewardOptionId, fields: Object.keys(parsed) }, 'Reward option updated');
    return option;
  }

  async deactivateOption(rewardOptionId: number): Promise<RewardOption> {
    const option = this.db.transaction((): RewardOption => {
      this.requireOption(rewardOptionId);
      this.db.prepare<[number]>(`
        UPDATE reward_options
        SET is_active = 0, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        WHERE id = ? AND is_active = 1
      `).run(rewardOptionId);
      return this.requireOption(rewardOptionId);
    }).immediate();

    log.info({ event: 'catalog.option.deactivated', rewardOptionId }, 'Reward option deactivated');
    return option;
  }

  async createRewardType(input: unknown): Promise<RewardType> {
    const parsed = parseOrThrow(rewardTypeInputSchema, input);

    const rewardType = this.db.transaction((): RewardType => {
      const taken = this.db.prepare<[string], { id: number }>(
        'SELECT id FROM reward_types WHERE name = ?'
      ).get(parsed.name);
      if (taken) {
        throw new ValidationError(`Reward type name already exists: ${parsed.name}`, 'name');
      }

      const row = this.db.prepare<[string, RewardCategory, DiscountKind, number, string, number], RewardTypeRow>(`
        INSERT INTO reward_types (name, category, discount_kind, discount_value, description, is_active)
        VALUES (?, ?, ?, ?, ?, ?)
        RETURNING *
      `).get(
        parsed.name,
        parsed.category,
        parsed.discountKind,
        parsed.discountValue,
        parsed.description,
        parsed.isActive ? 1 : 0,
      );
      if (!row) {
        throw new Error(`Reward type insert returned no row: ${parsed.name}`);
      }
      return rowToRewardType(row);
    }).immediate();

    log.info({ event: 'catalog.type.created', rewardTypeId: rewardType.id, category: rewardType.category }, 'Reward type created');
    return rewardType;
  }

  async listRewardTypes(): Promise<RewardType[]> {
    return this.db.prepare<[], RewardTypeRow>(
      'SELECT * FROM reward_types ORDER BY id ASC'
    ).all().map(rowToRewardType);
  }

  async getAvailableRewards(customerId: string): Promise<AvailableRewards> {
    const points = await this.points.getBalance(customerId);
    const options = await this.listOptions({ activeOnly: true });

    return {
      points,
      available: options.filter((option) => option.pointsRequired <= points),
      unavailable: options.filter((option) => option.pointsRequired > points),
    };
  }

  // ---------------------------------------------------------------------------
  // Transaction participants
  // ---------------------------------------------------------------------------

  findOption(rewardOptionId: number): RewardOption | null {
    const row = this.db.prepare<[number], OptionRow>(`${SELECT_OPTION} WHERE o.id = ?`).get(rewardOptionId);
    return row ? rowToOption(row) : null;
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private requireOption(rewardOptionId: number): RewardOption {
    const option = this.findOption(rewardOptionId);
    if (!option) {
      throw new NotFoundError('Reward option', rewardOptionId);
    }
    return option;
  }

  private assertOptionNameFree(name: string, exceptId: number | null): void {
    const taken = this.db.prepare<[string], { id: number }>(
      'SELECT id FROM reward_options WHERE name = ?'
    ).get(name);
    if (taken && taken.id !== exceptId) {
      throw new ValidationError(`Reward option name already exists: ${name}`, 'name');
    }
  }

  private assertRewardTypeExists(rewardTypeId: number | null): void {
    if (rewardTypeId === null) return;
    const row = this.db.prepare<[number], { id: number }>(
      'SELECT id FROM reward_types WHERE id = ?'
    ).get(rewardTypeId);
    if (!row) {
      throw new ValidationError(`Unknown reward type: ${rewardTypeId}`, 'rewardTypeId');
    }
  }
}
