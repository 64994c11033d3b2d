/**
 * Reward catalog seeding
 *
 * Loads the default catalog from reward-catalog.json. Idempotent by name:
 * existing types and options are left untouched, so staff edits survive
 * a re-run.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { RewardCatalog } from '../../packages/adapters/rewards/RewardCatalog.js';
import { ValidationError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { parseOrThrow } from '../../utils/validation.js';

const log = createChildLogger({ module: 'RewardCatalogSeed' });

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('./reward-catalog.json', import.meta.url));

const seedFileSchema = z.object({
  rewardTypes: z.array(z.object({
    name: z.string(),
    category: z.string(),
    discountKind: z.string(),
    discountValue: z.number(),
    description: z.string(),
  })),
  rewardOptions: z.array(z.object({
    name: z.string(),
    description: z.string(),
    pointsRequired: z.number(),
    rewardType: z.string().nullable(),
  })),
});

export interface SeedResult {
  typesCreated: number;
  optionsCreated: number;
}

export async function seedRewardCatalog(
  catalog: RewardCatalog,
  catalogPath: string = DEFAULT_CATALOG_PATH,
): Promise<SeedResult> {
  const seed = parseOrThrow(seedFileSchema, JSON.parse(readFileSync(catalogPath, 'utf-8')));

  const typeIds = new Map<string, number>();
  for (const existing of await catalog.listRewardTypes()) {
    typeIds.set(existing.name, existing.id);
  }

  // Check references before writing anything
  const knownTypes = new Set([...typeIds.keys(), ...seed.rewardTypes.map((type) => type.name)]);
  for (const option of seed.rewardOptions) {
    if (option.rewardType !== null && !knownTypes.has(option.rewardType)) {
      throw new ValidationError(
        `Unknown reward type "${option.rewardType}" for option "${option.name}"`,
        'rewardType'
      );
    }
  }

  let typesCreated = 0;
  for (const type of seed.rewardTypes) {
    if (typeIds.has(type.name)) continue;
    const created = await catalog.createRewardType(type);
    typeIds.set(created.name, created.id);
    typesCreated++;
  }

  const existingOptions = new Set(
    (await catalog.listOptions({ activeOnly: false })).map((option) => option.name)
  );

  let optionsCreated = 0;
  for (const option of seed.rewardOptions) {
    if (existingOptions.has(option.name)) continue;
    let rewardTypeId: number | null = null;
    if (option.rewardType !== null) {
      const typeId = typeIds.get(option.rewardType);
      if (typeId === undefined) {
        throw new ValidationError(`Unknown reward type "${option.rewardType}" for option "${option.name}"`, 'rewardType');
      }
      rewardTypeId = typeId;
    }
    await catalog.createOption({
      name: option.name,
      description: option.description,
      pointsRequired: option.pointsRequired,
      rewardTypeId,
    });
    optionsCreated++;
  }

  log.info({ event: 'catalog.seeded', typesCreated, optionsCreated }, 'Reward catalog seeded');
  return { typesCreated, optionsCreated };
}
