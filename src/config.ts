import { z } from 'zod';
import './env.js';
import { LOG_LEVELS, logger } from './utils/logger.js';
import { MAX_CODE_LENGTH, MIN_CODE_LENGTH } from './packages/core/rewards/referral-code.js';

/**
 * Admin API key schema: "key:name,key:name"
 */
const adminApiKeysSchema = z
  .string()
  .transform((val) => {
    const keys = new Map<string, string>();
    for (const pair of val.split(',')) {
      const [key, name] = pair.split(':');
      if (key && name) {
        keys.set(key.trim(), name.trim());
      }
    }
    return keys;
  });

/**
 * Env booleans arrive as strings; z.coerce.boolean() would read "false" as true
 */
const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((val) => val === 'true' || val === '1');

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  api: z.object({
    port: z.coerce.number().int().min(1).max(65535),
    host: z.string(),
    adminApiKeys: adminApiKeysSchema,
  }),
  database: z.object({
    path: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
  }),
  referrals: z.object({
    codeLength: z.coerce.number().int().min(MIN_CODE_LENGTH).max(MAX_CODE_LENGTH),
    maxCodeAttempts: z.coerce.number().int().min(1).max(1000),
    referrerAwardPoints: z.coerce.number().int().positive(),
    welcomeBonusPoints: z.coerce.number().int().positive(),
  }),
  redemptions: z.object({
    refundOnReject: booleanFlagSchema,
    allowUnassignedFulfillment: booleanFlagSchema,
  }),
});

/**
 * Typed configuration object
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const rawConfig = {
    api: {
      port: process.env.API_PORT ?? '3000',
      host: process.env.API_HOST ?? '0.0.0.0',
      adminApiKeys: process.env.ADMIN_API_KEYS ?? '',
    },
    database: {
      path: process.env.DATABASE_PATH ?? './data/rewards.db',
    },
    logging: {
      level: process.env.LOG_LEVEL ?? 'info',
    },
    referrals: {
      codeLength: process.env.REFERRAL_CODE_LENGTH ?? '8',
      maxCodeAttempts: process.env.REFERRAL_CODE_MAX_ATTEMPTS ?? '20',
      referrerAwardPoints: process.env.REFERRER_AWARD_POINTS ?? '500',
      welcomeBonusPoints: process.env.WELCOME_BONUS_POINTS ?? '100',
    },
    redemptions: {
      refundOnReject: process.env.REFUND_ON_REJECT ?? 'true',
      allowUnassignedFulfillment: process.env.ALLOW_UNASSIGNED_FULFILLMENT ?? 'false',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

export const config: Config = parseConfig();

