import { config as loadEnv } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';

if (!process.env.DATABASE_URL) {
  const searchPaths = ['.env', '../.env', '../../.env'];
  for (const candidate of searchPaths) {
    const absolute = resolve(process.cwd(), candidate);
    if (!existsSync(absolute)) {
      continue;
    }
    const result = loadEnv({ path: absolute });
    if (result?.parsed?.DATABASE_URL || process.env.DATABASE_URL) {
      break;
    }
  }
}

const positiveInteger = z
  .string()
  .regex(/^[1-9]\d*$/, 'must be a positive integer')
  .transform((value) => Number(value))
  .refine((value) => Number.isSafeInteger(value), 'must be a safe integer');

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  DATABASE_URL: z.string().url(),
  DATABASE_SSL: z.enum(['true', 'false']).optional(),
  NOTIFIER_WEBHOOK_URL: z.string().url(),
  NOTIFIER_WEBHOOK_SECRET: z.string().optional(),
  NOTIFIER_DELIVERY_TIMEOUT_MS: positiveInteger.optional(),
  NOTIFIER_BATCH_SIZE: positiveInteger.optional(),
  POLL_INTERVAL_MS: positiveInteger.optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid notifier configuration: ${parsed.error.message}`);
}

const env = parsed.data;

export const CONFIG = {
  env: env.NODE_ENV ?? 'development',
  databaseUrl: env.DATABASE_URL,
  databaseSsl: env.DATABASE_SSL === 'true',
  webhookUrl: env.NOTIFIER_WEBHOOK_URL,
  webhookSecret: env.NOTIFIER_WEBHOOK_SECRET,
  deliveryTimeoutMs: env.NOTIFIER_DELIVERY_TIMEOUT_MS ?? 10_000,
  batchSize: env.NOTIFIER_BATCH_SIZE ?? 100,
  pollIntervalMs: env.POLL_INTERVAL_MS ?? 1000,
};
