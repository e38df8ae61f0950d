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

const amountString = z.string().regex(/^\d+$/, 'must be an unsigned integer');
const positiveInteger = z
  .string()
  .regex(/^[1-9]\d*$/, 'must be a positive integer')
  .transform((value) => Number(value))
  .refine((value) => Number.isSafeInteger(value), 'must be a safe integer');

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: positiveInteger.optional(),
  DATABASE_URL: z.string().url(),
  DATABASE_SSL: z.enum(['true', 'false']).optional(),
  LEDGER_BANK_CAP: amountString,
  LEDGER_PER_WITHDRAWAL_CAP: amountString,
  LEDGER_CHANNEL: z.string().optional(),
  LEDGER_RELEASE_URL: z.string().url().optional(),
  LEDGER_RELEASE_SECRET: z.string().optional(),
  LEDGER_RELEASE_TIMEOUT_MS: positiveInteger.optional(),
  BOOTSTRAP_CALLER_ID: z.string().optional(),
  BOOTSTRAP_API_KEY: z.string().optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
}

const env = parsed.data;

export const CONFIG = {
  env: env.NODE_ENV ?? 'development',
  port: env.PORT ?? 3000,
  databaseUrl: env.DATABASE_URL,
  databaseSsl: env.DATABASE_SSL === 'true',
  bankCap: env.LEDGER_BANK_CAP,
  perWithdrawalCap: env.LEDGER_PER_WITHDRAWAL_CAP,
  channel: env.LEDGER_CHANNEL ?? 'mock',
  releaseUrl: env.LEDGER_RELEASE_URL,
  releaseSecret: env.LEDGER_RELEASE_SECRET,
  releaseTimeoutMs: env.LEDGER_RELEASE_TIMEOUT_MS ?? 10_000,
  bootstrapCallerId: env.BOOTSTRAP_CALLER_ID,
  bootstrapApiKey: env.BOOTSTRAP_API_KEY,
};
