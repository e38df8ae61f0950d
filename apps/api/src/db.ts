import { randomBytes, scrypt as scryptCb } from 'crypto';
import { promisify } from 'util';
import { createOutboxSchema, getPool } from '@custody-ledger/store';
import { CONFIG } from './config.js';

const scrypt = promisify(scryptCb);

export async function initDb(): Promise<void> {
  const pool = getPool();

  await pool.query(`
    CREATE TABLE IF NOT EXISTS caller_api_keys (
      caller_id TEXT PRIMARY KEY,
      api_key_hash BYTEA NOT NULL,
      salt BYTEA NOT NULL,
      active BOOLEAN DEFAULT TRUE,
      created_at TIMESTAMPTZ DEFAULT NOW()
    );
  `);

  await createOutboxSchema(pool);

  if (CONFIG.bootstrapCallerId && CONFIG.bootstrapApiKey) {
    await upsertCallerApiKey(CONFIG.bootstrapCallerId, CONFIG.bootstrapApiKey);
  }
}

async function upsertCallerApiKey(callerId: string, apiKey: string) {
  const salt = randomBytes(16);
  const hash = (await scrypt(apiKey, salt, 32)) as Buffer;

  await getPool().query(
    `INSERT INTO caller_api_keys (caller_id, api_key_hash, salt, active)
       VALUES ($1, $2, $3, TRUE)
       ON CONFLICT (caller_id)
       DO UPDATE SET api_key_hash = EXCLUDED.api_key_hash,
                     salt = EXCLUDED.salt,
                     active = TRUE,
                     created_at = NOW()`,
    [callerId, hash, salt],
  );
}
