import { Pool, type PoolClient } from 'pg';

export interface DatabaseSettings {
  databaseUrl: string;
  databaseSsl: boolean;
}

let settings: DatabaseSettings | null = null;
let poolInstance: Pool | null = null;

export function configureDatabase(next: DatabaseSettings): void {
  settings = next;
}

export function getPool(): Pool {
  if (!poolInstance) {
    if (!settings) {
      throw new Error('Database settings have not been configured');
    }
    poolInstance = new Pool({
      connectionString: settings.databaseUrl,
      ssl: settings.databaseSsl ? { rejectUnauthorized: false } : undefined,
    });
  }
  return poolInstance;
}

export function setPoolForTests(pool: Pool): void {
  poolInstance = pool;
}

export async function closePool(): Promise<void> {
  if (poolInstance) {
    await poolInstance.end();
    poolInstance = null;
  }
}

export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
