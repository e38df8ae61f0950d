import Fastify, { type FastifyBaseLogger } from 'fastify';
import { Ledger, type LedgerLogger } from '@custody-ledger/core';
import { closePool, configureDatabase, getPool } from '@custody-ledger/store';
import { CONFIG } from './config.js';
import { initDb } from './db.js';
import { getChannel } from './channels/index.js';
import { OutboxEventSink } from './sinks/outbox.js';
import authPlugin from './plugins/auth.js';
import { registerDepositRoutes } from './routes/deposits.js';
import { registerWithdrawalRoutes } from './routes/withdrawals.js';
import { registerBalanceRoutes } from './routes/balances.js';
import { registerTotalsRoutes } from './routes/totals.js';
import './types.js';

export interface BuildServerOptions {
  // Replaces the ledger built from CONFIG.
  ledger?: Ledger;
}

function toLedgerLogger(log: FastifyBaseLogger): LedgerLogger {
  return {
    info: (bindings, message) => log.info(bindings, message),
    warn: (bindings, message) => log.warn(bindings, message),
    error: (bindings, message) => log.error(bindings, message),
  };
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: CONFIG.env !== 'test' });
  const pool = getPool();
  app.decorate('db', pool);

  const ledger =
    options.ledger ??
    new Ledger({
      bankCap: CONFIG.bankCap,
      perWithdrawalCap: CONFIG.perWithdrawalCap,
      channel: getChannel(CONFIG.channel),
      sink: new OutboxEventSink(pool),
      logger: toLedgerLogger(app.log.child({ component: 'ledger' })),
      releaseTimeoutMs: CONFIG.releaseTimeoutMs,
    });
  app.decorate('ledger', ledger);

  app.addHook('onClose', async () => {
    await closePool();
  });

  app.get('/healthz', async () => ({ status: 'ok' }));

  await app.register(authPlugin);

  await registerDepositRoutes(app);
  await registerWithdrawalRoutes(app);
  await registerBalanceRoutes(app);
  await registerTotalsRoutes(app);

  return app;
}

async function start() {
  configureDatabase(CONFIG);
  await initDb();
  const app = await buildServer();
  const port = CONFIG.port;
  const host = '0.0.0.0';

  try {
    await app.listen({ port, host });
  } catch (err) {
    app.log.error(err, 'Failed to start API');
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err) => {
    console.error('[api] failed to start', err);
    process.exit(1);
  });
}
