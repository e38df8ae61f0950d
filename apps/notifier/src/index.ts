import { createConsoleLogger } from '@custody-ledger/core';
import { closePool, configureDatabase } from '@custody-ledger/store';
import { CONFIG } from './config.js';
import { drainOutbox } from './processor.js';

const logger = createConsoleLogger('notifier');

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

export async function run(signal: AbortSignal): Promise<void> {
  configureDatabase(CONFIG);
  logger.info({ pollIntervalMs: CONFIG.pollIntervalMs, webhookUrl: CONFIG.webhookUrl }, 'Draining ledger event outbox');

  while (!signal.aborted) {
    try {
      const summary = await drainOutbox(logger, signal);
      if (summary.delivered + summary.rescheduled + summary.rejected > 0) {
        logger.info({ ...summary }, 'Outbox pass finished');
      }
    } catch (error) {
      logger.error({ err: error }, 'Outbox pass failed');
    }
    await pause(CONFIG.pollIntervalMs, signal);
  }

  await closePool();
  logger.info({}, 'Notifier stopped');
}

if (import.meta.url === `file://${process.argv[1]}`) {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  process.once('SIGTERM', () => controller.abort());

  run(controller.signal).catch((err) => {
    logger.error({ err }, 'Notifier failed');
    process.exit(1);
  });
}
