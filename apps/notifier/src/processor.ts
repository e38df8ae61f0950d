import { createHmac } from 'crypto';
import { fetch } from 'undici';
import { formatAmount, type LedgerEvent, type LedgerEventType, type LedgerLogger } from '@custody-ledger/core';
import {
  claimNextLedgerEvent,
  markLedgerEventDelivered,
  rejectLedgerEvent,
  rescheduleLedgerEvent,
  withTransaction,
} from '@custody-ledger/store';
import { CONFIG } from './config.js';

export interface LedgerEventPayload {
  eventId: string;
  type: LedgerEventType;
  account: string;
  amount: string;
  newBalance: string;
  occurredAt: string;
}

export type NotificationOutcome = 'idle' | 'delivered' | 'rescheduled' | 'rejected';

export interface DrainSummary {
  delivered: number;
  rescheduled: number;
  rejected: number;
}

export function toPayload(event: LedgerEvent): LedgerEventPayload {
  return {
    eventId: event.eventId,
    type: event.type,
    account: event.account,
    amount: formatAmount(event.amount),
    newBalance: formatAmount(event.newBalance),
    occurredAt: event.occurredAt.toISOString(),
  };
}

export async function processNextNotification(logger: LedgerLogger): Promise<NotificationOutcome> {
  return withTransaction(async (client) => {
    const entry = await claimNextLedgerEvent(client, { lock: CONFIG.env !== 'test' });

    if (!entry) {
      return 'idle';
    }

    if (entry.status === 'unreadable') {
      logger.error({ eventId: entry.eventId, reason: entry.reason }, 'Rejected unreadable ledger event');
      await rejectLedgerEvent(client, entry.eventId, entry.reason);
      return 'rejected';
    }

    const { event } = entry;
    try {
      await deliverEvent(toPayload(event));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const availableAt = new Date(Date.now() + CONFIG.pollIntervalMs * 5);
      logger.warn({ eventId: event.eventId, type: event.type, err: message }, 'Delivery failed, event rescheduled');
      await rescheduleLedgerEvent(client, event.eventId, availableAt, message);
      return 'rescheduled';
    }

    await markLedgerEventDelivered(client, event.eventId);
    return 'delivered';
  });
}

/**
 * Works through due events until the outbox is idle, the batch is spent or
 * the signal aborts. Rescheduled events are not due again within one drain.
 */
export async function drainOutbox(logger: LedgerLogger, signal?: AbortSignal): Promise<DrainSummary> {
  const summary: DrainSummary = { delivered: 0, rescheduled: 0, rejected: 0 };

  for (let processed = 0; processed < CONFIG.batchSize && !signal?.aborted; processed += 1) {
    const outcome = await processNextNotification(logger);
    if (outcome === 'idle') {
      break;
    }
    summary[outcome] += 1;
  }

  return summary;
}

async function deliverEvent(payload: LedgerEventPayload): Promise<void> {
  const body = JSON.stringify(payload);
  const headers: Record<string, string> = {
    'content-type': 'application/json',
    'x-event-id': payload.eventId,
    'x-event-type': payload.type,
  };

  if (CONFIG.webhookSecret) {
    headers['x-signature-sha256'] = createHmac('sha256', CONFIG.webhookSecret).update(body).digest('hex');
  }

  const response = await fetch(CONFIG.webhookUrl, {
    method: 'POST',
    headers,
    body,
    signal: AbortSignal.timeout(CONFIG.deliveryTimeoutMs),
  });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Webhook delivery failed with status ${response.status}: ${text}`);
  }
}
