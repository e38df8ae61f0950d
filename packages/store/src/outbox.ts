import { z } from 'zod';
import type { Pool, PoolClient } from 'pg';
import { LEDGER_EVENT_TYPES, formatAmount, type LedgerEvent } from '@custody-ledger/core';

const MAX_ERROR_LENGTH = 1024;

const OUTBOX_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS ledger_events (
     event_id UUID PRIMARY KEY,
     event_type TEXT NOT NULL,
     account_id TEXT NOT NULL,
     amount TEXT NOT NULL,
     new_balance TEXT NOT NULL,
     occurred_at TIMESTAMPTZ NOT NULL,
     available_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
     created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
     delivered_at TIMESTAMPTZ,
     rejected_at TIMESTAMPTZ,
     delivery_attempts INTEGER NOT NULL DEFAULT 0,
     error TEXT
   )`,
  `CREATE INDEX IF NOT EXISTS idx_ledger_events_delivery
     ON ledger_events(delivered_at, available_at)`,
];

export async function createOutboxSchema(pool: Pool): Promise<void> {
  for (const statement of OUTBOX_SCHEMA) {
    await pool.query(statement);
  }
}

export async function insertLedgerEvent(pool: Pool, event: LedgerEvent): Promise<void> {
  await pool.query(
    `INSERT INTO ledger_events (event_id, event_type, account_id, amount, new_balance, occurred_at)
     VALUES ($1, $2, $3, $4, $5, $6)`,
    [
      event.eventId,
      event.type,
      event.account,
      formatAmount(event.amount),
      formatAmount(event.newBalance),
      event.occurredAt.toISOString(),
    ],
  );
}

export interface LedgerEventRow {
  event_id: string;
  event_type: unknown;
  account_id: unknown;
  amount: unknown;
  new_balance: unknown;
  occurred_at: unknown;
}

const amountColumn = z
  .string()
  .regex(/^\d+$/, 'must be an unsigned integer')
  .transform((value) => BigInt(value));

const ledgerEventRowSchema = z.object({
  event_id: z.string().min(1),
  event_type: z.enum(LEDGER_EVENT_TYPES),
  account_id: z.string().min(1),
  amount: amountColumn,
  new_balance: amountColumn,
  occurred_at: z.coerce.date(),
});

export type OutboxEntry =
  | { status: 'readable'; event: LedgerEvent }
  | { status: 'unreadable'; eventId: string; reason: string };

// Rows are written by other processes; anything that does not describe a ledger event is unreadable.
export function readLedgerEventRow(row: LedgerEventRow): OutboxEntry {
  const parsed = ledgerEventRowSchema.safeParse(row);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    return { status: 'unreadable', eventId: row.event_id, reason: `Unreadable ledger event: ${issues.join('; ')}` };
  }

  const { data } = parsed;
  return {
    status: 'readable',
    event: {
      type: data.event_type,
      eventId: data.event_id,
      account: data.account_id,
      amount: data.amount,
      newBalance: data.new_balance,
      occurredAt: data.occurred_at,
    },
  };
}

/**
 * Claims the oldest undelivered event that is due. With `lock` the row stays
 * locked for the surrounding transaction and concurrent notifiers skip it.
 */
export async function claimNextLedgerEvent(
  client: PoolClient,
  options: { lock: boolean },
): Promise<OutboxEntry | null> {
  const select = `SELECT event_id, event_type, account_id, amount, new_balance, occurred_at
         FROM ledger_events
        WHERE delivered_at IS NULL AND rejected_at IS NULL AND available_at <= NOW()
        ORDER BY created_at
        LIMIT 1`;
  const res = await client.query<LedgerEventRow>(options.lock ? `${select} FOR UPDATE SKIP LOCKED` : select);

  if (res.rowCount === 0) {
    return null;
  }
  return readLedgerEventRow(res.rows[0]);
}

export async function markLedgerEventDelivered(client: PoolClient, eventId: string): Promise<void> {
  await client.query(
    `UPDATE ledger_events
        SET delivered_at = NOW(),
            delivery_attempts = delivery_attempts + 1,
            error = NULL
      WHERE event_id = $1`,
    [eventId],
  );
}

export async function rescheduleLedgerEvent(
  client: PoolClient,
  eventId: string,
  availableAt: Date,
  error: string,
): Promise<void> {
  await client.query(
    `UPDATE ledger_events
        SET available_at = $2,
            delivery_attempts = delivery_attempts + 1,
            error = $3
      WHERE event_id = $1`,
    [eventId, availableAt.toISOString(), error.slice(0, MAX_ERROR_LENGTH)],
  );
}

export async function rejectLedgerEvent(client: PoolClient, eventId: string, error: string): Promise<void> {
  await client.query(
    `UPDATE ledger_events
        SET rejected_at = NOW(),
            error = $2
      WHERE event_id = $1`,
    [eventId, error.slice(0, MAX_ERROR_LENGTH)],
  );
}
