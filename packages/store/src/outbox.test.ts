import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { newDb } from 'pg-mem';
import type { Pool } from 'pg';
import type { LedgerEvent } from '@custody-ledger/core';
import { claimNextLedgerEvent, createOutboxSchema, insertLedgerEvent, readLedgerEventRow } from './outbox.js';
import { closePool, setPoolForTests, withTransaction } from './pool.js';

const EVENT_ID = '6f1c7c1e-2a43-4a8e-9a0e-3b8f2d9c1a10';

const row = {
  event_id: EVENT_ID,
  event_type: 'Deposited',
  account_id: 'alice',
  amount: '60',
  new_balance: '60',
  occurred_at: '2024-01-01T10:00:00.000Z',
};

describe('readLedgerEventRow', () => {
  it('turns a stored row into a ledger event with bigint amounts', () => {
    expect(readLedgerEventRow(row)).toEqual({
      status: 'readable',
      event: {
        type: 'Deposited',
        eventId: EVENT_ID,
        account: 'alice',
        amount: 60n,
        newBalance: 60n,
        occurredAt: new Date('2024-01-01T10:00:00.000Z'),
      },
    });
  });

  it('reports rows whose amounts are not unsigned integers', () => {
    expect(readLedgerEventRow({ ...row, amount: '-3' })).toEqual({
      status: 'unreadable',
      eventId: EVENT_ID,
      reason: 'Unreadable ledger event: amount must be an unsigned integer',
    });
  });

  it('reports rows with an unknown event type', () => {
    const entry = readLedgerEventRow({ ...row, event_type: 'Refunded' });

    expect(entry.status).toBe('unreadable');
    if (entry.status === 'unreadable') {
      expect(entry.reason).toMatch(/^Unreadable ledger event: event_type /);
    }
  });
});

describe('ledger_events outbox', () => {
  let pool: Pool;

  beforeEach(async () => {
    const mem = newDb({ autoCreateForeignKeyIndices: true });
    const { Pool: MemPool } = mem.adapters.createPg();
    pool = new MemPool();
    setPoolForTests(pool);
    await createOutboxSchema(pool);
  });

  afterEach(async () => {
    await closePool();
  });

  it('claims the event the sink inserted', async () => {
    const event: LedgerEvent = {
      type: 'Withdrawn',
      eventId: EVENT_ID,
      account: 'bob',
      amount: 10n,
      newBalance: 0n,
      occurredAt: new Date('2024-02-01T08:30:00.000Z'),
    };
    await insertLedgerEvent(pool, event);

    const entry = await withTransaction((client) => claimNextLedgerEvent(client, { lock: false }));

    expect(entry).toEqual({ status: 'readable', event });
  });

  it('claims nothing from an empty outbox', async () => {
    expect(await withTransaction((client) => claimNextLedgerEvent(client, { lock: false }))).toBeNull();
  });
});
