import type { EventSink, LedgerEvent } from '@custody-ledger/core';
import { insertLedgerEvent } from '@custody-ledger/store';
import type { Pool } from 'pg';

// Writes ledger events to the ledger_events outbox drained by the notifier.
export class OutboxEventSink implements EventSink {
  constructor(private readonly db: Pool) {}

  async publish(event: LedgerEvent): Promise<void> {
    await insertLedgerEvent(this.db, event);
  }
}
