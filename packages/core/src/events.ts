import type { AccountId } from './accounts.js';
import type { Amount } from './amounts.js';

interface LedgerEventBase {
  eventId: string;
  account: AccountId;
  amount: Amount;
  newBalance: Amount;
  occurredAt: Date;
}

export interface DepositedEvent extends LedgerEventBase {
  type: 'Deposited';
}

export interface WithdrawnEvent extends LedgerEventBase {
  type: 'Withdrawn';
}

export type LedgerEvent = DepositedEvent | WithdrawnEvent;

export type LedgerEventType = LedgerEvent['type'];

export const LEDGER_EVENT_TYPES = ['Deposited', 'Withdrawn'] as const satisfies readonly LedgerEventType[];

export interface EventSink {
  publish(event: LedgerEvent): void | Promise<void>;
}

/**
 * Structured logger shape shared by the ledger and its collaborators.
 * Fastify's pino logger satisfies it.
 */
export interface LedgerLogger {
  info(bindings: Record<string, unknown>, message: string): void;
  warn(bindings: Record<string, unknown>, message: string): void;
  error(bindings: Record<string, unknown>, message: string): void;
}

export function createConsoleLogger(prefix: string): LedgerLogger {
  return {
    info: (bindings, message) => console.log(`[${prefix}] ${message}`, bindings),
    warn: (bindings, message) => console.warn(`[${prefix}] ${message}`, bindings),
    error: (bindings, message) => console.error(`[${prefix}] ${message}`, bindings),
  };
}

export const consoleLogger = createConsoleLogger('ledger');

export const noopSink: EventSink = {
  publish: () => undefined,
};

// Sink failures are reported and dropped; they never reach the caller.
export function publishEvent(sink: EventSink, event: LedgerEvent, logger: LedgerLogger): void {
  let pending: Promise<void>;
  try {
    pending = Promise.resolve(sink.publish(event));
  } catch (error) {
    logger.warn({ err: error, eventId: event.eventId, type: event.type }, 'Event sink threw');
    return;
  }

  void pending.catch((error: unknown) => {
    logger.warn({ err: error, eventId: event.eventId, type: event.type }, 'Event sink rejected');
  });
}
