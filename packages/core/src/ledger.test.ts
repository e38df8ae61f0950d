import { describe, expect, it, vi } from 'vitest';
import type { ReleaseOutcome, ReleaseRequest, ValueTransferChannel } from './channel.js';
import { InvalidConfigurationError } from './errors.js';
import type { EventSink, LedgerEvent, LedgerLogger } from './events.js';
import { Ledger } from './ledger.js';

const ALICE = 'alice';
const BOB = 'bob';

function quietLogger(): LedgerLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function releasing() {
  const release = vi.fn(async (_request: ReleaseRequest): Promise<ReleaseOutcome> => ({
    status: 'released',
    reference: 'ref_ok',
  }));
  return { release };
}

function createLedger(overrides: Partial<ConstructorParameters<typeof Ledger>[0]> = {}): Ledger {
  return new Ledger({
    bankCap: 100n,
    perWithdrawalCap: 10n,
    channel: releasing(),
    logger: quietLogger(),
    ...overrides,
  });
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Ledger construction', () => {
  it('rejects caps that are not unsigned integers', () => {
    expect(() => createLedger({ bankCap: -1 })).toThrow(InvalidConfigurationError);
    expect(() => createLedger({ perWithdrawalCap: '12.5' })).toThrow('perWithdrawalCap=12.5');

    try {
      createLedger({ bankCap: 'lots' });
      throw new Error('Expected construction to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.kind).toBe('InvalidConfiguration');
        expect(error.field).toBe('bankCap');
        expect(error.value).toBe('lots');
      }
    }
  });

  it('rejects a non-positive release timeout', () => {
    expect(() => createLedger({ releaseTimeoutMs: 0 })).toThrow('releaseTimeoutMs=0');
  });

  it('accepts zero and caps in any order', () => {
    const ledger = createLedger({ bankCap: '0', perWithdrawalCap: '1000000000000000000000000000000' });
    expect(ledger.bankCap).toBe(0n);
    expect(ledger.perWithdrawalCap).toBe(10n ** 30n);
  });
});

describe('Ledger.deposit', () => {
  it('credits the caller and refuses to exceed the bank cap', async () => {
    const ledger = createLedger();

    expect(await ledger.deposit(ALICE, 60n)).toEqual({ type: 'success', value: 60n });
    expect(ledger.balanceOf(ALICE)).toBe(60n);

    expect(await ledger.deposit(ALICE, 50n)).toEqual({
      type: 'failure',
      error: { kind: 'CapExceeded', attempted: 50n, currentHeld: 60n, cap: 100n },
    });
    expect(ledger.balanceOf(ALICE)).toBe(60n);
    expect(ledger.totalHeld()).toBe(60n);
    expect(ledger.totalDeposits).toBe(1);
  });

  it('rejects zero and negative amounts without mutation', async () => {
    const ledger = createLedger();

    expect(await ledger.deposit(ALICE, 0n)).toEqual({ type: 'failure', error: { kind: 'ZeroAmount' } });
    expect(await ledger.deposit(ALICE, -5n)).toEqual({
      type: 'failure',
      error: { kind: 'InvalidAmount', attempted: -5n },
    });
    expect(ledger.totalHeld()).toBe(0n);
    expect(ledger.totalDeposits).toBe(0);
  });

  it('never lets held value pass the cap across a sequence of deposits', async () => {
    const ledger = createLedger();
    const outcomes: string[] = [];

    for (const account of [ALICE, BOB, ALICE, BOB, ALICE]) {
      const result = await ledger.deposit(account, 30n);
      outcomes.push(result.type);
      expect(ledger.totalHeld() <= ledger.bankCap).toBe(true);
    }

    expect(outcomes).toEqual(['success', 'success', 'success', 'failure', 'failure']);
    expect(ledger.balanceOf(ALICE)).toBe(60n);
    expect(ledger.balanceOf(BOB)).toBe(30n);
    expect(ledger.totalHeld()).toBe(90n);
  });
});

describe('Ledger.withdraw', () => {
  it('checks the per-withdrawal cap against the requested amount', async () => {
    const channel = releasing();
    const ledger = createLedger({ channel });
    await ledger.deposit(ALICE, 60n);

    expect(await ledger.withdraw(ALICE, 15n)).toEqual({
      type: 'failure',
      error: { kind: 'WithdrawalCapExceeded', attempted: 15n, cap: 10n },
    });
    expect(ledger.balanceOf(ALICE)).toBe(60n);
    expect(channel.release).not.toHaveBeenCalled();
  });

  it('rejects underflow with InsufficientBalance', async () => {
    const ledger = createLedger();
    await ledger.deposit(ALICE, 5n);

    expect(await ledger.withdraw(ALICE, 8n)).toEqual({
      type: 'failure',
      error: { kind: 'InsufficientBalance', attempted: 8n, available: 5n },
    });
    expect(await ledger.withdraw(BOB, 1n)).toEqual({
      type: 'failure',
      error: { kind: 'InsufficientBalance', attempted: 1n, available: 0n },
    });
    expect(ledger.balanceOf(ALICE)).toBe(5n);
  });

  it('returns an account to its prior balance after a round trip', async () => {
    const ledger = createLedger();
    await ledger.deposit(ALICE, 10n);

    await ledger.deposit(ALICE, 7n);
    const result = await ledger.withdraw(ALICE, 7n);

    expect(result).toEqual({ type: 'success', value: 10n });
    expect(ledger.balanceOf(ALICE)).toBe(10n);
    expect(ledger.totalHeld()).toBe(10n);
    expect(ledger.totalWithdrawals).toBe(1);
  });

  it('passes the decremented request to the channel', async () => {
    const channel = releasing();
    const ledger = createLedger({ channel });
    await ledger.deposit(ALICE, 60n);

    await ledger.withdraw(ALICE, 10n);

    expect(channel.release).toHaveBeenCalledTimes(1);
    const request = channel.release.mock.calls[0][0];
    expect(request).toMatchObject({ account: ALICE, amount: 10n });
    expect(request.transferId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('rolls back when the release reports failure', async () => {
    const ledger = createLedger({
      channel: { release: async () => ({ status: 'failed', reason: 'receiver rejected' }) },
    });
    await ledger.deposit(ALICE, 60n);

    expect(await ledger.withdraw(ALICE, 10n)).toEqual({
      type: 'failure',
      error: { kind: 'ReleaseFailed', attempted: 10n, reason: 'receiver rejected' },
    });
    expect(ledger.balanceOf(ALICE)).toBe(60n);
    expect(ledger.totalHeld()).toBe(60n);
    expect(ledger.totalWithdrawals).toBe(0);
  });

  it('rolls back when the release throws', async () => {
    const ledger = createLedger({
      channel: {
        release: async () => {
          throw new Error('connection reset');
        },
      },
    });
    await ledger.deposit(ALICE, 60n);

    const result = await ledger.withdraw(ALICE, 10n);

    expect(result).toEqual({
      type: 'failure',
      error: { kind: 'ReleaseFailed', attempted: 10n, reason: 'connection reset' },
    });
    expect(ledger.balanceOf(ALICE)).toBe(60n);
  });

  it('rolls back when the release never settles', async () => {
    const ledger = createLedger({
      releaseTimeoutMs: 20,
      channel: { release: () => new Promise<ReleaseOutcome>(() => undefined) },
    });
    await ledger.deposit(ALICE, 60n);

    const result = await ledger.withdraw(ALICE, 10n);

    expect(result).toEqual({
      type: 'failure',
      error: { kind: 'ReleaseFailed', attempted: 10n, reason: 'Release did not settle within 20ms' },
    });
    expect(ledger.balanceOf(ALICE)).toBe(60n);
    expect(ledger.totalHeld()).toBe(60n);
  });

  it('aborts the release signal once the deadline passes', async () => {
    const signals: AbortSignal[] = [];
    const ledger = createLedger({
      releaseTimeoutMs: 20,
      channel: {
        release: (request) => {
          signals.push(request.signal);
          return new Promise<ReleaseOutcome>(() => undefined);
        },
      },
    });
    await ledger.deposit(ALICE, 60n);

    await ledger.withdraw(ALICE, 10n);

    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
    expect(signals[0].reason).toBeInstanceOf(Error);
    expect(signals[0].reason.message).toBe('Release did not settle within 20ms');
  });

  it('leaves the signal untouched when the release settles in time', async () => {
    const channel = releasing();
    const ledger = createLedger({ channel, releaseTimeoutMs: 1000 });
    await ledger.deposit(ALICE, 60n);

    expect(await ledger.withdraw(ALICE, 10n)).toEqual({ type: 'success', value: 50n });
    expect(channel.release.mock.calls[0][0].signal.aborted).toBe(false);
  });
});

describe('Ledger concurrency', () => {
  it('lets exactly one of two competing withdrawals succeed', async () => {
    const ledger = createLedger({ perWithdrawalCap: 100n });
    await ledger.deposit(ALICE, 60n);

    const [first, second] = await Promise.all([ledger.withdraw(ALICE, 60n), ledger.withdraw(ALICE, 60n)]);

    expect(first).toEqual({ type: 'success', value: 0n });
    expect(second).toEqual({
      type: 'failure',
      error: { kind: 'InsufficientBalance', attempted: 60n, available: 0n },
    });
    expect(ledger.totalWithdrawals).toBe(1);
    expect(ledger.totalHeld()).toBe(0n);
  });

  it('holds a second withdrawal until the first release resolves', async () => {
    const gate = deferred();
    const release = vi.fn(async (): Promise<ReleaseOutcome> => {
      await gate.promise;
      return { status: 'released', reference: 'ref_gate' };
    });
    const ledger = createLedger({ channel: { release } });
    await ledger.deposit(ALICE, 60n);

    const first = ledger.withdraw(ALICE, 10n);
    const second = ledger.withdraw(ALICE, 10n);
    await new Promise((resolve) => setImmediate(resolve));

    expect(release).toHaveBeenCalledTimes(1);
    expect(ledger.balanceOf(ALICE)).toBe(50n);

    gate.resolve();
    expect(await first).toEqual({ type: 'success', value: 50n });
    expect(await second).toEqual({ type: 'success', value: 40n });
    expect(release).toHaveBeenCalledTimes(2);
  });

  it('shows a re-entrant withdrawal the already-reduced balance', async () => {
    let ledger: Ledger | null = null;
    const seen: { balance?: bigint; nested?: unknown } = {};
    const channel: ValueTransferChannel = {
      release: async (request) => {
        if (ledger) {
          seen.balance = ledger.balanceOf(request.account);
          seen.nested = await ledger.withdraw(request.account, request.amount);
        }
        return { status: 'released', reference: 'ref_outer' };
      },
    };
    ledger = createLedger({ perWithdrawalCap: 100n, channel });
    await ledger.deposit(ALICE, 60n);

    const result = await ledger.withdraw(ALICE, 60n);

    expect(seen.balance).toBe(0n);
    expect(seen.nested).toEqual({
      type: 'failure',
      error: { kind: 'InsufficientBalance', attempted: 60n, available: 0n },
    });
    expect(result).toEqual({ type: 'success', value: 0n });
    expect(ledger.totalWithdrawals).toBe(1);
    expect(ledger.totalHeld()).toBe(0n);
  });

  it('restores only the failed withdrawal after a nested one succeeded', async () => {
    let ledger: Ledger | null = null;
    let depth = 0;
    const channel: ValueTransferChannel = {
      release: async (request) => {
        depth += 1;
        if (depth === 1 && ledger) {
          await ledger.withdraw(request.account, 20n);
          return { status: 'failed', reason: 'outer receiver reverted' };
        }
        return { status: 'released', reference: 'ref_inner' };
      },
    };
    ledger = createLedger({ perWithdrawalCap: 100n, channel });
    await ledger.deposit(ALICE, 60n);

    const result = await ledger.withdraw(ALICE, 40n);

    expect(result.type).toBe('failure');
    expect(ledger.balanceOf(ALICE)).toBe(40n);
    expect(ledger.totalHeld()).toBe(40n);
    expect(ledger.totalWithdrawals).toBe(1);
  });

  it('keeps capacity reserved for an in-flight release', async () => {
    let ledger: Ledger | null = null;
    let nested: unknown;
    const channel: ValueTransferChannel = {
      release: async () => {
        if (ledger) {
          nested = await ledger.deposit(BOB, 50n);
        }
        return { status: 'failed', reason: 'declined' };
      },
    };
    ledger = createLedger({ perWithdrawalCap: 100n, channel });
    await ledger.deposit(ALICE, 100n);

    await ledger.withdraw(ALICE, 50n);

    expect(nested).toEqual({
      type: 'failure',
      error: { kind: 'CapExceeded', attempted: 50n, currentHeld: 100n, cap: 100n },
    });
    expect(ledger.totalHeld()).toBe(100n);
    expect(ledger.balanceOf(ALICE)).toBe(100n);
  });
});

describe('Ledger events', () => {
  it('publishes Deposited and Withdrawn for committed calls only', async () => {
    const published: LedgerEvent[] = [];
    const sink: EventSink = { publish: (event) => void published.push(event) };
    const occurredAt = new Date('2024-01-01T10:00:00Z');
    const ledger = createLedger({ sink, now: () => occurredAt });

    await ledger.deposit(ALICE, 60n);
    await ledger.withdraw(ALICE, 10n);
    await ledger.withdraw(ALICE, 15n);

    expect(published).toHaveLength(2);
    expect(published[0]).toMatchObject({
      type: 'Deposited',
      account: ALICE,
      amount: 60n,
      newBalance: 60n,
      occurredAt,
    });
    expect(published[1]).toMatchObject({ type: 'Withdrawn', account: ALICE, amount: 10n, newBalance: 50n });
    expect(published[0].eventId).not.toBe(published[1].eventId);
  });

  it('ignores a failing sink', async () => {
    const logger = quietLogger();
    const ledger = createLedger({
      logger,
      sink: {
        publish: async () => {
          throw new Error('sink offline');
        },
      },
    });

    const result = await ledger.deposit(ALICE, 60n);
    await new Promise((resolve) => setImmediate(resolve));

    expect(result).toEqual({ type: 'success', value: 60n });
    expect(ledger.balanceOf(ALICE)).toBe(60n);
    expect(logger.warn).toHaveBeenCalledWith(expect.objectContaining({ type: 'Deposited' }), 'Event sink rejected');
  });

  it('ignores a sink that throws synchronously', async () => {
    const logger = quietLogger();
    const ledger = createLedger({
      logger,
      sink: {
        publish: () => {
          throw new Error('sink broken');
        },
      },
    });

    expect(await ledger.deposit(ALICE, 5n)).toEqual({ type: 'success', value: 5n });
    expect(logger.warn).toHaveBeenCalledWith(expect.objectContaining({ type: 'Deposited' }), 'Event sink threw');
  });
});

describe('Ledger.snapshot', () => {
  it('copies balances and counters', async () => {
    const ledger = createLedger();
    await ledger.deposit(ALICE, 40n);
    await ledger.deposit(BOB, 20n);
    await ledger.withdraw(BOB, 5n);

    const snapshot = ledger.snapshot();
    snapshot.balances.set(ALICE, 0n);

    expect(ledger.balanceOf(ALICE)).toBe(40n);
    expect(snapshot).toMatchObject({ totalHeld: 55n, totalDeposits: 2, totalWithdrawals: 1 });
    expect(snapshot.balances.get(BOB)).toBe(15n);
  });
});
