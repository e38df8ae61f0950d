import type { AccountId } from './accounts.js';
import { parseAmount, type Amount } from './amounts.js';
import { settleRelease, type ValueTransferChannel } from './channel.js';
import {
  InvalidConfigurationError,
  failure,
  success,
  type LedgerError,
  type LedgerResult,
} from './errors.js';
import {
  consoleLogger,
  noopSink,
  publishEvent,
  type EventSink,
  type LedgerEvent,
  type LedgerEventType,
  type LedgerLogger,
} from './events.js';
import { generateId } from './ids.js';
import { SerialExecutor } from './serial.js';

export interface LedgerOptions {
  bankCap: unknown;
  perWithdrawalCap: unknown;
  channel: ValueTransferChannel;
  sink?: EventSink;
  logger?: LedgerLogger;
  releaseTimeoutMs?: number;
  now?: () => Date;
}

export interface LedgerSnapshot {
  balances: Map<AccountId, Amount>;
  totalHeld: Amount;
  totalDeposits: number;
  totalWithdrawals: number;
}

/**
 * Single-asset custodial ledger.
 *
 * Withdrawals follow check, decrement, release, then commit or roll back.
 * The caller's balance is reduced before the channel is invoked, so any call
 * the receiver makes back into the ledger sees the reduced balance. A failed
 * release restores exactly what the withdrawal removed.
 */
export class Ledger {
  readonly bankCap: Amount;
  readonly perWithdrawalCap: Amount;

  private readonly balances = new Map<AccountId, Amount>();
  private held: Amount = 0n;
  // Value removed from `held` by withdrawals whose release has not settled.
  private reserved: Amount = 0n;
  private deposits = 0;
  private withdrawals = 0;

  private readonly channel: ValueTransferChannel;
  private readonly sink: EventSink;
  private readonly logger: LedgerLogger;
  private readonly releaseTimeoutMs: number | undefined;
  private readonly now: () => Date;
  private readonly serial = new SerialExecutor();

  constructor(options: LedgerOptions) {
    const bankCap = parseAmount(options.bankCap);
    if (bankCap === null) {
      throw new InvalidConfigurationError('bankCap', options.bankCap);
    }
    const perWithdrawalCap = parseAmount(options.perWithdrawalCap);
    if (perWithdrawalCap === null) {
      throw new InvalidConfigurationError('perWithdrawalCap', options.perWithdrawalCap);
    }
    const timeout = options.releaseTimeoutMs;
    if (timeout !== undefined && (!Number.isSafeInteger(timeout) || timeout <= 0)) {
      throw new InvalidConfigurationError('releaseTimeoutMs', timeout);
    }

    this.bankCap = bankCap;
    this.perWithdrawalCap = perWithdrawalCap;
    this.channel = options.channel;
    this.sink = options.sink ?? noopSink;
    this.logger = options.logger ?? consoleLogger;
    this.releaseTimeoutMs = timeout;
    this.now = options.now ?? (() => new Date());
  }

  get totalDeposits(): number {
    return this.deposits;
  }

  get totalWithdrawals(): number {
    return this.withdrawals;
  }

  balanceOf(account: AccountId): Amount {
    return this.balances.get(account) ?? 0n;
  }

  totalHeld(): Amount {
    return this.held;
  }

  snapshot(): LedgerSnapshot {
    return {
      balances: new Map(this.balances),
      totalHeld: this.held,
      totalDeposits: this.deposits,
      totalWithdrawals: this.withdrawals,
    };
  }

  async deposit(caller: AccountId, amount: Amount): Promise<LedgerResult<Amount>> {
    const result = await this.serial.run(async () => this.applyDeposit(caller, amount));
    this.announce('Deposited', caller, amount, result);
    return result;
  }

  async withdraw(caller: AccountId, amount: Amount): Promise<LedgerResult<Amount>> {
    const result = await this.serial.run(() => this.applyWithdrawal(caller, amount));
    this.announce('Withdrawn', caller, amount, result);
    return result;
  }

  private applyDeposit(caller: AccountId, amount: Amount): LedgerResult<Amount> {
    const invalid = checkAmount(amount);
    if (invalid) {
      return failure(invalid);
    }

    const currentHeld = this.held + this.reserved;
    if (currentHeld + amount > this.bankCap) {
      return failure({ kind: 'CapExceeded', attempted: amount, currentHeld, cap: this.bankCap });
    }

    const newBalance = this.balanceOf(caller) + amount;
    this.balances.set(caller, newBalance);
    this.held += amount;
    this.deposits += 1;
    return success(newBalance);
  }

  private async applyWithdrawal(caller: AccountId, amount: Amount): Promise<LedgerResult<Amount>> {
    const invalid = checkAmount(amount);
    if (invalid) {
      return failure(invalid);
    }
    if (amount > this.perWithdrawalCap) {
      return failure({ kind: 'WithdrawalCapExceeded', attempted: amount, cap: this.perWithdrawalCap });
    }
    const available = this.balanceOf(caller);
    if (amount > available) {
      return failure({ kind: 'InsufficientBalance', attempted: amount, available });
    }

    this.balances.set(caller, available - amount);
    this.held -= amount;
    this.reserved += amount;

    const transferId = generateId();
    const outcome = await settleRelease(
      this.channel,
      { transferId, account: caller, amount },
      this.releaseTimeoutMs,
    );
    this.reserved -= amount;

    if (outcome.status === 'failed') {
      // Re-entrant calls may have moved the balance since; restore only our share.
      this.balances.set(caller, this.balanceOf(caller) + amount);
      this.held += amount;
      this.logger.warn(
        { transferId, account: caller, amount: amount.toString(), reason: outcome.reason },
        'Release failed, withdrawal rolled back',
      );
      return failure({ kind: 'ReleaseFailed', attempted: amount, reason: outcome.reason });
    }

    this.withdrawals += 1;
    this.logger.info(
      { transferId, account: caller, amount: amount.toString(), reference: outcome.reference },
      'Withdrawal released',
    );
    return success(this.balanceOf(caller));
  }

  private announce(
    type: LedgerEventType,
    account: AccountId,
    amount: Amount,
    result: LedgerResult<Amount>,
  ): void {
    if (result.type !== 'success') {
      return;
    }
    const event: LedgerEvent = {
      type,
      eventId: generateId(),
      account,
      amount,
      newBalance: result.value,
      occurredAt: this.now(),
    };
    publishEvent(this.sink, event, this.logger);
  }
}

function checkAmount(amount: Amount): LedgerError | null {
  if (amount < 0n) {
    return { kind: 'InvalidAmount', attempted: amount };
  }
  if (amount === 0n) {
    return { kind: 'ZeroAmount' };
  }
  return null;
}
