import { formatAmount, type Amount } from './amounts.js';

export interface ZeroAmountError {
  kind: 'ZeroAmount';
}

export interface InvalidAmountError {
  kind: 'InvalidAmount';
  attempted: Amount;
}

export interface CapExceededError {
  kind: 'CapExceeded';
  attempted: Amount;
  currentHeld: Amount;
  cap: Amount;
}

export interface WithdrawalCapExceededError {
  kind: 'WithdrawalCapExceeded';
  attempted: Amount;
  cap: Amount;
}

export interface InsufficientBalanceError {
  kind: 'InsufficientBalance';
  attempted: Amount;
  available: Amount;
}

export interface ReleaseFailedError {
  kind: 'ReleaseFailed';
  attempted: Amount;
  reason: string;
}

export type LedgerError =
  | ZeroAmountError
  | InvalidAmountError
  | CapExceededError
  | WithdrawalCapExceededError
  | InsufficientBalanceError
  | ReleaseFailedError;

export type LedgerErrorKind = LedgerError['kind'];

export interface LedgerSuccess<T> {
  type: 'success';
  value: T;
}

export interface LedgerFailure {
  type: 'failure';
  error: LedgerError;
}

export type LedgerResult<T> = LedgerSuccess<T> | LedgerFailure;

export function success<T>(value: T): LedgerSuccess<T> {
  return { type: 'success', value };
}

export function failure(error: LedgerError): LedgerFailure {
  return { type: 'failure', error };
}

export function describeLedgerError(error: LedgerError): string {
  switch (error.kind) {
    case 'ZeroAmount':
      return 'Amount must be greater than zero';
    case 'InvalidAmount':
      return `Amount ${formatAmount(error.attempted)} is not a non-negative integer`;
    case 'CapExceeded':
      return `Deposit of ${formatAmount(error.attempted)} would exceed bank cap ${formatAmount(error.cap)} (currently held ${formatAmount(error.currentHeld)})`;
    case 'WithdrawalCapExceeded':
      return `Withdrawal of ${formatAmount(error.attempted)} exceeds per-withdrawal cap ${formatAmount(error.cap)}`;
    case 'InsufficientBalance':
      return `Withdrawal of ${formatAmount(error.attempted)} exceeds available balance ${formatAmount(error.available)}`;
    case 'ReleaseFailed':
      return `Release of ${formatAmount(error.attempted)} failed: ${error.reason}`;
  }
}

export type ConfigurationField = 'bankCap' | 'perWithdrawalCap' | 'releaseTimeoutMs';

/**
 * Thrown by the Ledger constructor when a limit cannot be represented as an
 * unsigned amount. It is the only ledger error raised as an exception.
 */
export class InvalidConfigurationError extends Error {
  readonly kind = 'InvalidConfiguration';

  constructor(
    readonly field: ConfigurationField,
    readonly value: unknown,
  ) {
    super(`Invalid ledger configuration: ${field}=${String(value)}`);
    this.name = 'InvalidConfigurationError';
  }
}
