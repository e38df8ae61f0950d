import { describeLedgerError, formatAmount, type LedgerError, type LedgerErrorKind } from '@custody-ledger/core';

export interface LedgerErrorReply {
  error: LedgerErrorKind;
  message: string;
  details: Record<string, string>;
}

const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
  ZeroAmount: 422,
  InvalidAmount: 422,
  WithdrawalCapExceeded: 422,
  CapExceeded: 409,
  InsufficientBalance: 409,
  ReleaseFailed: 502,
};

export function statusForLedgerError(error: LedgerError): number {
  return STATUS_BY_KIND[error.kind];
}

export function serialiseLedgerError(error: LedgerError): LedgerErrorReply {
  const details: Record<string, string> = {};
  for (const [key, value] of Object.entries(error)) {
    if (key === 'kind') {
      continue;
    }
    details[key] = typeof value === 'bigint' ? formatAmount(value) : String(value);
  }

  return { error: error.kind, message: describeLedgerError(error), details };
}
