export type Amount = bigint;

const DIGITS = /^\d+$/;

export function parseAmount(value: unknown): Amount | null {
  if (typeof value === 'bigint') {
    return value >= 0n ? value : null;
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      return null;
    }
    return BigInt(value);
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    return DIGITS.test(trimmed) ? BigInt(trimmed) : null;
  }

  return null;
}

export function formatAmount(amount: Amount): string {
  return amount.toString(10);
}
