import { describe, expect, it } from 'vitest';
import { formatAmount, parseAmount } from './amounts.js';

describe('parseAmount', () => {
  it('accepts unsigned integers in every supported form', () => {
    expect(parseAmount(42n)).toBe(42n);
    expect(parseAmount(0)).toBe(0n);
    expect(parseAmount(' 900 ')).toBe(900n);
    expect(parseAmount('18446744073709551616')).toBe(18446744073709551616n);
  });

  it('rejects negative, fractional and non-numeric values', () => {
    expect(parseAmount(-1n)).toBeNull();
    expect(parseAmount(-3)).toBeNull();
    expect(parseAmount(1.5)).toBeNull();
    expect(parseAmount(Number.MAX_SAFE_INTEGER + 2)).toBeNull();
    expect(parseAmount('-7')).toBeNull();
    expect(parseAmount('1e3')).toBeNull();
    expect(parseAmount('')).toBeNull();
    expect(parseAmount(null)).toBeNull();
  });
});

describe('formatAmount', () => {
  it('renders base-10 digits', () => {
    expect(formatAmount(1234567890123456789012n)).toBe('1234567890123456789012');
  });
});
