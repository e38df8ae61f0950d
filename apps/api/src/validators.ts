import { parseAmount } from '@custody-ledger/core';
import { z } from 'zod';

export const amountSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const amount = parseAmount(value);
  if (amount === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'amount must be an unsigned integer' });
    return z.NEVER;
  }
  return amount;
});

export const transferSchema = z.object({
  amount: amountSchema,
});

export const accountParamsSchema = z.object({
  account_id: z.string().trim().min(1),
});
