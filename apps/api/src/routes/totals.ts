import { formatAmount } from '@custody-ledger/core';
import type { FastifyInstance } from 'fastify';

interface TotalsReply {
  total_held: string;
  bank_cap: string;
  per_withdrawal_cap: string;
  total_deposits: number;
  total_withdrawals: number;
}

export async function registerTotalsRoutes(app: FastifyInstance) {
  app.get<{ Reply: TotalsReply }>('/v1/ledger', async () => {
    const { ledger } = app;
    return {
      total_held: formatAmount(ledger.totalHeld()),
      bank_cap: formatAmount(ledger.bankCap),
      per_withdrawal_cap: formatAmount(ledger.perWithdrawalCap),
      total_deposits: ledger.totalDeposits,
      total_withdrawals: ledger.totalWithdrawals,
    };
  });
}
