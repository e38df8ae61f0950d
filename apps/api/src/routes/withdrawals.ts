import { formatAmount } from '@custody-ledger/core';
import type { FastifyInstance } from 'fastify';
import { serialiseLedgerError, statusForLedgerError, type LedgerErrorReply } from '../errors.js';
import { transferSchema } from '../validators.js';
import type { BalanceReply } from './deposits.js';

export async function registerWithdrawalRoutes(app: FastifyInstance) {
  app.post<{ Body: unknown; Reply: BalanceReply | LedgerErrorReply | { error: string; details?: unknown } }>(
    '/v1/withdrawals',
    async (request, reply) => {
      const callerId = request.callerId;
      if (!callerId) {
        reply.code(500).send({ error: 'Caller context missing' });
        return;
      }

      const parsed = transferSchema.safeParse(request.body);
      if (!parsed.success) {
        reply.code(422).send({ error: 'Invalid withdrawal payload', details: parsed.error.issues });
        return;
      }

      const result = await app.ledger.withdraw(callerId, parsed.data.amount);
      if (result.type === 'failure') {
        if (result.error.kind === 'ReleaseFailed') {
          request.log.warn({ callerId, reason: result.error.reason }, 'Withdrawal release failed');
        }
        reply.code(statusForLedgerError(result.error)).send(serialiseLedgerError(result.error));
        return;
      }

      reply.send({ account_id: callerId, balance: formatAmount(result.value) });
    },
  );
}
