import { formatAmount } from '@custody-ledger/core';
import type { FastifyInstance } from 'fastify';
import { serialiseLedgerError, statusForLedgerError, type LedgerErrorReply } from '../errors.js';
import { transferSchema } from '../validators.js';

export interface BalanceReply {
  account_id: string;
  balance: string;
}

export async function registerDepositRoutes(app: FastifyInstance) {
  app.post<{ Body: unknown; Reply: BalanceReply | LedgerErrorReply | { error: string; details?: unknown } }>(
    '/v1/deposits',
    async (request, reply) => {
      const callerId = request.callerId;
      if (!callerId) {
        reply.code(500).send({ error: 'Caller context missing' });
        return;
      }

      const parsed = transferSchema.safeParse(request.body);
      if (!parsed.success) {
        reply.code(422).send({ error: 'Invalid deposit payload', details: parsed.error.issues });
        return;
      }

      const result = await app.ledger.deposit(callerId, parsed.data.amount);
      if (result.type === 'failure') {
        reply.code(statusForLedgerError(result.error)).send(serialiseLedgerError(result.error));
        return;
      }

      reply.send({ account_id: callerId, balance: formatAmount(result.value) });
    },
  );
}
