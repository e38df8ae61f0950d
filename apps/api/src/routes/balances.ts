import { formatAmount } from '@custody-ledger/core';
import type { FastifyInstance } from 'fastify';
import { accountParamsSchema } from '../validators.js';
import type { BalanceReply } from './deposits.js';

export async function registerBalanceRoutes(app: FastifyInstance) {
  app.get<{ Params: { account_id: string }; Reply: BalanceReply | { error: string } }>(
    '/v1/accounts/:account_id/balance',
    async (request, reply) => {
      const params = accountParamsSchema.safeParse(request.params);
      if (!params.success) {
        reply.code(400).send({ error: 'Invalid account id' });
        return;
      }

      const accountId = params.data.account_id;
      reply.send({ account_id: accountId, balance: formatAmount(app.ledger.balanceOf(accountId)) });
    },
  );
}
