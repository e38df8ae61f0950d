import 'fastify';
import type { Ledger } from '@custody-ledger/core';
import type { Pool } from 'pg';

declare module 'fastify' {
  interface FastifyInstance {
    db: Pool;
    ledger: Ledger;
  }

  interface FastifyRequest {
    callerId?: string;
  }
}
