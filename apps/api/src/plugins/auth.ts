import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Pool } from 'pg';
import { promisify } from 'util';
import { scrypt as scryptCb, timingSafeEqual } from 'crypto';
import { normaliseAccountId } from '@custody-ledger/core';

const scrypt = promisify(scryptCb);

const PUBLIC_ROUTES = new Set(['/healthz']);

async function verifyApiKey(db: Pool, callerId: string, apiKey: string) {
  const result = await db.query<{
    api_key_hash: Buffer | string;
    salt: Buffer | string;
  }>(
    `SELECT api_key_hash, salt
       FROM caller_api_keys
      WHERE caller_id = $1 AND active = true`,
    [callerId],
  );

  if (result.rowCount === 0) {
    return false;
  }

  const { api_key_hash: hashValue, salt: saltValue } = result.rows[0];
  const hash = normaliseBytea(hashValue);
  const salt = normaliseBytea(saltValue);
  const derived = (await scrypt(apiKey, salt, hash.length)) as Buffer;

  if (derived.length !== hash.length) {
    return false;
  }
  return timingSafeEqual(derived, hash);
}

function normaliseBytea(value: Buffer | string): Buffer {
  if (Buffer.isBuffer(value)) {
    if (value.length >= 2 && value[0] === 0x5c && value[1] === 0x78) {
      const hex = value.toString('utf8').slice(2);
      return Buffer.from(hex, 'hex');
    }
    return value;
  }

  const hex = value.startsWith('\\x') ? value.slice(2) : value;
  return Buffer.from(hex, 'hex');
}

async function authenticateRequest(request: FastifyRequest, reply: FastifyReply) {
  const routeUrl = request.routeOptions?.url;
  if (routeUrl && PUBLIC_ROUTES.has(routeUrl)) {
    return;
  }

  const callerIdHeader = request.headers['x-caller-id'];
  const apiKeyHeader = request.headers['x-api-key'];

  if (!callerIdHeader || !apiKeyHeader) {
    reply.code(401).send({ error: 'Missing caller credentials' });
    return reply;
  }

  const callerId = normaliseAccountId(String(callerIdHeader));
  if (!callerId) {
    reply.code(401).send({ error: 'Missing caller credentials' });
    return reply;
  }

  const valid = await verifyApiKey(request.server.db, callerId, String(apiKeyHeader));

  if (!valid) {
    reply.code(401).send({ error: 'Invalid credentials' });
    return reply;
  }

  request.callerId = callerId;
  return;
}

export default fp(async (app: FastifyInstance) => {
  app.addHook('preHandler', authenticateRequest);
});
