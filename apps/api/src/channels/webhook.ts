import { createHmac } from 'crypto';
import { fetch } from 'undici';
import { z } from 'zod';
import {
  extractReason,
  formatAmount,
  type ReleaseOutcome,
  type ReleaseRequest,
  type ValueTransferChannel,
} from '@custody-ledger/core';
import { CONFIG } from '../config.js';

export interface WebhookChannelOptions {
  url: string;
  secret?: string;
}

const releaseReplySchema = z.object({
  reference: z.string().min(1).optional(),
});

/**
 * Releases funds by POSTing the transfer to a payout endpoint. Any 2xx
 * response counts as released, unless the ledger aborted the request first.
 */
export class WebhookChannel implements ValueTransferChannel {
  constructor(private readonly options: WebhookChannelOptions) {}

  async release(request: ReleaseRequest): Promise<ReleaseOutcome> {
    const body = JSON.stringify({
      transfer_id: request.transferId,
      account_id: request.account,
      amount: formatAmount(request.amount),
    });

    const headers: Record<string, string> = {
      'content-type': 'application/json',
      'idempotency-key': request.transferId,
    };

    if (this.options.secret) {
      headers['x-signature-sha256'] = createHmac('sha256', this.options.secret).update(body).digest('hex');
    }

    try {
      const response = await fetch(this.options.url, { method: 'POST', headers, body, signal: request.signal });
      const text = await response.text();

      if (request.signal.aborted) {
        return { status: 'failed', reason: extractReason(request.signal.reason) };
      }

      if (!response.ok) {
        return { status: 'failed', reason: `Release endpoint responded ${response.status}: ${text.slice(0, 400)}` };
      }

      return { status: 'released', reference: parseReference(text) ?? request.transferId };
    } catch (error) {
      return { status: 'failed', reason: extractReason(error) };
    }
  }
}

function parseReference(text: string): string | undefined {
  if (!text) {
    return undefined;
  }
  try {
    const parsed = releaseReplySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.reference : undefined;
  } catch {
    return undefined;
  }
}

export function createWebhookChannel(): ValueTransferChannel {
  if (!CONFIG.releaseUrl) {
    throw new Error('LEDGER_RELEASE_URL is required for the webhook release channel');
  }
  return new WebhookChannel({ url: CONFIG.releaseUrl, secret: CONFIG.releaseSecret });
}
