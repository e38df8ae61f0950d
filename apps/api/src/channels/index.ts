import type { ValueTransferChannel } from '@custody-ledger/core';
import { createMockChannel } from './mock.js';
import { createWebhookChannel } from './webhook.js';

type ChannelFactory = () => ValueTransferChannel;

const factories = new Map<string, ChannelFactory>();

export function registerChannel(name: string, factory: ChannelFactory): void {
  factories.set(name.toLowerCase(), factory);
}

export function getChannel(name: string): ValueTransferChannel {
  const factory = factories.get(name.toLowerCase());
  if (!factory) {
    throw new Error(`Release channel "${name}" not registered`);
  }
  return factory();
}

registerChannel('mock', createMockChannel);
registerChannel('webhook', createWebhookChannel);
