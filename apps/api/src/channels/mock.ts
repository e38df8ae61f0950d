import { extractReason, formatAmount, type ReleaseOutcome, type ReleaseRequest, type ValueTransferChannel } from '@custody-ledger/core';

export interface MockRelease {
  transferId: string;
  reference: string;
  account: string;
  amount: string;
}

const releases: MockRelease[] = [];
const failingAccounts = new Set<string>();

export class MockChannel implements ValueTransferChannel {
  async release(request: ReleaseRequest): Promise<ReleaseOutcome> {
    if (request.signal.aborted) {
      return { status: 'failed', reason: extractReason(request.signal.reason) };
    }
    if (failingAccounts.has(request.account)) {
      return { status: 'failed', reason: `mock receiver ${request.account} rejected transfer` };
    }

    const reference = `mock_release_${request.transferId}`;
    releases.push({
      transferId: request.transferId,
      reference,
      account: request.account,
      amount: formatAmount(request.amount),
    });
    return { status: 'released', reference };
  }
}

export function createMockChannel(): ValueTransferChannel {
  return new MockChannel();
}

export function failMockReleasesFor(account: string): void {
  failingAccounts.add(account);
}

export function listMockReleases(): MockRelease[] {
  return [...releases];
}

export function resetMockChannel(): void {
  releases.length = 0;
  failingAccounts.clear();
}
