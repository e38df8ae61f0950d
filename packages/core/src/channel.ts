import type { AccountId } from './accounts.js';
import type { Amount } from './amounts.js';

export interface ReleaseRequest {
  transferId: string;
  account: AccountId;
  amount: Amount;
  // Aborted when the ledger stops waiting. A channel must not release after that.
  signal: AbortSignal;
}

export type ReleaseInstruction = Omit<ReleaseRequest, 'signal'>;

export type ReleaseOutcome =
  | { status: 'released'; reference: string }
  | { status: 'failed'; reason: string };

/**
 * Moves value out of custody. Implementations may run arbitrary receiver
 * logic, including calls back into the ledger, before settling.
 */
export interface ValueTransferChannel {
  release(request: ReleaseRequest): Promise<ReleaseOutcome>;
}

export function extractReason(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return typeof err === 'string' ? err : 'Unknown release error';
}

class ReleaseTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Release did not settle within ${timeoutMs}ms`);
    this.name = 'ReleaseTimeoutError';
  }
}

interface Deadline {
  expired: Promise<never>;
  cancel(): void;
}

function startDeadline(timeoutMs: number, controller: AbortController): Deadline {
  let cancel: () => void = () => undefined;
  const expired = new Promise<never>((_, reject) => {
    const timer = setTimeout(() => {
      const error = new ReleaseTimeoutError(timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
    cancel = () => clearTimeout(timer);
  });
  return { expired, cancel: () => cancel() };
}

/**
 * Runs a release and folds thrown errors and timeouts into a failed outcome.
 * On timeout the request's signal is aborted so the channel can cancel the
 * transfer it has in flight.
 */
export async function settleRelease(
  channel: ValueTransferChannel,
  instruction: ReleaseInstruction,
  timeoutMs?: number,
): Promise<ReleaseOutcome> {
  const controller = new AbortController();
  const deadline = timeoutMs === undefined ? null : startDeadline(timeoutMs, controller);
  try {
    const attempt = channel.release({ ...instruction, signal: controller.signal });
    return await (deadline ? Promise.race([attempt, deadline.expired]) : attempt);
  } catch (error) {
    return { status: 'failed', reason: extractReason(error) };
  } finally {
    deadline?.cancel();
  }
}
