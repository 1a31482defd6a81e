import { RpcError, describeError, isTransientError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { sleep, type BackoffRetrier } from '../core/retry.js';
import type { BlockchainRpc, SignatureStatus } from '../chain/rpc.js';

export type ConfirmationResult =
  | { state: 'confirmed_success'; signature: string; polls: number }
  | { state: 'confirmed_failed'; signature: string; polls: number; onChainError: string }
  | { state: 'timed_out'; signature: string; polls: number };

export interface ConfirmationPollerOptions {
  /** Delay between status queries (default 1000). */
  intervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const formatOnChainError = (err: unknown): string =>
  typeof err === 'string' ? err : JSON.stringify(err);

/**
 * submitted -> confirmed_success | confirmed_failed | timed_out.
 * Submission goes through the retrier; once a signature exists the
 * transaction is never sent again.
 */
export class ConfirmationPoller {
  private readonly intervalMs: number;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly rpc: BlockchainRpc,
    private readonly retrier: BackoffRetrier,
    private readonly logger: Logger,
    options: ConfirmationPollerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 1000;
    this.wait = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    if (!(this.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be > 0, got ${this.intervalMs}`);
    }
  }

  async submitAndConfirm(signedTx: Uint8Array, timeoutSec: number): Promise<ConfirmationResult> {
    const signature = await this.retrier.execute(() => this.rpc.sendTransaction(signedTx), 'rpc.submit');
    this.logger.info('transaction submitted', { signature });

    const timeoutMs = timeoutSec * 1000;
    const maxPolls = Math.max(1, Math.floor(timeoutMs / this.intervalMs));
    const startedAt = this.now();
    let polls = 0;

    // The deadline is checked after each query, so the last scheduled poll always runs.
    while (polls < maxPolls) {
      await this.wait(this.intervalMs);
      polls += 1;

      const status = await this.queryStatus(signature, polls);
      if (status?.confirmed) {
        if (status.err === null || status.err === undefined) {
          this.logger.info('transaction confirmed', { signature, polls });
          return { state: 'confirmed_success', signature, polls };
        }
        const onChainError = formatOnChainError(status.err);
        this.logger.error('transaction failed on chain', { signature, polls, onChainError });
        return { state: 'confirmed_failed', signature, polls, onChainError };
      }

      if (this.now() - startedAt >= timeoutMs) break;
    }

    this.logger.warn('transaction confirmation timed out', { signature, polls, timeoutSec });
    return { state: 'timed_out', signature, polls };
  }

  /** Undefined when the query failed transiently; the poll then counts as pending. */
  private async queryStatus(signature: string, poll: number): Promise<SignatureStatus | undefined> {
    try {
      return await this.rpc.getSignatureStatus(signature);
    } catch (err) {
      if (!isTransientError(err)) {
        throw new RpcError(`Status query failed for ${signature}: ${describeError(err)}`, { signature }, { cause: err });
      }
      this.logger.warn('status query failed, will poll again', { signature, poll, error: err });
      return undefined;
    }
  }
}
