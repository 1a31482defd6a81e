import { LAMPORTS_PER_SOL } from '@solana/web3.js';
import { RpcError, describeError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type {
  FailureKind,
  Quote,
  TokenInfo,
  TradeAction,
  TradeExecution,
  TradeRequest
} from '../core/types.js';
import { isTradeAction } from '../core/types.js';
import { fromSmallestUnits, toSmallestUnits } from '../core/units.js';
import type { BlockchainRpc } from '../chain/rpc.js';
import type { ExecutionMode, ExecutionStore } from '../data/executionStore.js';
import type { SwapAdapter } from '../exchanges/adapter.js';
import type { CircuitBreaker } from '../risk/circuitBreaker.js';
import type { RiskGate } from '../risk/tradeLimits.js';
import type { Wallet } from '../wallet/interface.js';
import type { ConfirmationPoller } from './confirmationPoller.js';
import { dryRunRecord, failedRecord, successRecord, type AttemptContext } from './records.js';

const MAX_SLIPPAGE_BPS = 10_000;

export interface TradeExecutorConfig {
  pair: { base: TokenInfo; quote: TokenInfo };
  /** Upper bound on `request.amount`, in base units; applies to dry-runs too. */
  maxTradeSize: number;
  defaultSlippageBps: number;
  dryRunMode: boolean;
  confirmationTimeoutSec: number;
}

export interface TradeExecutorDeps {
  swap: SwapAdapter;
  gate: RiskGate;
  poller: ConfirmationPoller;
  rpc: BlockchainRpc;
  store: ExecutionStore;
  logger: Logger;
  metrics: Metrics;
  /** Required for live trades only. */
  wallet?: Wallet;
  breaker?: CircuitBreaker;
  now?: () => number;
}

interface Route {
  input: TokenInfo;
  output: TokenInfo;
}

/** Price of one base token in quote tokens, as implied by a quote. */
const impliedBasePrice = (action: TradeAction, quote: Quote, route: Route): number | null => {
  const [baseUnits, quoteUnits] =
    action === 'SELL' ? [quote.inAmount, quote.outAmount] : [quote.outAmount, quote.inAmount];
  const [baseToken, quoteToken] = action === 'SELL' ? [route.input, route.output] : [route.output, route.input];
  if (baseUnits <= 0n) return null;
  return fromSmallestUnits(quoteUnits, quoteToken.decimals) / fromSmallestUnits(baseUnits, baseToken.decimals);
};

/**
 * Single entry point for trading. Every call ends in exactly one
 * TradeExecution, persisted before it is returned; the promise never rejects.
 */
export class TradeExecutor {
  private readonly now: () => number;

  constructor(
    private readonly config: TradeExecutorConfig,
    private readonly deps: TradeExecutorDeps
  ) {
    this.now = deps.now ?? Date.now;
  }

  /** BUY spends the quote asset for the base asset; SELL the reverse. */
  routeFor(action: TradeAction): Route {
    const { base, quote } = this.config.pair;
    return action === 'BUY' ? { input: quote, output: base } : { input: base, output: quote };
  }

  async executeTrade(request: TradeRequest): Promise<TradeExecution> {
    const startedAt = this.now();
    const route = isTradeAction(request.action) ? this.routeFor(request.action) : undefined;
    const ctx: AttemptContext = {
      timestamp: new Date(startedAt).toISOString(),
      signal: String(request.action),
      inputToken: route?.input.mint ?? '',
      outputToken: route?.output.mint ?? '',
      inputAmount: Number.isFinite(request.amount) ? request.amount : 0,
      slippageBps: request.slippageBps ?? this.config.defaultSlippageBps
    };
    const dryRun = request.dryRun ?? this.config.dryRunMode;
    const log = this.deps.logger.child({ signal: ctx.signal, amount: ctx.inputAmount, dryRun });

    let record: TradeExecution;
    try {
      record = await this.run(request, dryRun, ctx, startedAt, log);
    } catch (err) {
      log.error('unexpected error during trade execution', { error: err });
      record = failedRecord(ctx, 'unexpected', `Unexpected error: ${describeError(err)}`, {
        executionDurationSec: this.elapsedSec(startedAt)
      });
    }

    await this.persist(record, dryRun ? 'dry_run' : 'live', log);
    this.count(record);
    return record;
  }

  private async run(
    request: TradeRequest,
    dryRun: boolean,
    ctx: AttemptContext,
    startedAt: number,
    log: Logger
  ): Promise<TradeExecution> {
    const fail = (kind: FailureKind, message: string, extras: { expectedOutput?: number } = {}): TradeExecution => {
      log.warn('trade failed', { failureKind: kind, reason: message });
      return failedRecord(ctx, kind, message, { executionDurationSec: this.elapsedSec(startedAt), ...extras });
    };

    const { action, amount } = request;
    if (!isTradeAction(action)) {
      return fail('validation', `Invalid action: ${String(action)}. Must be 'BUY' or 'SELL'`);
    }
    if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
      return fail('validation', `Invalid amount: ${String(amount)}. Must be a positive number`);
    }
    const { slippageBps } = ctx;
    if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps > MAX_SLIPPAGE_BPS) {
      return fail('validation', `Invalid slippage: ${slippageBps} bps. Must be an integer between 0 and ${MAX_SLIPPAGE_BPS}`);
    }
    if (amount > this.config.maxTradeSize) {
      return fail('validation', `Amount ${amount} exceeds max trade size ${this.config.maxTradeSize}`);
    }
    // Amount is always denominated in the base asset, whichever side it is spent on.
    const amountUnits = toSmallestUnits(amount, this.config.pair.base.decimals);
    if (amountUnits === 0n) {
      return fail(
        'validation',
        `Invalid amount: ${amount} is below the smallest unit of ${this.config.pair.base.symbol} ` +
          `(${this.config.pair.base.decimals} decimals)`
      );
    }

    const { wallet } = this.deps;
    if (!dryRun) {
      if (!wallet) {
        return fail('validation', 'Live trading requires a configured wallet');
      }
      const decision = await this.deps.gate.checkLimits();
      if (!decision.allowed) {
        return fail('risk_blocked', decision.reason ?? 'Blocked by risk gate');
      }
    }

    const route = this.routeFor(action);

    let quote: Quote;
    try {
      log.info('fetching quote', { inputMint: route.input.mint, outputMint: route.output.mint, dryRun });
      quote = await this.deps.swap.getQuote(route.input.mint, route.output.mint, amountUnits, slippageBps);
    } catch (err) {
      return fail('quote_unavailable', describeError(err));
    }

    const price = impliedBasePrice(action, quote, route);
    if (price !== null) this.deps.breaker?.observePrice(price);

    const expectedOutput = fromSmallestUnits(quote.outAmount, route.output.decimals);

    if (dryRun) {
      log.info('dry run complete', { expectedOutput, priceImpactPct: quote.priceImpactPct });
      return dryRunRecord(ctx, action, expectedOutput, this.elapsedSec(startedAt));
    }

    if (!wallet) {
      return fail('validation', 'Live trading requires a configured wallet');
    }

    let stage: FailureKind = 'build_failed';
    try {
      const owner = wallet.getPublicKey();
      const unsigned = await this.deps.swap.buildSwapTransaction(quote, owner);
      const signed = await wallet.sign(unsigned);

      stage = 'submission_failed';
      const result = await this.deps.poller.submitAndConfirm(signed, this.config.confirmationTimeoutSec);

      switch (result.state) {
        case 'confirmed_success': {
          const actual = await this.settle(result.signature, owner, route.output, log);
          log.info('trade executed', { signature: result.signature, outputAmount: actual.outputAmount ?? expectedOutput });
          return successRecord(ctx, action, result.signature, actual.outputAmount ?? expectedOutput, {
            executionDurationSec: this.elapsedSec(startedAt),
            expectedOutput,
            ...(actual.feePaidSol !== undefined ? { feePaidSol: actual.feePaidSol } : {})
          });
        }
        case 'confirmed_failed':
          return fail('on_chain_error', `Transaction ${result.signature} failed on chain: ${result.onChainError}`, {
            expectedOutput
          });
        case 'timed_out':
          return fail(
            'confirmation_timeout',
            `Transaction ${result.signature} not confirmed within ${this.config.confirmationTimeoutSec}s; ` +
              'outcome unknown, verify by signature',
            { expectedOutput }
          );
      }
    } catch (err) {
      // A status query that failed after submission already quotes the signature.
      const kind = err instanceof RpcError && typeof err.details?.signature === 'string' ? 'unexpected' : stage;
      return fail(kind, describeError(err), { expectedOutput });
    }
  }

  /** Actual output and fee from the confirmed transaction; empty when the node cannot supply them. */
  private async settle(
    signature: string,
    owner: string,
    output: TokenInfo,
    log: Logger
  ): Promise<{ outputAmount?: number; feePaidSol?: number }> {
    try {
      const details = await this.deps.rpc.getTransactionDetails(signature, owner, output.mint);
      if (!details) return {};
      return {
        ...(details.balanceDelta !== undefined && details.balanceDelta > 0n
          ? { outputAmount: fromSmallestUnits(details.balanceDelta, output.decimals) }
          : {}),
        ...(details.feeLamports !== undefined ? { feePaidSol: details.feeLamports / LAMPORTS_PER_SOL } : {})
      };
    } catch (err) {
      log.warn('could not read confirmed transaction details, using quoted output', { signature, error: err });
      return {};
    }
  }

  private async persist(record: TradeExecution, mode: ExecutionMode, log: Logger): Promise<void> {
    try {
      await this.deps.store.saveExecution(record, mode);
    } catch (err) {
      log.error('failed to persist trade execution', { status: record.status, error: err });
      this.deps.metrics.increment('persistence.error');
    }
  }

  private count(record: TradeExecution): void {
    const { metrics } = this.deps;
    switch (record.status) {
      case 'success':
        metrics.increment('trade.success');
        break;
      case 'dry_run':
        metrics.increment('trade.dry_run');
        break;
      case 'failed':
        metrics.increment('trade.failed', 1, { kind: record.failureKind });
        if (record.failureKind === 'risk_blocked') metrics.increment('trade.blocked');
        break;
    }
  }

  private elapsedSec(startedAt: number): number {
    return (this.now() - startedAt) / 1000;
  }
}
