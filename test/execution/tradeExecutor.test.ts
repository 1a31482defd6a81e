import { describe, it, expect } from 'vitest';
import { TradeExecutor, type TradeExecutorConfig } from '../../src/execution/tradeExecutor.js';
import { ConfirmationPoller } from '../../src/execution/confirmationPoller.js';
import { BackoffRetrier } from '../../src/core/retry.js';
import { InMemoryMetrics } from '../../src/core/metrics.js';
import { QuoteUnavailableError, SubmissionError, TransactionBuildError } from '../../src/core/errors.js';
import { SOL_MINT, USDT_MINT } from '../../src/config/schema.js';
import { InMemoryExecutionStore } from '../../src/data/inMemoryExecutionStore.js';
import type { ExecutionStore } from '../../src/data/executionStore.js';
import type { SwapAdapter } from '../../src/exchanges/adapter.js';
import { CircuitBreaker } from '../../src/risk/circuitBreaker.js';
import { TradeLimitsGate, type RiskGate } from '../../src/risk/tradeLimits.js';
import type { Wallet } from '../../src/wallet/interface.js';
import {
  TEST_WALLET_ADDRESS,
  createFakeClock,
  createFakeRpc,
  createFakeSwap,
  createFakeWallet,
  createMockLogger,
  makeQuote,
  makeSuccess,
  type FakeRpcOptions,
} from '../helpers.js';

const CONFIG: TradeExecutorConfig = {
  pair: {
    base: { mint: SOL_MINT, symbol: 'SOL', decimals: 9 },
    quote: { mint: USDT_MINT, symbol: 'USDT', decimals: 6 },
  },
  maxTradeSize: 0.1,
  defaultSlippageBps: 50,
  dryRunMode: true,
  confirmationTimeoutSec: 30,
};

interface HarnessOptions {
  config?: Partial<TradeExecutorConfig>;
  limits?: { maxTradesPerDay: number; maxTradesPerHour: number };
  swap?: ReturnType<typeof createFakeSwap>;
  rpc?: FakeRpcOptions;
  wallet?: Wallet | null;
  store?: ExecutionStore;
  gate?: RiskGate;
}

const makeHarness = (options: HarnessOptions = {}) => {
  const clock = createFakeClock();
  const logger = createMockLogger();
  const metrics = new InMemoryMetrics();
  const store = options.store ?? new InMemoryExecutionStore();
  const swap = options.swap ?? createFakeSwap();
  const rpc = createFakeRpc(options.rpc);
  const wallet = options.wallet === null ? undefined : (options.wallet ?? createFakeWallet());
  const breaker = new CircuitBreaker({ priceChangePct: 20 }, logger, metrics, clock.now);
  const gate =
    options.gate ??
    new TradeLimitsGate(options.limits ?? { maxTradesPerDay: 20, maxTradesPerHour: 5 }, store, breaker, logger, clock.now);
  const retrier = new BackoffRetrier({ maxAttempts: 3, backoffFactor: 2 }, logger, metrics, clock.sleep);
  const poller = new ConfirmationPoller(rpc, retrier, logger, { intervalMs: 1000, sleep: clock.sleep, now: clock.now });

  const executor = new TradeExecutor(
    { ...CONFIG, ...options.config },
    {
      swap,
      gate,
      poller,
      rpc,
      store,
      breaker,
      logger,
      metrics,
      now: clock.now,
      ...(wallet ? { wallet } : {}),
    }
  );
  return { executor, clock, logger, metrics, store, swap, rpc, breaker };
};

describe('TradeExecutor', () => {
  // ── end-to-end scenarios ──────────────────────────────────────

  it('BUY 0.01 dry-run yields the expected output with no submission', async () => {
    const swap = createFakeSwap((input, output, amount) =>
      makeQuote({ inputMint: input, outputMint: output, inAmount: amount, outAmount: 5_000_000n })
    );
    const h = makeHarness({ swap });

    const record = await h.executor.executeTrade({ action: 'BUY', amount: 0.01, dryRun: true });

    expect(record).toEqual({
      timestamp: '2024-06-15T12:00:00.000Z',
      signal: 'BUY',
      inputToken: USDT_MINT,
      outputToken: SOL_MINT,
      inputAmount: 0.01,
      slippageBps: 50,
      executionDurationSec: 0,
      status: 'dry_run',
      expectedOutput: 0.005,
    });
    expect(record).not.toHaveProperty('transactionSignature');
    expect(swap.quoteCalls).toEqual([
      { inputMint: USDT_MINT, outputMint: SOL_MINT, amount: 10_000_000n, slippageBps: 50 },
    ]);
    expect(swap.buildCalls).toHaveLength(0);
    expect(h.rpc.submitted).toHaveLength(0);
  });

  it('SELL 0.01 live with an on-chain slippage error yields a failed record without a signature', async () => {
    const h = makeHarness({
      rpc: { signature: 'SIG1', statuses: [{ confirmed: true, err: 'SlippageToleranceExceeded' }] },
    });

    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });

    expect(record.status).toBe('failed');
    expect(record).not.toHaveProperty('transactionSignature');
    expect(record.status === 'failed' && record.failureKind).toBe('on_chain_error');
    expect(record.status === 'failed' && record.errorMessage).toBe(
      'Transaction SIG1 failed on chain: SlippageToleranceExceeded'
    );
    expect(record.expectedOutput).toBe(1.5);
    expect(record.executionDurationSec).toBe(1);
    expect(h.rpc.submitted).toHaveLength(1);
    expect(h.rpc.statusCalls).toBe(1);
  });

  // ── validation & size ─────────────────────────────────────────

  it.each([true, false])('rejects an amount above the max trade size before any call (dryRun=%s)', async (dryRun) => {
    const h = makeHarness();
    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.5, dryRun });

    expect(record.status).toBe('failed');
    expect(record.status === 'failed' && record.failureKind).toBe('validation');
    expect(record.status === 'failed' && record.errorMessage).toBe('Amount 0.5 exceeds max trade size 0.1');
    expect(h.swap.quoteCalls).toHaveLength(0);
    expect(h.swap.buildCalls).toHaveLength(0);
    expect(h.rpc.submitted).toHaveLength(0);
  });

  it('rejects an unknown action and records it verbatim', async () => {
    const h = makeHarness();
    const record = await h.executor.executeTrade({ action: 'HOLD', amount: 0.01 });

    expect(record).toMatchObject({
      status: 'failed',
      failureKind: 'validation',
      signal: 'HOLD',
      inputToken: '',
      outputToken: '',
      errorMessage: "Invalid action: HOLD. Must be 'BUY' or 'SELL'",
    });
    expect(h.swap.quoteCalls).toHaveLength(0);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects amount %s', async (amount) => {
    const h = makeHarness();
    const record = await h.executor.executeTrade({ action: 'BUY', amount });
    expect(record.status === 'failed' && record.failureKind).toBe('validation');
    expect(h.swap.quoteCalls).toHaveLength(0);
  });

  it('rejects an amount smaller than one lamport before quoting', async () => {
    const h = makeHarness();
    const record = await h.executor.executeTrade({ action: 'SELL', amount: 1e-10, dryRun: true });

    expect(record).toMatchObject({
      status: 'failed',
      failureKind: 'validation',
      errorMessage: 'Invalid amount: 1e-10 is below the smallest unit of SOL (9 decimals)',
    });
    expect(h.swap.quoteCalls).toHaveLength(0);
  });

  it('rejects slippage outside 0-10000 bps', async () => {
    const h = makeHarness();
    const record = await h.executor.executeTrade({ action: 'BUY', amount: 0.01, slippageBps: 10_001 });
    expect(record.status === 'failed' && record.failureKind).toBe('validation');
  });

  it('passes an explicit slippage through to the quote', async () => {
    const h = makeHarness();
    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, slippageBps: 100 });
    expect(record.slippageBps).toBe(100);
    expect(h.swap.quoteCalls[0]?.slippageBps).toBe(100);
  });

  // ── risk gate ─────────────────────────────────────────────────

  it('blocks a live trade at the daily limit but lets the same dry-run through', async () => {
    const store = new InMemoryExecutionStore();
    await store.saveExecution(makeSuccess({ timestamp: '2024-06-15T08:00:00.000Z' }));
    await store.saveExecution(makeSuccess({ timestamp: '2024-06-15T09:00:00.000Z' }));
    const h = makeHarness({ store, limits: { maxTradesPerDay: 2, maxTradesPerHour: 5 } });

    const live = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(live).toMatchObject({
      status: 'failed',
      failureKind: 'risk_blocked',
      errorMessage: 'Daily trade limit reached (2/2)',
    });
    expect(h.swap.quoteCalls).toHaveLength(0);

    const preview = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: true });
    expect(preview.status).toBe('dry_run');
    expect(h.metrics.counter('trade.blocked')).toBe(1);
  });

  it('does not charge a failed dry-run against the live quota', async () => {
    let calls = 0;
    const swap = createFakeSwap((input, output, amount) => {
      calls += 1;
      if (calls === 1) throw new QuoteUnavailableError('Quote unavailable: HTTP 503');
      return makeQuote({ inputMint: input, outputMint: output, inAmount: amount });
    });
    const h = makeHarness({ swap, limits: { maxTradesPerDay: 20, maxTradesPerHour: 1 } });

    const preview = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: true });
    expect(preview.status === 'failed' && preview.failureKind).toBe('quote_unavailable');

    const live = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(live.status).toBe('success');
    expect(await h.store.countLiveTradesSince(0)).toBe(1);
  });

  it('does not charge validation rejects against the live quota', async () => {
    const h = makeHarness({ limits: { maxTradesPerDay: 20, maxTradesPerHour: 1 } });

    const rejected = await h.executor.executeTrade({ action: 'SELL', amount: 5, dryRun: false });
    expect(rejected.status === 'failed' && rejected.failureKind).toBe('validation');

    const live = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(live.status).toBe('success');
  });

  it('reopens the hourly window once the last real trade ages out, despite blocked retries', async () => {
    const h = makeHarness({ limits: { maxTradesPerDay: 20, maxTradesPerHour: 1 } });

    const first = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(first.status).toBe('success');

    h.clock.advance(50 * 60_000);
    const blocked = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(blocked.status === 'failed' && blocked.errorMessage).toBe('Hourly trade limit reached (1/1)');

    h.clock.advance(15 * 60_000);
    const retried = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(retried.status).toBe('success');
    expect(await h.store.countLiveTradesSince(0)).toBe(2);
  });

  it('allows dry-runs while the circuit breaker is tripped', async () => {
    const h = makeHarness();
    h.breaker.trip('manual halt');

    const preview = await h.executor.executeTrade({ action: 'BUY', amount: 0.01, dryRun: true });
    expect(preview.status).toBe('dry_run');

    const live = await h.executor.executeTrade({ action: 'BUY', amount: 0.01, dryRun: false });
    expect(live.status === 'failed' && live.errorMessage).toBe('Circuit breaker active: manual halt');
    expect(h.rpc.submitted).toHaveLength(0);
  });

  it('falls back to the configured dry-run mode', async () => {
    const h = makeHarness({ config: { dryRunMode: true } });
    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01 });
    expect(record.status).toBe('dry_run');
    expect(h.rpc.submitted).toHaveLength(0);
  });

  it('refuses a live trade without a wallet before quoting', async () => {
    const h = makeHarness({ wallet: null });
    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(record).toMatchObject({ status: 'failed', failureKind: 'validation' });
    expect(h.swap.quoteCalls).toHaveLength(0);
  });

  // ── quote ─────────────────────────────────────────────────────

  it('turns a quote failure into a failed record', async () => {
    const swap = createFakeSwap(() => {
      throw new QuoteUnavailableError('Quote unavailable: HTTP 503');
    });
    const h = makeHarness({ swap });

    const record = await h.executor.executeTrade({ action: 'BUY', amount: 0.01, dryRun: true });
    expect(record).toMatchObject({
      status: 'failed',
      failureKind: 'quote_unavailable',
      errorMessage: 'Quote unavailable: HTTP 503',
    });
  });

  it('feeds the quote-implied SOL price to the circuit breaker', async () => {
    const h = makeHarness();
    await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: true });
    expect(h.breaker.getState().lastPrice).toBeCloseTo(150, 9);
  });

  // ── live path ─────────────────────────────────────────────────

  it('records the actual output and fee of a confirmed trade', async () => {
    const h = makeHarness({
      rpc: { signature: 'SIG1', details: { feeLamports: 5000, balanceDelta: 1_480_000n } },
    });

    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });

    expect(record).toEqual({
      timestamp: '2024-06-15T12:00:00.000Z',
      signal: 'SELL',
      inputToken: SOL_MINT,
      outputToken: USDT_MINT,
      inputAmount: 0.01,
      slippageBps: 50,
      executionDurationSec: 1,
      status: 'success',
      transactionSignature: 'SIG1',
      expectedOutput: 1.5,
      outputAmount: 1.48,
      feePaidSol: 0.000005,
    });
    expect(h.swap.buildCalls[0]?.walletPublicKey).toBe(TEST_WALLET_ADDRESS);
    expect(Array.from(h.rpc.submitted[0] ?? [])).toEqual([1, 2, 3, 9]);
    expect(h.metrics.counter('trade.success')).toBe(1);
  });

  it('uses the quoted output when the chain gives no details', async () => {
    const h = makeHarness({ rpc: { details: null } });
    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(record.status === 'success' && record.outputAmount).toBe(1.5);
    expect(record).not.toHaveProperty('feePaidSol');
  });

  it('still reports success when the details lookup fails', async () => {
    const h = makeHarness({ rpc: { details: new Error('getTransaction failed') } });
    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(record.status).toBe('success');
  });

  it('reports a confirmation timeout distinctly, quoting the signature', async () => {
    const h = makeHarness({ rpc: { signature: 'SIG1', statuses: [{ confirmed: false, err: null }] } });

    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });

    expect(record).toMatchObject({
      status: 'failed',
      failureKind: 'confirmation_timeout',
      errorMessage: 'Transaction SIG1 not confirmed within 30s; outcome unknown, verify by signature',
      executionDurationSec: 30,
    });
    expect(record).not.toHaveProperty('transactionSignature');
    expect(h.rpc.statusCalls).toBe(30);
  });

  it('maps a build failure to build_failed without submitting', async () => {
    const swap = createFakeSwap();
    const failingSwap: SwapAdapter = {
      getQuote: swap.getQuote,
      buildSwapTransaction: async () => {
        throw new TransactionBuildError('Swap build failed: HTTP 500');
      },
    };
    const h = makeHarness({ swap: { ...swap, ...failingSwap } });

    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(record).toMatchObject({
      status: 'failed',
      failureKind: 'build_failed',
      errorMessage: 'Swap build failed: HTTP 500',
    });
    expect(h.rpc.submitted).toHaveLength(0);
  });

  it('maps a rejected submission to submission_failed', async () => {
    const h = makeHarness({ rpc: { submitError: new SubmissionError('Transaction simulation failed') } });
    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(record).toMatchObject({
      status: 'failed',
      failureKind: 'submission_failed',
      errorMessage: 'Transaction simulation failed',
    });
  });

  // ── contract ──────────────────────────────────────────────────

  it('persists every terminal record before returning it', async () => {
    const h = makeHarness();
    const records = [
      await h.executor.executeTrade({ action: 'BUY', amount: 0.01, dryRun: true }),
      await h.executor.executeTrade({ action: 'BUY', amount: 5 }),
      await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false }),
    ];
    const stored = await h.store.getRecentExecutions(10);
    expect(stored).toHaveLength(3);
    for (const record of records) expect(stored).toContain(record);
  });

  it('returns frozen records', async () => {
    const h = makeHarness();
    const record = await h.executor.executeTrade({ action: 'BUY', amount: 0.01, dryRun: true });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('still returns the record when persistence fails', async () => {
    const store: ExecutionStore = {
      saveExecution: async () => {
        throw new Error('disk full');
      },
      countLiveTradesSince: async () => 0,
      getRecentExecutions: async () => [],
    };
    const h = makeHarness({ store });

    const record = await h.executor.executeTrade({ action: 'BUY', amount: 0.01, dryRun: true });

    expect(record.status).toBe('dry_run');
    expect(h.metrics.counter('persistence.error')).toBe(1);
    expect(h.logger.entries.some((e) => e.level === 'error' && e.message === 'failed to persist trade execution')).toBe(
      true
    );
  });

  it('never rejects, even when the risk gate throws', async () => {
    const gate: RiskGate = {
      checkLimits: async () => {
        throw new Error('database is locked');
      },
    };
    const h = makeHarness({ gate });

    const record = await h.executor.executeTrade({ action: 'SELL', amount: 0.01, dryRun: false });
    expect(record).toMatchObject({
      status: 'failed',
      failureKind: 'unexpected',
      errorMessage: 'Unexpected error: database is locked',
    });
    expect(h.metrics.counter('trade.failed', { kind: 'unexpected' })).toBe(1);
  });
});
