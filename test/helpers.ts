/**
 * Shared test helpers: fakes and factories for the engine's collaborators.
 */

import { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import type { Logger } from '../src/core/logger.js';
import type { Metrics } from '../src/core/metrics.js';
import type { DryRunExecution, FailedExecution, Quote, SuccessfulExecution } from '../src/core/types.js';
import type { BlockchainRpc, SignatureStatus, TransactionDetails } from '../src/chain/rpc.js';
import type { SwapAdapter } from '../src/exchanges/adapter.js';
import type { Wallet } from '../src/wallet/interface.js';
import { SOL_MINT, USDT_MINT } from '../src/config/schema.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

export const createMockLogger = (entries: LogEntry[] = []): Logger & { entries: LogEntry[] } => {
  const logger: Logger & { entries: LogEntry[] } = {
    entries,
    debug: (message, context) => { entries.push({ level: 'debug', message, context }); },
    info: (message, context) => { entries.push({ level: 'info', message, context }); },
    warn: (message, context) => { entries.push({ level: 'warn', message, context }); },
    error: (message, context) => { entries.push({ level: 'error', message, context }); },
    child: () => logger,
  };
  return logger;
};

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number> } => {
  const counters = new Map<string, number>();
  return {
    counters,
    increment(name: string, value = 1) { counters.set(name, (counters.get(name) ?? 0) + value); },
    gauge() {},
  };
};

// ── Fake clock ──────────────────────────────────────────────────────

/** A clock that only moves when the code under test sleeps. */
export const createFakeClock = (startMs = Date.UTC(2024, 5, 15, 12, 0, 0)) => {
  let now = startMs;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    advance: (ms: number) => { now += ms; },
    sleep: async (ms: number) => { sleeps.push(ms); now += ms; },
  };
};

// ── Quote Factory ───────────────────────────────────────────────────

export function makeQuote(overrides: Partial<Quote> = {}): Quote {
  return {
    inputMint: SOL_MINT,
    outputMint: USDT_MINT,
    inAmount: 10_000_000n,
    outAmount: 1_500_000n,
    priceImpactPct: 0.01,
    slippageBps: 50,
    raw: { inAmount: '10000000', outAmount: '1500000', routePlan: [] },
    ...overrides,
  };
}

// ── Swap adapter fake ───────────────────────────────────────────────

export const createFakeSwap = (
  quoteFor: (inputMint: string, outputMint: string, amount: bigint) => Quote | Promise<Quote> = (input, output, amount) =>
    makeQuote({ inputMint: input, outputMint: output, inAmount: amount })
): SwapAdapter & {
  quoteCalls: Array<{ inputMint: string; outputMint: string; amount: bigint; slippageBps: number }>;
  buildCalls: Array<{ quote: Quote; walletPublicKey: string }>;
} => {
  const quoteCalls: Array<{ inputMint: string; outputMint: string; amount: bigint; slippageBps: number }> = [];
  const buildCalls: Array<{ quote: Quote; walletPublicKey: string }> = [];
  return {
    quoteCalls,
    buildCalls,
    async getQuote(inputMint, outputMint, amount, slippageBps) {
      quoteCalls.push({ inputMint, outputMint, amount, slippageBps });
      return quoteFor(inputMint, outputMint, amount);
    },
    async buildSwapTransaction(quote, walletPublicKey) {
      buildCalls.push({ quote, walletPublicKey });
      return Uint8Array.from([1, 2, 3]);
    },
  };
};

// ── Wallet fake ─────────────────────────────────────────────────────

export const TEST_WALLET_ADDRESS = 'TestWa11et1111111111111111111111111111111111';

export const createFakeWallet = (): Wallet & { signed: Uint8Array[] } => {
  const signed: Uint8Array[] = [];
  return {
    signed,
    getPublicKey: () => TEST_WALLET_ADDRESS,
    async sign(tx) {
      signed.push(tx);
      return Uint8Array.from([...tx, 9]);
    },
  };
};

// ── RPC fake ────────────────────────────────────────────────────────

export interface FakeRpcOptions {
  signature?: string;
  /** Returned one per poll; the last entry repeats. */
  statuses?: Array<SignatureStatus | Error>;
  details?: TransactionDetails | null | Error;
  submitError?: Error;
}

export const createFakeRpc = (options: FakeRpcOptions = {}): BlockchainRpc & {
  submitted: Uint8Array[];
  statusCalls: number;
} => {
  const statuses = options.statuses ?? [{ confirmed: true, err: null }];
  const submitted: Uint8Array[] = [];
  const rpc: BlockchainRpc & { submitted: Uint8Array[]; statusCalls: number } = {
    submitted,
    statusCalls: 0,
    async sendTransaction(signedTx) {
      submitted.push(signedTx);
      if (options.submitError) throw options.submitError;
      return options.signature ?? 'SIG1';
    },
    async getSignatureStatus() {
      const next = statuses[Math.min(rpc.statusCalls, statuses.length - 1)];
      rpc.statusCalls++;
      if (next instanceof Error) throw next;
      return next ?? { confirmed: false, err: null };
    },
    async getTransactionDetails() {
      const details = options.details ?? null;
      if (details instanceof Error) throw details;
      return details;
    },
    async getBalance() {
      return 1_000_000_000;
    },
    async getTokenBalance() {
      return 25_000_000n;
    },
  };
  return rpc;
};

// ── Execution Factories ─────────────────────────────────────────────

const executionBase = {
  timestamp: '2024-06-15T12:00:00.000Z',
  signal: 'SELL' as const,
  inputToken: SOL_MINT,
  outputToken: USDT_MINT,
  inputAmount: 0.01,
  slippageBps: 50,
  executionDurationSec: 1.5,
};

export function makeFailed(overrides: Partial<FailedExecution> = {}): FailedExecution {
  return { ...executionBase, status: 'failed', failureKind: 'unexpected', errorMessage: 'boom', ...overrides };
}

export function makeDryRun(overrides: Partial<DryRunExecution> = {}): DryRunExecution {
  return { ...executionBase, status: 'dry_run', expectedOutput: 1.5, ...overrides };
}

export function makeSuccess(overrides: Partial<SuccessfulExecution> = {}): SuccessfulExecution {
  return {
    ...executionBase,
    status: 'success',
    transactionSignature: 'SIG1',
    expectedOutput: 1.5,
    outputAmount: 1.49,
    feePaidSol: 0.000005,
    ...overrides,
  };
}

// ── HTTP errors ─────────────────────────────────────────────────────

export const axiosErrorWithStatus = (status: number, data: unknown = {}): AxiosError => {
  const config = { headers: new AxiosHeaders() };
  const response: AxiosResponse = { status, statusText: '', data, headers: {}, config };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, response);
};
