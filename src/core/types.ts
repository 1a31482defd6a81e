export const TRADE_ACTIONS = ['BUY', 'SELL'] as const;
export type TradeAction = (typeof TRADE_ACTIONS)[number];

export const isTradeAction = (value: unknown): value is TradeAction =>
  value === 'BUY' || value === 'SELL';

export interface TradeRequest {
  /** Widened so that unvalidated caller input can reach the executor's own validation. */
  action: TradeAction | string;
  /** Base-asset units (SOL), not lamports. */
  amount: number;
  /** Falls back to the configured default. */
  slippageBps?: number;
  /** Falls back to the configured DRY_RUN_MODE. */
  dryRun?: boolean;
}

export interface TokenInfo {
  mint: string;
  symbol: string;
  decimals: number;
}

export interface Quote {
  inputMint: string;
  outputMint: string;
  inAmount: bigint;
  outAmount: bigint;
  priceImpactPct: number;
  slippageBps: number;
  /** Aggregator payload, echoed back verbatim when building the swap. */
  raw: Record<string, unknown>;
}

export const TRADE_STATUSES = ['pending', 'success', 'failed', 'dry_run'] as const;
export type TradeStatus = (typeof TRADE_STATUSES)[number];

export const FAILURE_KINDS = [
  'validation',
  'risk_blocked',
  'quote_unavailable',
  'build_failed',
  'submission_failed',
  'on_chain_error',
  'confirmation_timeout',
  'unexpected'
] as const;
export type FailureKind = (typeof FAILURE_KINDS)[number];

interface ExecutionBase {
  /** ISO-8601, UTC. */
  timestamp: string;
  /** The requested action; only a failed validation record carries one outside TradeAction. */
  signal: string;
  inputToken: string;
  outputToken: string;
  inputAmount: number;
  slippageBps: number;
  executionDurationSec: number;
  expectedOutput?: number;
  feePaidSol?: number;
}

export interface SuccessfulExecution extends ExecutionBase {
  status: 'success';
  signal: TradeAction;
  transactionSignature: string;
  outputAmount: number;
}

export interface DryRunExecution extends ExecutionBase {
  status: 'dry_run';
  signal: TradeAction;
  expectedOutput: number;
}

export interface FailedExecution extends ExecutionBase {
  status: 'failed';
  failureKind: FailureKind;
  errorMessage: string;
}

export type TradeExecution = SuccessfulExecution | DryRunExecution | FailedExecution;

export interface RiskDecision {
  allowed: boolean;
  reason?: string;
  blockedBy?: 'daily_limit' | 'hourly_limit' | 'circuit_breaker';
}
