import { LAMPORTS_PER_SOL } from '@solana/web3.js';
import type { TokenInfo, TradeExecution } from '../core/types.js';
import { fromSmallestUnits } from '../core/units.js';

const RULE = '='.repeat(80);

const symbolFor = (mint: string, tokens: TokenInfo[]): string =>
  tokens.find((t) => t.mint === mint)?.symbol ?? mint;

const row = (label: string, value: string): string => `${`${label}:`.padEnd(18)}${value}`;

/** Human-readable block for a finished trade attempt. */
export const formatExecution = (execution: TradeExecution, tokens: TokenInfo[] = []): string => {
  const lines = [
    RULE,
    'Trade Execution Result',
    RULE,
    row('Status', execution.status.toUpperCase()),
    row('Signal', execution.signal),
    row('Input Token', symbolFor(execution.inputToken, tokens)),
    row('Output Token', symbolFor(execution.outputToken, tokens)),
    row('Input Amount', `${execution.inputAmount} SOL`),
    row('Slippage', `${execution.slippageBps} bps`)
  ];

  if (execution.expectedOutput !== undefined) {
    lines.push(row('Expected Output', execution.expectedOutput.toFixed(6)));
  }
  if (execution.status === 'success') {
    lines.push(row('Actual Output', execution.outputAmount.toFixed(6)));
    lines.push(row('Signature', execution.transactionSignature));
    lines.push(row('Explorer', `https://solscan.io/tx/${execution.transactionSignature}`));
  }
  if (execution.feePaidSol !== undefined) {
    lines.push(row('Fee', `${execution.feePaidSol.toFixed(6)} SOL`));
  }
  if (execution.status === 'failed') {
    lines.push(row('Failure', execution.failureKind));
    lines.push(row('Error', execution.errorMessage));
  }
  lines.push(row('Duration', `${execution.executionDurationSec.toFixed(2)}s`));
  lines.push(RULE);
  return lines.join('\n');
};

export interface WalletBalanceView {
  address: string;
  lamports: number;
  quote: TokenInfo;
  /** Smallest units of the quote token. */
  quoteUnits: bigint;
  rpcUrl: string;
}

export const formatWalletBalance = (view: WalletBalanceView): string =>
  [
    row('Wallet', view.address),
    row('SOL', `${(view.lamports / LAMPORTS_PER_SOL).toFixed(6)} (${view.lamports} lamports)`),
    row(view.quote.symbol, fromSmallestUnits(view.quoteUnits, view.quote.decimals).toFixed(view.quote.decimals)),
    row('RPC', view.rpcUrl)
  ].join('\n');
