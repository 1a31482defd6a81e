import type { Logger } from '../core/logger.js';
import type { TradeExecution, TradeRequest } from '../core/types.js';
import { SolanaTradeSchema } from './schemas.js';

export interface TradeExecutorLike {
  executeTrade(request: TradeRequest): Promise<TradeExecution>;
}

export interface TradeToolResult {
  status: TradeExecution['status'] | 'error';
  signal?: string;
  input_amount?: number;
  expected_output?: number | null;
  actual_output?: number;
  slippage_pct?: number;
  transaction_signature?: string | null;
  execution_duration_sec?: number;
  fee_paid_sol?: number | null;
  error_message?: string | null;
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

export const toToolResult = (execution: TradeExecution): TradeToolResult => {
  const result: TradeToolResult = {
    status: execution.status,
    signal: execution.signal,
    input_amount: execution.inputAmount,
    expected_output: execution.expectedOutput ?? null,
    transaction_signature: execution.status === 'success' ? execution.transactionSignature : null,
    execution_duration_sec: execution.executionDurationSec,
    fee_paid_sol: execution.feePaidSol ?? null,
    error_message: execution.status === 'failed' ? execution.errorMessage : null
  };
  if (execution.status === 'success') {
    result.actual_output = execution.outputAmount;
    if (execution.expectedOutput) {
      result.slippage_pct = round2(
        ((execution.expectedOutput - execution.outputAmount) / execution.expectedOutput) * 100
      );
    }
  }
  return result;
};

/**
 * Agent-facing adapter over the trade executor. Input arrives unvalidated;
 * the answer is always a JSON string, never a thrown error.
 */
export class TradeTool {
  readonly name = 'solana_trade';
  readonly description =
    'Execute a BUY or SELL swap of SOL through the Jupiter aggregator. ' +
    'Always run with dryRun=true first to inspect the quote.';
  readonly schema = SolanaTradeSchema;

  constructor(
    private readonly executor: TradeExecutorLike,
    private readonly logger: Logger
  ) {}

  async invoke(input: unknown): Promise<string> {
    const parsed = SolanaTradeSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`);
      return JSON.stringify({ status: 'error', error_message: `Invalid input: ${issues.join('; ')}` } satisfies TradeToolResult);
    }

    const { action, amount, dryRun } = parsed.data;
    this.logger.info('trade tool called', { action, amount, dryRun });
    const execution = await this.executor.executeTrade({ action, amount, dryRun });
    this.logger.info('trade tool completed', {
      status: execution.status,
      signature: execution.status === 'success' ? execution.transactionSignature : undefined
    });
    return JSON.stringify(toToolResult(execution), null, 2);
  }
}
