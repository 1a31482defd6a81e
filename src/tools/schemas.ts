import { z } from 'zod';
import { TRADE_ACTIONS } from '../core/types.js';

/**
 * Input schema for the solana_trade action.
 */
export const SolanaTradeSchema = z
  .object({
    action: z.enum(TRADE_ACTIONS).describe('BUY spends the quote token for SOL, SELL spends SOL for the quote token'),
    amount: z.number().positive().describe('Amount of SOL to trade, e.g. 0.01'),
    dryRun: z.boolean().default(true).describe('Quote only, no transaction is sent. Run with true first')
  })
  .strip()
  .describe('Instructions for executing a SOL swap through the trade engine');

export type SolanaTradeInput = z.input<typeof SolanaTradeSchema>;
