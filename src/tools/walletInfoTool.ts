import { LAMPORTS_PER_SOL } from '@solana/web3.js';
import { describeError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { TokenInfo } from '../core/types.js';
import { fromSmallestUnits } from '../core/units.js';
import type { BlockchainRpc } from '../chain/rpc.js';
import type { Wallet } from '../wallet/interface.js';

export interface WalletBalanceResult {
  status: 'success' | 'error';
  wallet_address?: string;
  sol_balance?: number;
  quote_symbol?: string;
  quote_balance?: number;
  error_message?: string;
}

const round6 = (n: number): number => Math.round(n * 1e6) / 1e6;

/**
 * Agent-facing balance check: SOL and the quote token of the trading pair.
 * Takes no input; answers with a JSON string and never throws.
 */
export class WalletInfoTool {
  readonly name = 'get_wallet_balance';
  readonly description =
    'Get the current SOL and quote-token balances of the trading wallet. ' +
    'Use it before trading to size orders against available funds.';

  constructor(
    private readonly rpc: BlockchainRpc,
    private readonly quote: TokenInfo,
    private readonly logger: Logger,
    private readonly wallet?: Wallet
  ) {}

  async invoke(_input?: unknown): Promise<string> {
    if (!this.wallet) {
      return JSON.stringify({
        status: 'error',
        error_message: 'No wallet configured'
      } satisfies WalletBalanceResult);
    }

    const address = this.wallet.getPublicKey();
    try {
      const [lamports, quoteUnits] = await Promise.all([
        this.rpc.getBalance(address),
        this.rpc.getTokenBalance(address, this.quote.mint)
      ]);
      const result: WalletBalanceResult = {
        status: 'success',
        wallet_address: address,
        sol_balance: round6(lamports / LAMPORTS_PER_SOL),
        quote_symbol: this.quote.symbol,
        quote_balance: round6(fromSmallestUnits(quoteUnits, this.quote.decimals))
      };
      this.logger.info('wallet balance tool completed', { solBalance: result.sol_balance });
      return JSON.stringify(result, null, 2);
    } catch (err) {
      this.logger.error('wallet balance tool failed', { error: err });
      return JSON.stringify({ status: 'error', error_message: describeError(err) } satisfies WalletBalanceResult);
    }
  }
}
