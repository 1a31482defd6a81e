import { ValidationError } from '../core/errors.js';
import { isTradeAction, type TradeAction } from '../core/types.js';

export interface ManualTradeArgs {
  action: TradeAction;
  amount: number;
  /** Undefined leaves the decision to DRY_RUN_MODE. */
  dryRun?: boolean;
  slippageBps?: number;
  /** Skip the interactive confirmation for live trades. */
  yes: boolean;
}

export const MANUAL_TRADE_USAGE = [
  'Usage: manual-trade --action BUY|SELL --amount <sol> [--dry-run | --live] [--slippage-bps <n>] [--yes]',
  '',
  '  --action        BUY spends the quote token for SOL, SELL spends SOL',
  '  --amount        amount of SOL to trade, e.g. 0.01',
  '  --dry-run       quote only, never sends a transaction',
  '  --live          send a real transaction (asks for confirmation)',
  '  --slippage-bps  override SLIPPAGE_BPS for this trade',
  '  --yes           skip the confirmation prompt'
].join('\n');

const takeValue = (argv: string[], i: number, flag: string): string => {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError(`${flag} requires a value`);
  }
  return value;
};

export const parseManualTradeArgs = (argv: string[]): ManualTradeArgs => {
  let action: string | undefined;
  let amountRaw: string | undefined;
  let slippageRaw: string | undefined;
  let dryRun: boolean | undefined;
  let yes = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--action':
        action = takeValue(argv, i, arg).toUpperCase();
        i++;
        break;
      case '--amount':
        amountRaw = takeValue(argv, i, arg);
        i++;
        break;
      case '--slippage-bps':
        slippageRaw = takeValue(argv, i, arg);
        i++;
        break;
      case '--dry-run':
        if (dryRun === false) throw new ValidationError('--dry-run and --live are mutually exclusive');
        dryRun = true;
        break;
      case '--live':
        if (dryRun === true) throw new ValidationError('--dry-run and --live are mutually exclusive');
        dryRun = false;
        break;
      case '--yes':
      case '-y':
        yes = true;
        break;
      default:
        throw new ValidationError(`Unknown argument: ${String(arg)}`);
    }
  }

  if (!isTradeAction(action)) {
    throw new ValidationError(`--action must be BUY or SELL, got ${action ?? 'nothing'}`);
  }
  const amount = Number(amountRaw);
  if (amountRaw === undefined || !Number.isFinite(amount) || amount <= 0) {
    throw new ValidationError(`--amount must be a positive number, got ${amountRaw ?? 'nothing'}`);
  }

  const parsed: ManualTradeArgs = { action, amount, yes };
  if (dryRun !== undefined) parsed.dryRun = dryRun;
  if (slippageRaw !== undefined) {
    const slippageBps = Number(slippageRaw);
    if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps > 10_000) {
      throw new ValidationError(`--slippage-bps must be an integer between 0 and 10000, got ${slippageRaw}`);
    }
    parsed.slippageBps = slippageBps;
  }
  return parsed;
};
