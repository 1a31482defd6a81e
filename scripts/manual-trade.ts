#!/usr/bin/env tsx
import readline from 'node:readline/promises';
import { parseManualTradeArgs, MANUAL_TRADE_USAGE, type ManualTradeArgs } from '../src/cli/args.js';
import { formatExecution } from '../src/cli/format.js';
import { loadConfig } from '../src/config/load.js';
import { describeError } from '../src/core/errors.js';
import { createTradingEngine } from '../src/index.js';

async function confirmLiveTrade(): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    console.log('WARNING: this sends a REAL transaction. It cannot be reversed once confirmed.');
    const answer = await rl.question("Type 'YES' to confirm and proceed: ");
    return answer.trim() === 'YES';
  } finally {
    rl.close();
  }
}

async function main() {
  const argv = process.argv.slice(2);
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(MANUAL_TRADE_USAGE);
    return;
  }

  let args: ManualTradeArgs;
  try {
    args = parseManualTradeArgs(argv);
  } catch (err) {
    console.error(describeError(err));
    console.error(MANUAL_TRADE_USAGE);
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();
  const dryRun = args.dryRun ?? config.dryRunMode;
  const engine = await createTradingEngine(config);

  try {
    console.log(`Action:   ${args.action}`);
    console.log(`Amount:   ${args.amount} ${config.pair.base.symbol}`);
    console.log(`Slippage: ${args.slippageBps ?? config.limits.slippageBps} bps`);
    console.log(`Mode:     ${dryRun ? 'DRY-RUN (no transaction)' : 'LIVE'}`);
    if (engine.wallet) console.log(`Wallet:   ${engine.wallet.getPublicKey()}`);
    console.log('');

    if (!dryRun && !args.yes && !(await confirmLiveTrade())) {
      console.log('Trade cancelled.');
      return;
    }

    const execution = await engine.executor.executeTrade({
      action: args.action,
      amount: args.amount,
      dryRun,
      ...(args.slippageBps !== undefined ? { slippageBps: args.slippageBps } : {})
    });
    console.log(formatExecution(execution, [config.pair.base, config.pair.quote]));
    if (execution.status === 'failed') process.exitCode = 1;
  } finally {
    engine.close();
  }
}

main().catch((err) => {
  console.error(describeError(err));
  process.exitCode = 1;
});
