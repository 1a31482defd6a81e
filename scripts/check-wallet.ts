#!/usr/bin/env tsx
import { SolanaRpcClient } from '../src/chain/solanaRpc.js';
import { formatWalletBalance } from '../src/cli/format.js';
import { loadConfig } from '../src/config/load.js';
import { redactUrl } from '../src/config/redact.js';
import { describeError } from '../src/core/errors.js';
import { buildSecretsProvider } from '../src/secrets/provider.js';
import { KeypairWallet } from '../src/wallet/keypairWallet.js';

async function main() {
  const config = loadConfig();
  const secrets = buildSecretsProvider(config);
  const walletKey = await secrets.getSecret(config.secrets.secretIds.walletKey, 'WALLET_PRIVATE_KEY');
  const wallet = KeypairWallet.fromSecret(walletKey);
  const rpc = new SolanaRpcClient(config.rpcUrl, config.httpTimeoutMs);

  const owner = wallet.getPublicKey();
  const { quote } = config.pair;
  const [lamports, quoteUnits] = await Promise.all([
    rpc.getBalance(owner),
    rpc.getTokenBalance(owner, quote.mint)
  ]);
  console.log(formatWalletBalance({ address: owner, lamports, quote, quoteUnits, rpcUrl: redactUrl(config.rpcUrl) }));
}

main().catch((err) => {
  console.error(describeError(err));
  process.exitCode = 1;
});
