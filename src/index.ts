import type { AppConfig } from './config/types.js';
import { JsonLogger, type Logger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { BackoffRetrier, sleep } from './core/retry.js';
import { SolanaRpcClient } from './chain/solanaRpc.js';
import type { BlockchainRpc } from './chain/rpc.js';
import type { ExecutionStore } from './data/executionStore.js';
import { SqliteExecutionStore } from './data/sqliteExecutionStore.js';
import { JupiterSwapAdapter } from './exchanges/jupiter/adapter.js';
import type { SwapAdapter } from './exchanges/adapter.js';
import { ConfirmationPoller } from './execution/confirmationPoller.js';
import { TradeExecutor } from './execution/tradeExecutor.js';
import { CircuitBreaker } from './risk/circuitBreaker.js';
import { TradeLimitsGate } from './risk/tradeLimits.js';
import { buildSecretsProvider, type SecretsProvider } from './secrets/provider.js';
import { TradeTool } from './tools/tradeTool.js';
import { WalletInfoTool } from './tools/walletInfoTool.js';
import type { Wallet } from './wallet/interface.js';
import { KeypairWallet } from './wallet/keypairWallet.js';

export { loadConfig, parseConfig } from './config/load.js';
export type { AppConfig } from './config/types.js';
export * from './core/errors.js';
export * from './core/types.js';
export { JsonLogger, type Logger } from './core/logger.js';
export { InMemoryMetrics, type Metrics } from './core/metrics.js';
export { BackoffRetrier, type BackoffConfig } from './core/retry.js';
export { SolanaRpcClient } from './chain/solanaRpc.js';
export type { BlockchainRpc, SignatureStatus, TransactionDetails } from './chain/rpc.js';
export type { ExecutionStore } from './data/executionStore.js';
export { InMemoryExecutionStore } from './data/inMemoryExecutionStore.js';
export { SqliteExecutionStore } from './data/sqliteExecutionStore.js';
export type { SwapAdapter } from './exchanges/adapter.js';
export { JupiterSwapAdapter } from './exchanges/jupiter/adapter.js';
export { ConfirmationPoller, type ConfirmationResult } from './execution/confirmationPoller.js';
export { TradeExecutor, type TradeExecutorConfig, type TradeExecutorDeps } from './execution/tradeExecutor.js';
export { CircuitBreaker } from './risk/circuitBreaker.js';
export { TradeLimitsGate, type RiskGate } from './risk/tradeLimits.js';
export { TradeTool } from './tools/tradeTool.js';
export { WalletInfoTool } from './tools/walletInfoTool.js';
export { createTradeMcpServer, type TradeMcpTools } from './agents/tradeMcpServer.js';
export type { Wallet } from './wallet/interface.js';
export { KeypairWallet } from './wallet/keypairWallet.js';

export interface TradingEngine {
  executor: TradeExecutor;
  tool: TradeTool;
  walletInfo: WalletInfoTool;
  breaker: CircuitBreaker;
  store: ExecutionStore;
  rpc: BlockchainRpc;
  wallet?: Wallet;
  logger: Logger;
  metrics: InMemoryMetrics;
  close(): void;
}

export interface TradingEngineOverrides {
  logger?: Logger;
  secrets?: SecretsProvider;
  store?: ExecutionStore;
  swap?: SwapAdapter;
  rpc?: BlockchainRpc;
  wallet?: Wallet;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Wires the engine from configuration. A wallet is loaded only when one is
 * configured; without it the engine still serves dry-runs.
 */
export const createTradingEngine = async (
  config: AppConfig,
  overrides: TradingEngineOverrides = {}
): Promise<TradingEngine> => {
  const logger = overrides.logger ?? new JsonLogger(config.logLevel);
  const metrics = new InMemoryMetrics();
  const secrets = overrides.secrets ?? buildSecretsProvider(config);
  const wait = overrides.sleep ?? sleep;
  const now = overrides.now ?? Date.now;

  const retrier = new BackoffRetrier(config.retry, logger.child({ component: 'retry' }), metrics, wait);

  const jupiterApiKey = await secrets.getSecret(config.secrets.secretIds.jupiterKey, 'JUPITER_API_KEY');
  const swap =
    overrides.swap ??
    new JupiterSwapAdapter(retrier, logger.child({ component: 'jupiter' }), {
      baseUrl: config.jupiterApiUrl,
      timeoutMs: config.httpTimeoutMs,
      ...(jupiterApiKey ? { apiKey: jupiterApiKey } : {})
    });
  const rpc = overrides.rpc ?? new SolanaRpcClient(config.rpcUrl, config.httpTimeoutMs);

  let sqlite: SqliteExecutionStore | undefined;
  let store = overrides.store;
  if (!store) {
    sqlite = new SqliteExecutionStore(config.databasePath, logger.child({ component: 'store' }));
    store = sqlite;
  }

  const breaker = new CircuitBreaker(
    { priceChangePct: config.circuitBreaker.priceChangePct },
    logger.child({ component: 'circuit_breaker' }),
    metrics,
    now
  );
  if (sqlite) breaker.init(sqlite.database);
  if (config.circuitBreaker.startTripped) breaker.trip('CIRCUIT_BREAKER set in configuration');

  let wallet = overrides.wallet;
  if (!wallet) {
    const walletKey = await secrets
      .getSecret(config.secrets.secretIds.walletKey, 'WALLET_PRIVATE_KEY')
      .catch((err: unknown) => {
        if (!config.dryRunMode) throw err;
        logger.warn('no wallet key configured, live trading disabled', { error: err });
        return '';
      });
    if (walletKey) {
      try {
        wallet = KeypairWallet.fromSecret(walletKey, logger.child({ component: 'wallet' }));
      } catch (err) {
        if (!config.dryRunMode) throw err;
        logger.warn('wallet key could not be loaded, live trading disabled', { error: err });
      }
    }
  }

  const gate = new TradeLimitsGate(
    { maxTradesPerDay: config.limits.maxTradesPerDay, maxTradesPerHour: config.limits.maxTradesPerHour },
    store,
    breaker,
    logger.child({ component: 'risk' }),
    now
  );
  const poller = new ConfirmationPoller(rpc, retrier, logger.child({ component: 'confirmation' }), {
    intervalMs: config.confirmation.pollIntervalSec * 1000,
    sleep: wait,
    now
  });

  const executor = new TradeExecutor(
    {
      pair: config.pair,
      maxTradeSize: config.limits.maxTradeSize,
      defaultSlippageBps: config.limits.slippageBps,
      dryRunMode: config.dryRunMode,
      confirmationTimeoutSec: config.confirmation.timeoutSec
    },
    {
      swap,
      gate,
      poller,
      rpc,
      store,
      breaker,
      logger: logger.child({ component: 'executor' }),
      metrics,
      now,
      ...(wallet ? { wallet } : {})
    }
  );
  const tool = new TradeTool(executor, logger.child({ component: 'tool' }));
  const walletInfo = new WalletInfoTool(rpc, config.pair.quote, logger.child({ component: 'tool' }), wallet);

  logger.info('trading engine initialized', {
    dryRunMode: config.dryRunMode,
    pair: `${config.pair.base.symbol}/${config.pair.quote.symbol}`,
    walletAddress: wallet?.getPublicKey() ?? null,
    maxTradeSize: config.limits.maxTradeSize,
    maxTradesPerDay: config.limits.maxTradesPerDay,
    maxTradesPerHour: config.limits.maxTradesPerHour
  });

  return {
    executor,
    tool,
    walletInfo,
    breaker,
    store,
    rpc,
    ...(wallet ? { wallet } : {}),
    logger,
    metrics,
    close: () => sqlite?.close()
  };
};
