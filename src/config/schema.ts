import { z } from 'zod';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase());
};

export const SOL_MINT = 'So11111111111111111111111111111111111111112';
export const USDT_MINT = 'Es9vMFrzaCERmJfrF4H2FYD4KCoNkY11McCe8BenwNYB';

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  SOLANA_RPC_URL: z.string().url().default('https://api.mainnet-beta.solana.com'),
  JUPITER_API_URL: z.string().url().default('https://quote-api.jup.ag/v6'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  DATABASE_PATH: z.string().min(1).default('./data/trading.sqlite'),

  BASE_MINT: z.string().min(32).default(SOL_MINT),
  BASE_SYMBOL: z.string().min(1).default('SOL'),
  BASE_DECIMALS: z.coerce.number().int().min(0).max(18).default(9),
  QUOTE_MINT: z.string().min(32).default(USDT_MINT),
  QUOTE_SYMBOL: z.string().min(1).default('USDT'),
  QUOTE_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),

  DRY_RUN_MODE: z.string().optional(),
  MAX_TRADE_SIZE_SOL: z.coerce.number().positive().max(10).default(0.1),
  SLIPPAGE_BPS: z.coerce.number().int().min(0).max(1000).default(50),
  MAX_TRADES_PER_DAY: z.coerce.number().int().min(1).max(1000).default(20),
  MAX_TRADES_PER_HOUR: z.coerce.number().int().min(1).max(100).default(5),

  CIRCUIT_BREAKER: z.string().optional(),
  CIRCUIT_BREAKER_PRICE_CHANGE_PCT: z.coerce.number().positive().default(20),

  CONFIRMATION_TIMEOUT_SEC: z.coerce.number().positive().default(30),
  CONFIRMATION_POLL_INTERVAL_SEC: z.coerce.number().positive().default(1),

  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BACKOFF_FACTOR: z.coerce.number().gt(1).default(2),
  RETRY_UNIT_MS: z.coerce.number().int().positive().default(1000),

  SECRETS_PROVIDER: z.enum(['env']).default('env'),
  SECRET_ID_WALLET_KEY: z.string().default('prod/wallet/private_key'),
  SECRET_ID_JUPITER_KEY: z.string().default('prod/aggregator/jupiter/key')
});

export const configSchema = rawSchema
  .refine((raw) => raw.BASE_MINT !== raw.QUOTE_MINT, {
    message: 'BASE_MINT and QUOTE_MINT must differ',
    path: ['QUOTE_MINT']
  })
  .refine((raw) => raw.CONFIRMATION_POLL_INTERVAL_SEC <= raw.CONFIRMATION_TIMEOUT_SEC, {
    message: 'poll interval cannot exceed the confirmation timeout',
    path: ['CONFIRMATION_POLL_INTERVAL_SEC']
  })
  .transform((raw) => ({
    nodeEnv: raw.NODE_ENV,
    logLevel: raw.LOG_LEVEL,

    rpcUrl: raw.SOLANA_RPC_URL,
    jupiterApiUrl: raw.JUPITER_API_URL,
    httpTimeoutMs: raw.HTTP_TIMEOUT_MS,
    databasePath: raw.DATABASE_PATH,

    pair: {
      base: { mint: raw.BASE_MINT, symbol: raw.BASE_SYMBOL, decimals: raw.BASE_DECIMALS },
      quote: { mint: raw.QUOTE_MINT, symbol: raw.QUOTE_SYMBOL, decimals: raw.QUOTE_DECIMALS }
    },

    // Dry-run unless explicitly switched off.
    dryRunMode: parseBoolean(raw.DRY_RUN_MODE, true),

    limits: {
      maxTradeSize: raw.MAX_TRADE_SIZE_SOL,
      slippageBps: raw.SLIPPAGE_BPS,
      maxTradesPerDay: raw.MAX_TRADES_PER_DAY,
      maxTradesPerHour: raw.MAX_TRADES_PER_HOUR
    },

    circuitBreaker: {
      startTripped: parseBoolean(raw.CIRCUIT_BREAKER, false),
      priceChangePct: raw.CIRCUIT_BREAKER_PRICE_CHANGE_PCT
    },

    confirmation: {
      timeoutSec: raw.CONFIRMATION_TIMEOUT_SEC,
      pollIntervalSec: raw.CONFIRMATION_POLL_INTERVAL_SEC
    },

    retry: {
      maxAttempts: raw.RETRY_MAX_ATTEMPTS,
      backoffFactor: raw.RETRY_BACKOFF_FACTOR,
      unitMs: raw.RETRY_UNIT_MS
    },

    secrets: {
      provider: raw.SECRETS_PROVIDER,
      secretIds: {
        walletKey: raw.SECRET_ID_WALLET_KEY,
        jupiterKey: raw.SECRET_ID_JUPITER_KEY
      }
    }
  }));
