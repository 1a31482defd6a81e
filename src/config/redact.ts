import type { AppConfig } from './types.js';

// RPC providers commonly carry the API key in the query string.
export const redactUrl = (raw: string): string => {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return '[invalid url]';
  }
  for (const key of [...url.searchParams.keys()]) url.searchParams.set(key, '***');
  if (url.password) url.password = '***';
  return url.toString();
};

/** Config summary safe to print: URLs masked, secrets reported only as present or absent. */
export const redactConfig = (config: AppConfig, env: NodeJS.ProcessEnv) => ({
  nodeEnv: config.nodeEnv,
  logLevel: config.logLevel,
  rpcUrl: redactUrl(config.rpcUrl),
  jupiterApiUrl: redactUrl(config.jupiterApiUrl),
  databasePath: config.databasePath,
  pair: `${config.pair.base.symbol}/${config.pair.quote.symbol}`,
  dryRunMode: config.dryRunMode,
  limits: config.limits,
  circuitBreaker: config.circuitBreaker,
  confirmation: config.confirmation,
  retry: config.retry,
  secrets: {
    provider: config.secrets.provider,
    walletKeyConfigured: Boolean(env.WALLET_PRIVATE_KEY?.trim()),
    jupiterKeyConfigured: Boolean(env.JUPITER_API_KEY?.trim())
  }
});
