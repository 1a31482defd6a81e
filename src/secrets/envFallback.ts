import { ConfigError } from '../core/errors.js';
import type { SecretsProvider } from './provider.js';

const fallbackMap: Record<string, string> = {
  'prod/wallet/private_key': 'WALLET_PRIVATE_KEY',
  'prod/aggregator/jupiter/key': 'JUPITER_API_KEY'
};

// The public Jupiter endpoint works without a key.
const optionalSecrets = new Set(['prod/aggregator/jupiter/key']);

export class EnvFallbackSecretsProvider implements SecretsProvider {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  async getSecret(secretId: string, fallbackEnvName?: string): Promise<string> {
    const envKey = fallbackEnvName ?? fallbackMap[secretId];
    const value = envKey ? this.env[envKey]?.trim() : undefined;

    if (!value) {
      if (optionalSecrets.has(secretId)) return '';
      throw new ConfigError(`Missing secret ${secretId} (env var: ${envKey ?? 'unmapped'})`, {
        secretId
      });
    }
    return value;
  }
}
