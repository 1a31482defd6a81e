import type { AppConfig } from '../config/types.js';
import { EnvFallbackSecretsProvider } from './envFallback.js';

export interface SecretsProvider {
  getSecret(secretId: string, fallbackEnvName?: string): Promise<string>;
}

export const buildSecretsProvider = (
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env
): SecretsProvider => {
  switch (config.secrets.provider) {
    case 'env':
      return new EnvFallbackSecretsProvider(env);
  }
};
