#!/usr/bin/env tsx
import { loadConfig } from '../src/config/load.js';
import { ConfigError, describeError } from '../src/core/errors.js';
import { redactConfig } from '../src/config/redact.js';

async function main() {
  const config = loadConfig();
  console.log('Configuration OK');
  console.log(JSON.stringify(redactConfig(config, process.env), null, 2));
}

main().catch((err) => {
  console.error(err instanceof ConfigError ? err.message : describeError(err));
  process.exitCode = 1;
});
