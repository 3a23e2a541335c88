#!/usr/bin/env node

import {
  ConfigError,
  Logs,
  SHUTDOWN_SIGNAL,
  getConfigUsage,
  setup,
} from '../library/index.js';

import {loadConfig} from './@config.js';

const USAGE_EXIT_CODE = 2;

const configPath = process.argv[2] as string | undefined;

const config = await loadConfig(configPath).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));

  if (error instanceof ConfigError) {
    console.error(getConfigUsage('livedns-ddns'));
  }

  process.exit(USAGE_EXIT_CODE);
});

const ddns = setup(config);

const controller = new AbortController();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    Logs.info('cli', SHUTDOWN_SIGNAL(signal));
    controller.abort();
  });
}

await ddns.run(controller.signal);
