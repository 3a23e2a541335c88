import ms from 'ms';
import * as x from 'x-value';

import {REFRESH_INTERVAL_DEFAULT} from './ddns/ddns.js';
import {
  PROBE_HOSTNAME_DEFAULT,
  PROBE_SERVER_DEFAULT,
} from './ddns/public-address-resolver.js';
import {LIVEDNS_API_DEFAULT} from './ddns/record-store.js';
import {ConfigError} from './errors.js';
import {Duration, toMilliseconds} from './x.js';

const REQUEST_TIMEOUT_DEFAULT = ms('30s');

export const ConfigFile = x.object({
  apikey: x.string.optional(),
  zone: x.string.optional(),
  record: x.string.optional(),
  refresh: Duration.optional(),
  resolver: x.string.optional(),
  myip: x.string.optional(),
  requestTimeout: Duration.optional(),
  baseURL: x.string.optional(),
});

export type ConfigFile = x.TypeOf<typeof ConfigFile>;

type ConfigKey = keyof ConfigFile;

export const CONFIG_ENV: Record<ConfigKey, string> = {
  apikey: 'LIVEDNS_API_KEY',
  zone: 'LIVEDNS_ZONE',
  record: 'LIVEDNS_RECORD',
  refresh: 'LIVEDNS_REFRESH',
  resolver: 'LIVEDNS_RESOLVER',
  myip: 'LIVEDNS_MYIP',
  requestTimeout: 'LIVEDNS_REQUEST_TIMEOUT',
  baseURL: 'LIVEDNS_BASE_URL',
};

const REQUIRED_KEYS = ['apikey', 'zone', 'record'] as const;

export type Config = Readonly<{
  apiKey: string;
  zone: string;
  record: string;
  baseURL: string;
  refreshInterval: number;
  resolver: string;
  probeHostname: string;
  requestTimeout: number;
}>;

/**
 * Builds the process configuration from a configuration file's content and
 * environment variables, the latter taking precedence.
 */
export function resolveConfig(
  file: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const fileConfig: ConfigFile =
    file === undefined || file === null
      ? {}
      : ConfigFile.exact().satisfies(file);

  const pick = <TKey extends ConfigKey>(
    key: TKey,
  ): ConfigFile[TKey] | string | undefined => {
    const value = env[CONFIG_ENV[key]];
    return value !== undefined && value !== '' ? value : fileConfig[key];
  };

  const required = {
    apikey: pick('apikey'),
    zone: pick('zone'),
    record: pick('record'),
  };

  const {apikey: apiKey, zone, record} = required;

  if (!apiKey || !zone || !record) {
    const missing = REQUIRED_KEYS.filter(key => !required[key]);

    throw new ConfigError(
      `missing one or more options: ${missing.join(', ')}`,
      missing,
    );
  }

  return Object.freeze({
    apiKey,
    zone,
    record,
    baseURL: pick('baseURL') || LIVEDNS_API_DEFAULT,
    refreshInterval: resolveDuration(
      'refresh',
      pick('refresh'),
      REFRESH_INTERVAL_DEFAULT,
    ),
    resolver: pick('resolver') || PROBE_SERVER_DEFAULT,
    probeHostname: pick('myip') || PROBE_HOSTNAME_DEFAULT,
    requestTimeout: resolveDuration(
      'requestTimeout',
      pick('requestTimeout'),
      REQUEST_TIMEOUT_DEFAULT,
    ),
  });
}

function resolveDuration(
  key: ConfigKey,
  value: Duration | undefined,
  defaultValue: number,
): number {
  if (value === undefined) {
    return defaultValue;
  }

  const duration = toMilliseconds(value);

  if (duration === undefined) {
    throw new ConfigError(`invalid duration for ${key}: ${String(value)}`);
  }

  return duration;
}

export function getConfigUsage(command: string): string {
  const rows: [ConfigKey, string][] = [
    ['apikey', 'Mandatory. API key to access the LiveDNS API'],
    ['zone', 'Mandatory. Zone UUID'],
    ['record', 'Mandatory. Record to update'],
    [
      'refresh',
      `Delay between checks for public IP address updates (default "${ms(
        REFRESH_INTERVAL_DEFAULT,
      )}")`,
    ],
    [
      'resolver',
      `The resolver to use for the myip record (default "${PROBE_SERVER_DEFAULT}")`,
    ],
    [
      'myip',
      `The hostname of the record to use to check for current IP (default "${PROBE_HOSTNAME_DEFAULT}")`,
    ],
    [
      'requestTimeout',
      `Timeout of LiveDNS API requests (default "${ms(REQUEST_TIMEOUT_DEFAULT)}")`,
    ],
    ['baseURL', `Base URL of the LiveDNS zones API (default "${LIVEDNS_API_DEFAULT}")`],
  ];

  return [
    `usage: ${command} [config-file]`,
    '',
    'options (config file key / environment variable):',
    ...rows.map(
      ([key, description]) => `  ${key} / ${CONFIG_ENV[key]}\n      ${description}`,
    ),
  ].join('\n');
}
