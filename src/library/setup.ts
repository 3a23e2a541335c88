import type {Config} from './config.js';
import {
  DDNS,
  LiveDNSRecordStore,
  PublicAddressResolver,
} from './ddns/index.js';

export function setup({
  apiKey,
  zone,
  record,
  baseURL,
  refreshInterval,
  resolver: server,
  probeHostname: hostname,
  requestTimeout,
}: Config): DDNS {
  const resolver = new PublicAddressResolver({hostname, server});

  const store = new LiveDNSRecordStore({
    apiKey,
    zone,
    record,
    baseURL,
    requestTimeout,
  });

  return new DDNS(resolver, store, {refreshInterval, label: record});
}
