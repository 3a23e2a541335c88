import ms from 'ms';

import {
  ConfigError,
  InvalidRecordResponseError,
  UnexpectedStatusError,
} from '../errors.js';
import type {IPv4Address} from '../x.js';
import {LiveDNSRecord} from '../x.js';

export const LIVEDNS_API_DEFAULT = 'https://dns.api.gandi.net/api/v5/zones';

export const RECORD_TTL = 300;

const REQUEST_TIMEOUT_DEFAULT = ms('30s');

const HTTP_STATUS_CREATED = 201;

export type IRecordStore = {
  readonly name: string;

  get(): Promise<IPv4Address>;

  set(ip: IPv4Address): Promise<void>;
};

export type LiveDNSRecordStoreOptions = {
  apiKey: string;
  /**
   * Zone UUID.
   */
  zone: string;
  /**
   * Record name relative to the zone, e.g. "www" or "@".
   */
  record: string;
  baseURL?: string;
  requestTimeout?: number;
};

/**
 * A single A record managed through the LiveDNS v5 API, using native `fetch`.
 */
export class LiveDNSRecordStore implements IRecordStore {
  readonly name = 'livedns';

  readonly url: string;

  private apiKey: string;
  private requestTimeout: number;

  constructor({
    apiKey,
    zone,
    record,
    baseURL = LIVEDNS_API_DEFAULT,
    requestTimeout = REQUEST_TIMEOUT_DEFAULT,
  }: LiveDNSRecordStoreOptions) {
    const missing = Object.entries({apiKey, zone, record})
      .filter(([, value]) => !value)
      .map(([key]) => key);

    if (missing.length > 0) {
      throw new ConfigError(`LiveDNS: ${missing.join(', ')} required`, missing);
    }

    this.apiKey = apiKey;
    this.requestTimeout = requestTimeout;

    this.url = `${baseURL.replace(/\/+$/, '')}/${encodeURIComponent(
      zone,
    )}/records/${encodeURIComponent(record)}/A`;
  }

  async get(): Promise<IPv4Address> {
    const response = await this.request('GET');

    if (!response.ok) {
      throw new UnexpectedStatusError(response.status, await response.text());
    }

    const record = LiveDNSRecord.satisfies(await response.json());

    const [value] = record.rrset_values ?? [];

    if (!value) {
      throw new InvalidRecordResponseError(this.url);
    }

    return value;
  }

  async set(ip: IPv4Address): Promise<void> {
    const record: LiveDNSRecord = {
      rrset_ttl: RECORD_TTL,
      rrset_values: [ip],
    };

    const response = await this.request('PUT', JSON.stringify(record));

    // Replacing a record answers 201 Created.
    if (response.status !== HTTP_STATUS_CREATED) {
      throw new UnexpectedStatusError(response.status, await response.text());
    }

    await response.body?.cancel();
  }

  private request(method: 'GET' | 'PUT', body?: string): Promise<Response> {
    const headers = new Headers();

    headers.set('X-Api-Key', this.apiKey);
    headers.set('Content-Type', 'application/json');
    headers.set('Accept', 'application/json');

    return fetch(this.url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(this.requestTimeout),
    });
  }
}
