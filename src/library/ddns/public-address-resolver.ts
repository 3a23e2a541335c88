import * as DNS from 'dns/promises';
import * as Net from 'net';

import {getErrorCode} from '../@utils/index.js';
import {
  DDNSError,
  InvalidAddressError,
  NoAddressFoundError,
  ResolutionFailureError,
} from '../errors.js';
import type {IPv4Address} from '../x.js';

export const PROBE_HOSTNAME_DEFAULT = 'myip.opendns.com';
export const PROBE_SERVER_DEFAULT = 'resolver1.opendns.com';

const PROBE_TIMEOUT_DEFAULT = 1000;

/**
 * DNS error codes meaning the query went through but the answer carries no
 * address.
 */
const NO_ADDRESS_ERROR_CODES = new Set<string>([DNS.NODATA, DNS.NOTFOUND]);

/**
 * Queries the A records of `hostname` against `server` and returns the raw
 * answers.
 */
export type PublicIPQuery = (
  hostname: string,
  server: string,
  timeout: number,
) => Promise<string[]>;

export const queryPublicIP: PublicIPQuery = async (
  hostname,
  server,
  timeout,
) => {
  let serverAddress: string;

  if (Net.isIP(server)) {
    serverAddress = server;
  } else {
    try {
      ({address: serverAddress} = await DNS.lookup(server, {family: 4}));
    } catch (error) {
      throw new ResolutionFailureError(hostname, server, {cause: error});
    }
  }

  const resolver = new DNS.Resolver({timeout, tries: 1});

  resolver.setServers([serverAddress]);

  return resolver.resolve4(hostname);
};

export function parseIPv4Address(value: string): IPv4Address {
  const address = value.trim();

  if (!Net.isIPv4(address)) {
    throw new InvalidAddressError(value);
  }

  return address;
}

export type IPublicAddressResolver = {
  resolve(): Promise<IPv4Address>;
};

export type PublicAddressResolverOptions = {
  /**
   * Hostname whose answer is the address the query comes from.
   */
  hostname?: string;
  /**
   * Resolver to query, as an address or a hostname.
   */
  server?: string;
  timeout?: number;
  query?: PublicIPQuery;
};

export class PublicAddressResolver implements IPublicAddressResolver {
  readonly hostname: string;
  readonly server: string;

  private timeout: number;
  private query: PublicIPQuery;

  constructor({
    hostname = PROBE_HOSTNAME_DEFAULT,
    server = PROBE_SERVER_DEFAULT,
    timeout = PROBE_TIMEOUT_DEFAULT,
    query = queryPublicIP,
  }: PublicAddressResolverOptions = {}) {
    this.hostname = hostname;
    this.server = server;
    this.timeout = timeout;
    this.query = query;
  }

  async resolve(): Promise<IPv4Address> {
    const {hostname, server} = this;

    let answers: string[];

    try {
      answers = await this.query(hostname, server, this.timeout);
    } catch (error) {
      if (error instanceof DDNSError) {
        throw error;
      }

      if (NO_ADDRESS_ERROR_CODES.has(getErrorCode(error))) {
        throw new NoAddressFoundError(hostname);
      }

      throw new ResolutionFailureError(hostname, server, {cause: error});
    }

    const [answer] = answers;

    if (answer === undefined || answer.trim() === '') {
      throw new NoAddressFoundError(hostname);
    }

    return parseIPv4Address(answer);
  }
}
