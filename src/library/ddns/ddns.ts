import ms from 'ms';

import {
  DDNS_ERROR_GETTING_RECORD,
  DDNS_ERROR_RESOLVING_PUBLIC_IP,
  DDNS_ERROR_UPDATING_RECORD,
  DDNS_PUBLIC_IP,
  DDNS_RECORD_UPDATED,
  DDNS_RECORD_UP_TO_DATE,
  DDNS_REGISTERED_IP,
  DDNS_STARTED,
  DDNS_STOPPED,
  Logs,
} from '../@log/index.js';
import type {DDNSLogContext} from '../@log/index.js';
import {delay} from '../@utils/index.js';
import type {IPv4Address} from '../x.js';

import type {IPublicAddressResolver} from './public-address-resolver.js';
import type {IRecordStore} from './record-store.js';

export const REFRESH_INTERVAL_DEFAULT = ms('5m');

export type DDNSOptions = {
  refreshInterval?: number;
  /**
   * Shown in log lines, usually the record name.
   */
  label?: string;
};

/**
 * Keeps the record of `store` pointing to the address `resolver` reports.
 *
 * The registered address is read from the store until a read succeeds once;
 * from then on only a successful write changes it.
 */
export class DDNS {
  readonly refreshInterval: number;

  private logContext: DDNSLogContext;

  private _registeredIP: IPv4Address | undefined;
  private _currentIP: IPv4Address | undefined;

  constructor(
    readonly resolver: IPublicAddressResolver,
    readonly store: IRecordStore,
    {refreshInterval = REFRESH_INTERVAL_DEFAULT, label}: DDNSOptions = {},
  ) {
    this.refreshInterval = refreshInterval;
    this.logContext = {type: 'ddns', record: label};
  }

  get registeredIP(): IPv4Address | undefined {
    return this._registeredIP;
  }

  get currentIP(): IPv4Address | undefined {
    return this._currentIP;
  }

  /**
   * Runs checks every `refreshInterval` until `signal` aborts.
   */
  async run(signal?: AbortSignal): Promise<void> {
    Logs.info(this.logContext, DDNS_STARTED(this.refreshInterval));

    while (!signal?.aborted) {
      await this.checkAndUpdate();

      await delay(this.refreshInterval, signal);
    }

    Logs.info(this.logContext, DDNS_STOPPED);
  }

  /**
   * A single resolve-compare-update pass. Failures are logged, never thrown.
   */
  async checkAndUpdate(): Promise<void> {
    const logContext = this.logContext;

    let currentIP: IPv4Address;

    try {
      currentIP = await this.resolver.resolve();
    } catch (error) {
      Logs.error(logContext, DDNS_ERROR_RESOLVING_PUBLIC_IP(error));
      Logs.debug(logContext, error);
      return;
    }

    this._currentIP = currentIP;

    Logs.debug(logContext, DDNS_PUBLIC_IP(currentIP));

    let registeredIP = this._registeredIP;

    if (registeredIP === undefined) {
      try {
        registeredIP = await this.store.get();
      } catch (error) {
        Logs.error(logContext, DDNS_ERROR_GETTING_RECORD(error));
        Logs.debug(logContext, error);
        return;
      }

      this._registeredIP = registeredIP;

      Logs.info(logContext, DDNS_REGISTERED_IP(registeredIP));
    }

    if (registeredIP === currentIP) {
      Logs.debug(logContext, DDNS_RECORD_UP_TO_DATE(currentIP));
      return;
    }

    try {
      await this.store.set(currentIP);
    } catch (error) {
      Logs.error(logContext, DDNS_ERROR_UPDATING_RECORD(error));
      Logs.debug(logContext, error);
      return;
    }

    this._registeredIP = currentIP;

    Logs.info(
      logContext,
      DDNS_RECORD_UPDATED(currentIP, this.store.name),
    );
  }
}
