/**
 * @fileoverview Connectivity probes
 *
 * The repository fetcher asks {@link INetworkInfo} before it tries the
 * remote, so that an offline device goes straight to the local copy.
 */

import { lookup } from 'node:dns/promises';

import { consoleLogger, ILogger } from '../../application/logging';
import { errorMessage } from '../data/FailureMapper';

export interface INetworkInfo {
  isConnected(): Promise<boolean>;
}

/**
 * Reports whatever it was last told. Used in tests and in hosts that learn
 * about connectivity from elsewhere.
 */
export class StaticNetworkInfo implements INetworkInfo {
  constructor(private connected: boolean = true) {}

  setConnected(connected: boolean): void {
    this.connected = connected;
  }

  async isConnected(): Promise<boolean> {
    return this.connected;
  }
}

export interface DnsNetworkInfoOptions {
  /** Host name to resolve (default: `example.com`) */
  probeHost?: string;

  /** Give up after this many milliseconds (default: 3000) */
  timeoutMs?: number;

  /** Resolver; defaults to `dns.promises.lookup` */
  resolve?: (host: string) => Promise<unknown>;

  logger?: ILogger;
}

/**
 * Connected when the probe host resolves within the timeout.
 */
export class DnsNetworkInfo implements INetworkInfo {
  private readonly probeHost: string;
  private readonly timeoutMs: number;
  private readonly resolve: (host: string) => Promise<unknown>;
  private readonly logger: ILogger;

  constructor(options: DnsNetworkInfoOptions = {}) {
    this.probeHost = options.probeHost ?? 'example.com';
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.resolve = options.resolve ?? ((host) => lookup(host));
    this.logger = options.logger ?? consoleLogger;
  }

  async isConnected(): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Resolving ${this.probeHost} timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });

    try {
      await Promise.race([this.resolve(this.probeHost), timeout]);
      return true;
    } catch (error) {
      this.logger.debug(`Connectivity probe failed: ${errorMessage(error)}`);
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}
