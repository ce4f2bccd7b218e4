/**
 * @fileoverview Unit tests for connectivity probes
 */

import { DnsNetworkInfo, ILogger, StaticNetworkInfo } from '../../../src';

describe('StaticNetworkInfo', () => {
  it('should report the last state it was given', async () => {
    const info = new StaticNetworkInfo();

    await expect(info.isConnected()).resolves.toBe(true);
    info.setConnected(false);
    await expect(info.isConnected()).resolves.toBe(false);
  });
});

describe('DnsNetworkInfo', () => {
  let logger: jest.Mocked<ILogger>;

  beforeEach(() => {
    logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  });

  it('should be connected when the probe host resolves', async () => {
    const resolve = jest.fn(async () => ({ address: '192.0.2.1' }));
    const info = new DnsNetworkInfo({ probeHost: 'probe.test', resolve, logger });

    await expect(info.isConnected()).resolves.toBe(true);
    expect(resolve).toHaveBeenCalledWith('probe.test');
  });

  it('should be offline when resolution fails', async () => {
    const info = new DnsNetworkInfo({
      resolve: () => Promise.reject(new Error('getaddrinfo ENOTFOUND example.com')),
      logger,
    });

    await expect(info.isConnected()).resolves.toBe(false);
    expect(logger.debug).toHaveBeenCalledWith(
      'Connectivity probe failed: getaddrinfo ENOTFOUND example.com',
    );
  });

  it('should be offline when resolution takes too long', async () => {
    const info = new DnsNetworkInfo({
      probeHost: 'slow.test',
      timeoutMs: 10,
      resolve: () => new Promise(() => undefined),
      logger,
    });

    await expect(info.isConnected()).resolves.toBe(false);
    expect(logger.debug).toHaveBeenCalledWith(
      'Connectivity probe failed: Resolving slow.test timed out after 10ms',
    );
  });
});
