/**
 * Explorer HTTP transport tests
 */

import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { ExplorerTransport } from '../../src/services/blockchain/ExplorerTransport';
import { TransportError } from '../../src/services/utils/AnalysisErrors';
import { V2_POOL } from '../helpers/fixtures';

const TOPIC = '0xd78ad95fa46c994b6551d0da85fc275fe613ce37657fb8d5e3d130840159d822';

function reply(data: unknown): AxiosResponse<unknown> {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

function explorerLog(blockNumber: number, logIndex: string, timeStamp?: string): Record<string, unknown> {
  return {
    address: V2_POOL,
    topics: [TOPIC],
    data: '0x',
    blockNumber: '0x' + blockNumber.toString(16),
    logIndex,
    transactionHash: `0xtx${blockNumber}`,
    ...(timeStamp ? { timeStamp } : {}),
  };
}

function listReply(logs: Array<Record<string, unknown>>): AxiosResponse<unknown> {
  return reply({ status: '1', message: 'OK', result: logs });
}

describe('ExplorerTransport', () => {
  const client = axios.create();
  let get: jest.SpyInstance;
  let transport: ExplorerTransport;

  function createTransport(pageSize?: number): ExplorerTransport {
    return new ExplorerTransport({
      apiKey: 'test-api-key',
      chainId: 1,
      baseUrl: 'http://explorer.test/api',
      timeoutMs: 1000,
      requestsPerSecond: 1000,
      retryDelayMs: 1,
      pageSize,
      client,
    });
  }

  function paramsOf(call: number): unknown {
    const config: unknown = get.mock.calls[call][1];
    return typeof config === 'object' && config !== null ? Reflect.get(config, 'params') : undefined;
  }

  const query = { address: V2_POOL, fromBlock: 100, toBlock: 199, topics: [TOPIC] };

  beforeEach(() => {
    get = jest.spyOn(client, 'get');
    transport = createTransport();
  });

  afterEach(() => {
    get.mockRestore();
  });

  describe('getLogs', () => {
    it('should map hex fields and sort by position', async () => {
      get.mockResolvedValueOnce(
        listReply([explorerLog(101, '0x2'), explorerLog(100, '0x', '0x6553f100')])
      );

      const logs = await transport.getLogs(query);

      expect(logs).toEqual([
        { blockNumber: 100, logIndex: 0, transactionHash: '0xtx100', topics: [TOPIC], data: '0x', timestamp: 1_700_000_000 },
        { blockNumber: 101, logIndex: 2, transactionHash: '0xtx101', topics: [TOPIC], data: '0x', timestamp: undefined },
      ]);
      expect(paramsOf(0)).toEqual({
        chainid: 1,
        module: 'logs',
        action: 'getLogs',
        address: V2_POOL,
        fromBlock: 100,
        toBlock: 199,
        topic0: TOPIC,
        page: 1,
        offset: 1000,
        apikey: 'test-api-key',
      });
    });

    it('should follow pages until one comes back short', async () => {
      transport = createTransport(2);
      get
        .mockResolvedValueOnce(listReply([explorerLog(100, '0x0'), explorerLog(101, '0x0')]))
        .mockResolvedValueOnce(listReply([explorerLog(102, '0x0')]));

      const logs = await transport.getLogs(query);

      expect(logs.map((log) => log.blockNumber)).toEqual([100, 101, 102]);
      expect(get).toHaveBeenCalledTimes(2);
      expect(paramsOf(1)).toMatchObject({ page: 2, offset: 2 });
    });

    it('should split the range when paging would pass the result window', async () => {
      transport = createTransport(6000);
      const fullPage = Array.from({ length: 6000 }, (_, i) => explorerLog(100, '0x' + i.toString(16)));
      get
        .mockResolvedValueOnce(listReply(fullPage))
        .mockResolvedValueOnce(listReply([explorerLog(120, '0x1')]))
        .mockResolvedValueOnce(listReply([explorerLog(180, '0x1')]));

      const logs = await transport.getLogs(query);

      expect(logs.map((log) => log.blockNumber)).toEqual([120, 180]);
      expect(paramsOf(1)).toMatchObject({ fromBlock: 100, toBlock: 149, page: 1 });
      expect(paramsOf(2)).toMatchObject({ fromBlock: 150, toBlock: 199, page: 1 });
    });

    it('should treat "No records found" as an empty result', async () => {
      get.mockResolvedValueOnce(reply({ status: '0', message: 'No records found', result: [] }));

      expect(await transport.getLogs(query)).toEqual([]);
    });

    it('should fail on other error statuses without retrying', async () => {
      get.mockResolvedValue(reply({ status: '0', message: 'NOTOK', result: 'Invalid API Key' }));

      await expect(transport.getLogs(query)).rejects.toThrow('Explorer getLogs failed: Invalid API Key');
      expect(get).toHaveBeenCalledTimes(1);
    });

    it('should retry when the explorer reports a rate limit', async () => {
      get
        .mockResolvedValueOnce(reply({ status: '0', message: 'NOTOK', result: 'Max rate limit reached' }))
        .mockResolvedValueOnce(listReply([explorerLog(100, '0x0')]));

      const logs = await transport.getLogs(query);

      expect(logs).toHaveLength(1);
      expect(get).toHaveBeenCalledTimes(2);
    });
  });

  describe('proxy calls', () => {
    it('should read the latest block number', async () => {
      get.mockResolvedValueOnce(reply({ jsonrpc: '2.0', id: 1, result: '0x3e8' }));

      expect(await transport.getLatestBlock()).toBe(1000);
      expect(paramsOf(0)).toMatchObject({ module: 'proxy', action: 'eth_blockNumber' });
    });

    it('should read block timestamps', async () => {
      get.mockResolvedValueOnce(
        reply({ jsonrpc: '2.0', id: 1, result: { number: '0x64', timestamp: '0x6553f100' } })
      );

      expect(await transport.getBlockTimestamp(100)).toBe(1_700_000_000);
      expect(paramsOf(0)).toMatchObject({ action: 'eth_getBlockByNumber', tag: '0x64', boolean: 'false' });
    });

    it('should fail when a block is missing', async () => {
      get.mockResolvedValueOnce(reply({ jsonrpc: '2.0', id: 1, result: null }));

      await expect(transport.getBlockTimestamp(100)).rejects.toThrow('Block 100 not available');
    });

    it('should pass the block tag and timeout through eth_call', async () => {
      get
        .mockResolvedValueOnce(reply({ jsonrpc: '2.0', id: 1, result: '0xdead' }))
        .mockResolvedValueOnce(reply({ jsonrpc: '2.0', id: 2, result: '0xbeef' }));

      expect(await transport.call({ to: V2_POOL, data: '0x0dfe1681', blockTag: 255 }, 5000)).toBe('0xdead');
      expect(await transport.call({ to: V2_POOL, data: '0x0dfe1681' })).toBe('0xbeef');

      expect(paramsOf(0)).toMatchObject({ action: 'eth_call', to: V2_POOL, data: '0x0dfe1681', tag: '0xff' });
      expect(get.mock.calls[0][1]).toMatchObject({ timeout: 5000 });
      expect(paramsOf(1)).toMatchObject({ tag: 'latest' });
      expect(get.mock.calls[1][1]).toMatchObject({ timeout: 1000 });
    });

    it('should surface JSON-RPC errors', async () => {
      get.mockResolvedValueOnce(
        reply({ jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'execution reverted' } })
      );

      await expect(transport.call({ to: V2_POOL, data: '0x0dfe1681' })).rejects.toThrow(
        `eth_call ${V2_POOL} failed: execution reverted`
      );
    });

    it('should give up on network errors after the last attempt', async () => {
      get.mockRejectedValue(new Error('network timeout'));

      const latest = transport.getLatestBlock();

      await expect(latest).rejects.toBeInstanceOf(TransportError);
      await expect(latest).rejects.toThrow('Explorer eth_blockNumber failed: network timeout');
      expect(get).toHaveBeenCalledTimes(3);
    });
  });
});
