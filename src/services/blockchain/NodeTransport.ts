'use strict';

import { ethers } from 'ethers';
import { logger } from '../utils/Logger';
import { withRetry, withTimeout } from '../utils/ErrorHandler';
import { TransportError } from '../utils/AnalysisErrors';
import { RawLogEntry } from '../../types/swap.types';
import { CallRequest, ChainTransport, LogQuery } from '../../types/transport.types';

export interface NodeTransportOptions {
  timeoutMs: number;
  maxAttempts?: number;
  retryDelayMs?: number;
}

/**
 * JSON-RPC transport over an (archive) node
 */
export class NodeTransport implements ChainTransport {
  readonly name = 'node';
  private provider: ethers.JsonRpcProvider;
  private options: Required<NodeTransportOptions>;

  constructor(provider: ethers.JsonRpcProvider | string, options: NodeTransportOptions) {
    this.provider =
      typeof provider === 'string'
        ? new ethers.JsonRpcProvider(provider, undefined, { staticNetwork: true })
        : provider;
    this.options = { maxAttempts: 3, retryDelayMs: 500, ...options };
  }

  /**
   * Mask API key in URL for logging
   */
  static maskUrl(url: string): string {
    return url.replace(/\/(v2|v3)\/[a-zA-Z0-9_-]+/, '/$1/***');
  }

  async getLogs(query: LogQuery): Promise<RawLogEntry[]> {
    const logs = await this.request(
      () =>
        this.provider.getLogs({
          address: query.address,
          fromBlock: query.fromBlock,
          toBlock: query.toBlock,
          topics: [query.topics],
        }),
      `eth_getLogs ${query.fromBlock}-${query.toBlock}`
    );

    return logs
      .map((log) => ({
        blockNumber: log.blockNumber,
        transactionHash: log.transactionHash,
        logIndex: log.index,
        topics: [...log.topics],
        data: log.data,
      }))
      .sort((a, b) => a.blockNumber - b.blockNumber || a.logIndex - b.logIndex);
  }

  async getBlockTimestamp(blockNumber: number): Promise<number> {
    const block = await this.request(
      () => this.provider.getBlock(blockNumber),
      `eth_getBlockByNumber ${blockNumber}`
    );

    if (!block) {
      throw new TransportError(`Block ${blockNumber} not found`, this.name);
    }
    return block.timestamp;
  }

  async getLatestBlock(): Promise<number> {
    return this.request(() => this.provider.getBlockNumber(), 'eth_blockNumber');
  }

  async call(request: CallRequest, timeoutMs?: number): Promise<string> {
    return this.request(
      () =>
        this.provider.call({
          to: request.to,
          data: request.data,
          blockTag: request.blockTag,
        }),
      `eth_call ${request.to}`,
      timeoutMs
    );
  }

  private async request<T>(fn: () => Promise<T>, context: string, timeoutMs?: number): Promise<T> {
    const timeout = timeoutMs ?? this.options.timeoutMs;

    try {
      return await withRetry(
        () => withTimeout(fn(), timeout, context, this.name),
        { maxAttempts: this.options.maxAttempts, delayMs: this.options.retryDelayMs },
        context
      );
    } catch (error) {
      logger.debug(`Node request failed: ${context}`, { error: String(error) });
      if (error instanceof TransportError) throw error;
      throw new TransportError(`${context} failed`, this.name, error);
    }
  }

  destroy(): void {
    this.provider.destroy();
  }
}

export default NodeTransport;
