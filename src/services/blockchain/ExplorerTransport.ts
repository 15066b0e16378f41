'use strict';

import axios, { AxiosInstance } from 'axios';
import Joi from 'joi';
import { logger } from '../utils/Logger';
import { RateLimiter, withRetry, parseErrorMessage } from '../utils/ErrorHandler';
import { TransportError } from '../utils/AnalysisErrors';
import { RawLogEntry } from '../../types/swap.types';
import { CallRequest, ChainTransport, LogQuery } from '../../types/transport.types';

export interface ExplorerTransportOptions {
  apiKey: string;
  chainId: number;
  baseUrl: string;
  timeoutMs: number;
  requestsPerSecond: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  pageSize?: number;
  client?: AxiosInstance;
}

interface ExplorerLog {
  address: string;
  topics: string[];
  data: string;
  blockNumber: string;
  timeStamp?: string;
  logIndex: string;
  transactionHash: string;
}

interface ExplorerListResponse {
  status: string;
  message: string;
  result: ExplorerLog[] | string;
}

interface ProxyResponse {
  result?: unknown;
  error?: { code?: number; message: string };
  status?: string;
  message?: string;
}

interface ExplorerBlock {
  timestamp: string;
}

const HEX = /^0x[0-9a-fA-F]*$/;

const logSchema = Joi.object<ExplorerLog>({
  address: Joi.string().required(),
  topics: Joi.array().items(Joi.string().pattern(HEX)).required(),
  data: Joi.string().pattern(HEX).required(),
  blockNumber: Joi.string().pattern(HEX).required(),
  timeStamp: Joi.string().pattern(HEX),
  logIndex: Joi.string().pattern(HEX).required(),
  transactionHash: Joi.string().required(),
}).unknown(true);

const listResponseSchema = Joi.object<ExplorerListResponse>({
  status: Joi.string().required(),
  message: Joi.string().allow('').required(),
  result: Joi.alternatives(Joi.array().items(logSchema), Joi.string().allow('')).required(),
}).unknown(true);

const proxyResponseSchema = Joi.object<ProxyResponse>({
  result: Joi.any(),
  error: Joi.object({
    code: Joi.number(),
    message: Joi.string().allow('').required(),
  }).unknown(true),
  status: Joi.string(),
  message: Joi.string().allow(''),
}).unknown(true);

const blockSchema = Joi.object<ExplorerBlock>({
  timestamp: Joi.string().pattern(HEX).required(),
}).unknown(true);

const hexResultSchema = Joi.string().pattern(HEX).required();

// Explorer log pagination stops at page * offset = 10000
const MAX_RESULT_WINDOW = 10000;

const NO_RECORDS = 'no records found';

/**
 * Explorer quirk: index zero can arrive as a bare "0x"
 */
function hexToNumber(value: string): number {
  return value === '0x' ? 0 : parseInt(value, 16);
}

function toHex(value: number): string {
  return '0x' + value.toString(16);
}

/**
 * Etherscan-compatible HTTP API transport
 */
export class ExplorerTransport implements ChainTransport {
  readonly name = 'explorer';
  private client: AxiosInstance;
  private limiter: RateLimiter;
  private pageSize: number;
  private maxAttempts: number;
  private retryDelayMs: number;

  constructor(private options: ExplorerTransportOptions) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
      });
    this.limiter = new RateLimiter(
      Math.max(1, Math.ceil(options.requestsPerSecond)),
      options.requestsPerSecond
    );
    this.pageSize = options.pageSize ?? 1000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async getLogs(query: LogQuery): Promise<RawLogEntry[]> {
    const entries: RawLogEntry[] = [];

    // topic0 takes a single value per request
    for (const topic of query.topics) {
      entries.push(...(await this.getLogsForTopic(query, topic, query.fromBlock, query.toBlock)));
    }

    return entries.sort((a, b) => a.blockNumber - b.blockNumber || a.logIndex - b.logIndex);
  }

  private async getLogsForTopic(
    query: LogQuery,
    topic: string,
    fromBlock: number,
    toBlock: number
  ): Promise<RawLogEntry[]> {
    const entries: RawLogEntry[] = [];

    for (let page = 1; ; page++) {
      if (page * this.pageSize > MAX_RESULT_WINDOW) {
        if (fromBlock === toBlock) {
          throw new TransportError(
            `Block ${fromBlock} has more logs than the explorer can page through`,
            this.name
          );
        }

        logger.debug('Explorer result window exceeded, splitting range', { fromBlock, toBlock });
        const middle = Math.floor((fromBlock + toBlock) / 2);
        return [
          ...(await this.getLogsForTopic(query, topic, fromBlock, middle)),
          ...(await this.getLogsForTopic(query, topic, middle + 1, toBlock)),
        ];
      }

      const logs = await this.fetchLogPage(query.address, topic, fromBlock, toBlock, page);
      entries.push(...logs);

      if (logs.length < this.pageSize) {
        return entries;
      }
    }
  }

  private async fetchLogPage(
    address: string,
    topic: string,
    fromBlock: number,
    toBlock: number,
    page: number
  ): Promise<RawLogEntry[]> {
    const body = await this.request(
      {
        module: 'logs',
        action: 'getLogs',
        address,
        fromBlock,
        toBlock,
        topic0: topic,
        page,
        offset: this.pageSize,
      },
      `getLogs ${fromBlock}-${toBlock} page ${page}`
    );

    const { error, value } = listResponseSchema.validate(body);
    if (error) {
      throw new TransportError(`Malformed getLogs response: ${error.message}`, this.name);
    }

    if (value.status !== '1') {
      if (value.message.toLowerCase().includes(NO_RECORDS)) {
        return [];
      }
      const detail = typeof value.result === 'string' ? value.result : value.message;
      throw new TransportError(`Explorer getLogs failed: ${detail}`, this.name);
    }

    if (typeof value.result === 'string') {
      throw new TransportError(`Explorer getLogs failed: ${value.result}`, this.name);
    }

    return value.result.map((log) => ({
      blockNumber: hexToNumber(log.blockNumber),
      transactionHash: log.transactionHash,
      logIndex: hexToNumber(log.logIndex),
      topics: log.topics,
      data: log.data,
      timestamp: log.timeStamp ? hexToNumber(log.timeStamp) : undefined,
    }));
  }

  async getBlockTimestamp(blockNumber: number): Promise<number> {
    const result = await this.proxy(
      { action: 'eth_getBlockByNumber', tag: toHex(blockNumber), boolean: 'false' },
      `eth_getBlockByNumber ${blockNumber}`
    );

    const { error, value } = blockSchema.validate(result);
    if (error) {
      throw new TransportError(`Block ${blockNumber} not available`, this.name);
    }
    return hexToNumber(value.timestamp);
  }

  async getLatestBlock(): Promise<number> {
    const result = await this.proxy({ action: 'eth_blockNumber' }, 'eth_blockNumber');
    return hexToNumber(this.expectHex(result, 'eth_blockNumber'));
  }

  async call(request: CallRequest, timeoutMs?: number): Promise<string> {
    const result = await this.proxy(
      {
        action: 'eth_call',
        to: request.to,
        data: request.data,
        tag: request.blockTag === undefined ? 'latest' : toHex(request.blockTag),
      },
      `eth_call ${request.to}`,
      timeoutMs
    );
    return this.expectHex(result, 'eth_call');
  }

  private expectHex(result: unknown, context: string): string {
    const { error, value } = hexResultSchema.validate(result);
    if (error || typeof value !== 'string') {
      throw new TransportError(`Unexpected ${context} result`, this.name);
    }
    return value;
  }

  private async proxy(
    params: Record<string, string>,
    context: string,
    timeoutMs?: number
  ): Promise<unknown> {
    const body = await this.request({ module: 'proxy', ...params }, context, timeoutMs);

    const { error, value } = proxyResponseSchema.validate(body);
    if (error) {
      throw new TransportError(`Malformed ${context} response: ${error.message}`, this.name);
    }

    if (value.error) {
      throw new TransportError(`${context} failed: ${value.error.message}`, this.name);
    }

    // Rate limit and key errors come back in the list envelope
    if (value.status === '0') {
      const detail = typeof value.result === 'string' ? value.result : value.message;
      throw new TransportError(`${context} failed: ${detail ?? 'unknown error'}`, this.name);
    }

    return value.result;
  }

  private async request(
    params: Record<string, string | number>,
    context: string,
    timeoutMs?: number
  ): Promise<unknown> {
    try {
      return await withRetry(
        async () => {
          await this.limiter.acquire();
          const response = await this.client.get<unknown>('', {
            params: {
              chainid: this.options.chainId,
              ...params,
              apikey: this.options.apiKey,
            },
            timeout: timeoutMs ?? this.options.timeoutMs,
          });
          return this.rejectRateLimited(response.data);
        },
        { maxAttempts: this.maxAttempts, delayMs: this.retryDelayMs },
        `Explorer ${context}`
      );
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(
        `Explorer ${context} failed: ${parseErrorMessage(error)}`,
        this.name,
        error
      );
    }
  }

  /**
   * Throttling is reported in a 200 body; surface it as an error so it is retried
   */
  private rejectRateLimited(body: unknown): unknown {
    const { value } = proxyResponseSchema.validate(body);
    if (value && value.status === '0' && typeof value.result === 'string') {
      if (value.result.toLowerCase().includes('rate limit')) {
        throw new Error(`Explorer rate limit: ${value.result}`);
      }
    }
    return body;
  }
}

export default ExplorerTransport;
