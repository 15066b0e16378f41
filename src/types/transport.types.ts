/**
 * Chain transport contracts
 */

import { RawLogEntry } from './swap.types';

export interface LogQuery {
  address: string;
  fromBlock: number;
  toBlock: number;
  topics: string[];
}

export interface CallRequest {
  to: string;
  data: string;
  blockTag?: number; // Historical read when set
}

export interface LogTransport {
  /**
   * Resolves to an empty array when the range has no events; rejects only
   * when the request itself failed.
   */
  getLogs(query: LogQuery): Promise<RawLogEntry[]>;
}

export interface BlockSource {
  getBlockTimestamp(blockNumber: number): Promise<number>;
  getLatestBlock(): Promise<number>;
}

export interface CallTransport {
  call(request: CallRequest, timeoutMs?: number): Promise<string>;
}

export interface ChainTransport extends LogTransport, BlockSource, CallTransport {
  readonly name: string;
  destroy?(): void; // Releases sockets and timers
}
