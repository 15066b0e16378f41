'use strict';

import { ethers } from 'ethers';
import { CallTransport } from '../../types/transport.types';

export interface ReadOptions {
  blockTag?: number;
  timeoutMs?: number;
}

interface CompiledFragment {
  iface: ethers.Interface;
  fragment: ethers.FunctionFragment;
}

/**
 * Read-only contract calls from human-readable ABI fragments
 */
export class ContractReader {
  private compiled: Map<string, CompiledFragment> = new Map();

  constructor(private transport: CallTransport) {}

  /**
   * e.g. read(pool, 'function fee() view returns (uint24)')
   */
  async read(
    address: string,
    signature: string,
    args: ReadonlyArray<unknown> = [],
    options: ReadOptions = {}
  ): Promise<ethers.Result> {
    const { iface, fragment } = this.compile(signature);
    const data = iface.encodeFunctionData(fragment, args);

    const raw = await this.transport.call(
      { to: address, data, blockTag: options.blockTag },
      options.timeoutMs
    );

    return iface.decodeFunctionResult(fragment, raw);
  }

  private compile(signature: string): CompiledFragment {
    let compiled = this.compiled.get(signature);
    if (!compiled) {
      const fragment = ethers.FunctionFragment.from(signature);
      compiled = { iface: new ethers.Interface([fragment]), fragment };
      this.compiled.set(signature, compiled);
    }
    return compiled;
  }
}

export default ContractReader;
