import { BlockHeader } from '../types/index.js';

export interface ChainEnvironment {
  getChainId(): bigint;
  getBlockNumber(): bigint;
  getBlockTimestamp(): bigint;
  mineBlock(): BlockHeader;
}

export interface LocalChainOptions {
  chainId: bigint;
  genesisBlockNumber?: bigint;
  // Returns the current time in milliseconds
  clock?: () => number;
}

/**
 * Execution environment seen by the account: chain identity plus block height and time.
 * Every committed state change is sealed into its own block.
 */
export class LocalChainService implements ChainEnvironment {
  private readonly chainId: bigint;
  private readonly clock: () => number;
  private head: BlockHeader;

  constructor(options: LocalChainOptions) {
    this.chainId = options.chainId;
    this.clock = options.clock ?? Date.now;
    this.head = {
      number: options.genesisBlockNumber ?? 0n,
      timestamp: this.now(),
    };
  }

  getChainId(): bigint {
    return this.chainId;
  }

  getBlockNumber(): bigint {
    return this.head.number;
  }

  getBlockTimestamp(): bigint {
    return this.head.timestamp;
  }

  mineBlock(): BlockHeader {
    const now = this.now();
    const minimum = this.head.timestamp + 1n;
    this.head = {
      number: this.head.number + 1n,
      timestamp: now > minimum ? now : minimum,
    };
    return { ...this.head };
  }

  private now(): bigint {
    return BigInt(Math.floor(this.clock() / 1000));
  }
}
