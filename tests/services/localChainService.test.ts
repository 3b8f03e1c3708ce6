import { LocalChainService } from '../../src/services/localChainService.js';
import { FIXED_NOW_MS, GENESIS_TIMESTAMP } from '../utils/testHelpers.js';

describe('LocalChainService', () => {
  it('reports its chain id and the genesis block', () => {
    const chain = new LocalChainService({ chainId: 8453n, clock: () => FIXED_NOW_MS });

    expect(chain.getChainId()).toBe(8453n);
    expect(chain.getBlockNumber()).toBe(0n);
    expect(chain.getBlockTimestamp()).toBe(GENESIS_TIMESTAMP);
  });

  it('starts from a configured genesis height', () => {
    const chain = new LocalChainService({ chainId: 1n, genesisBlockNumber: 100n, clock: () => FIXED_NOW_MS });

    expect(chain.mineBlock()).toEqual({ number: 101n, timestamp: GENESIS_TIMESTAMP + 1n });
  });

  it('keeps block timestamps strictly increasing while the clock stands still', () => {
    const chain = new LocalChainService({ chainId: 8453n, clock: () => FIXED_NOW_MS });

    chain.mineBlock();
    const second = chain.mineBlock();

    expect(second).toEqual({ number: 2n, timestamp: GENESIS_TIMESTAMP + 2n });
    expect(chain.getBlockTimestamp()).toBe(GENESIS_TIMESTAMP + 2n);
  });

  it('follows the clock when it moves ahead', () => {
    let now = FIXED_NOW_MS;
    const chain = new LocalChainService({ chainId: 8453n, clock: () => now });

    now += 60_500;

    expect(chain.mineBlock().timestamp).toBe(GENESIS_TIMESTAMP + 60n);
  });
});
