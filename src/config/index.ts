import path from 'path';
import { Network, Utils } from 'alchemy-sdk';
import { Address } from '../types/index.js';
import { GenesisAllocation } from '../services/ledgerService.js';
import { EthereumService } from '../services/ethereumService.js';

type Env = NodeJS.ProcessEnv;

// Base network constants
export const BASE_CHAIN_ID = 8453;
export const BASE_RPC_URL = 'https://mainnet.base.org';
export const BASE_BRIDGE_ADDRESS = '0x3154Cf16ccdb4C6d922629664174b904d80F2C35';

export const DEFAULT_ACCOUNT_ADDRESS = '0x000000000000000000000000000000000000ba5e';
export const DEFAULT_PORT = 3000;

export interface ChainConfig {
  id: number;
  name: string;
  displayName: string;
  alchemyNetwork: Network;
  explorerUrl: string;
}

export const SUPPORTED_CHAINS: ChainConfig[] = [
  {
    id: 8453,
    name: 'base-mainnet',
    displayName: 'Base',
    alchemyNetwork: Network.BASE_MAINNET,
    explorerUrl: 'https://basescan.org'
  },
  {
    id: 84532,
    name: 'base-sepolia',
    displayName: 'Base Sepolia',
    alchemyNetwork: Network.BASE_SEPOLIA,
    explorerUrl: 'https://sepolia.basescan.org'
  }
];

export function getChainConfig(chainId: number): ChainConfig | null {
  return SUPPORTED_CHAINS.find(chain => chain.id === chainId) || null;
}

// Designated network the utility account is allowed to run on
export interface NetworkConfig {
  chainId: bigint;
  bridgeAddress: Address;
  rpcUrl: string;
}

export interface LedgerConfig {
  // Chain id reported by the local execution environment
  executionChainId: bigint;
  accountAddress: Address;
  genesis: GenesisAllocation[];
}

export interface ServerConfig {
  port: number;
}

export interface DeploymentConfig {
  network: NetworkConfig;
  networkName: string;
  minDeployerBalance: bigint;
  gasLimitBufferPercent: bigint;
  confirmations: number;
  artifactPath: string;
  deploymentsDir: string;
  // Set only when BASE_RPC_URL is given; otherwise the client talks to Alchemy
  rpcUrlOverride?: string;
}

export interface DeploymentCredentials {
  alchemyApiKey: string;
  deployerPrivateKey: string;
}

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw.trim(), 10);
}

function readAddress(env: Env, name: string, fallback: string): Address {
  const raw = env[name] || fallback;
  const address = EthereumService.toAddress(raw);
  if (!address) {
    throw new Error(`${name} must be a valid Ethereum address, got "${raw}"`);
  }
  return address;
}

/**
 * Parse "address=wei,address=wei" into genesis allocations
 */
export function parseGenesis(raw: string | undefined): GenesisAllocation[] {
  if (!raw || raw.trim() === '') return [];

  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => {
      const [addressPart, balancePart] = entry.split('=').map(part => part.trim());
      const address = EthereumService.toAddress(addressPart);
      if (!address || balancePart === undefined || !/^\d+$/.test(balancePart)) {
        throw new Error(`LEDGER_GENESIS entry must look like "<address>=<wei>", got "${entry}"`);
      }
      return { address, balance: BigInt(balancePart) };
    });
}

export function loadNetworkConfig(env: Env = process.env): NetworkConfig {
  return {
    chainId: BigInt(readInteger(env, 'BASE_CHAIN_ID', BASE_CHAIN_ID)),
    bridgeAddress: readAddress(env, 'BASE_BRIDGE_ADDRESS', BASE_BRIDGE_ADDRESS),
    rpcUrl: env.BASE_RPC_URL || BASE_RPC_URL,
  };
}

export function loadLedgerConfig(env: Env = process.env): LedgerConfig {
  const network = loadNetworkConfig(env);
  return {
    executionChainId: BigInt(readInteger(env, 'EXECUTION_CHAIN_ID', Number(network.chainId))),
    accountAddress: readAddress(env, 'UTILS_ACCOUNT_ADDRESS', DEFAULT_ACCOUNT_ADDRESS),
    genesis: parseGenesis(env.LEDGER_GENESIS),
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: readInteger(env, 'PORT', DEFAULT_PORT),
  };
}

export function loadDeploymentConfig(env: Env = process.env): DeploymentConfig {
  const minBalanceEth = env.MIN_DEPLOYER_BALANCE_ETH || '0.01';
  let minDeployerBalance: bigint;
  try {
    minDeployerBalance = BigInt(Utils.parseEther(minBalanceEth).toString());
  } catch (error) {
    throw new Error(`MIN_DEPLOYER_BALANCE_ETH must be an ETH amount, got "${minBalanceEth}"`, { cause: error });
  }

  return {
    network: loadNetworkConfig(env),
    networkName: env.DEPLOYMENT_NETWORK || 'base-mainnet',
    minDeployerBalance,
    gasLimitBufferPercent: BigInt(readInteger(env, 'GAS_LIMIT_BUFFER_PERCENT', 120)),
    confirmations: readInteger(env, 'DEPLOY_CONFIRMATIONS', 1),
    artifactPath: path.resolve(env.CONTRACT_ARTIFACT_PATH || path.join('artifacts', 'contracts', 'BaseUtils.sol', 'BaseUtils.json')),
    deploymentsDir: path.resolve(env.DEPLOYMENTS_DIR || 'deployments'),
    rpcUrlOverride: env.BASE_RPC_URL || undefined,
  };
}

/**
 * Credentials are only needed by the deployment script
 */
export function loadDeploymentCredentials(env: Env = process.env): DeploymentCredentials {
  if (!env.ALCHEMY_API_KEY) {
    throw new Error('ALCHEMY_API_KEY environment variable is required. Please set it in your .env file.');
  }

  if (!env.DEPLOYER_PRIVATE_KEY) {
    throw new Error('DEPLOYER_PRIVATE_KEY environment variable is required. Please set it in your .env file.');
  }

  return {
    alchemyApiKey: env.ALCHEMY_API_KEY,
    deployerPrivateKey: env.DEPLOYER_PRIVATE_KEY,
  };
}
