// Minimal shape of a compiled contract artifact (Hardhat or Foundry JSON)
export interface ContractArtifact {
  contractName: string;
  abi: unknown[];
  bytecode: string;
}

export interface DeployTransactionRequest {
  bytecode: string;
  gasLimit: bigint;
  gasPrice: bigint;
}

export interface DeploymentReceipt {
  contractAddress: string | null;
  blockNumber: number;
  gasUsed: bigint;
}

// What the deployed contract reports from getBaseNetworkInfo()
export interface DeployedNetworkInfo {
  chainId: bigint;
  bridge: string;
  blockNumber: bigint;
}

export interface DeploymentRecord {
  contractName: string;
  address: string;
  transactionHash: string;
  blockNumber: number;
  gasEstimate: string;
  // Gas actually consumed, from the receipt
  gasUsed: string;
  gasPrice: string;
  deploymentCost: string;
  network: string;
  chainId: number;
  deployer: string;
  timestamp: string;
  baseConstants: {
    chainId: number;
    bridge: string;
    rpcUrl: string;
  };
}
