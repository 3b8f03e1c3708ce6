import { DeployedNetworkInfo, DeploymentReceipt, DeployTransactionRequest } from '../types/deployment.js';

/**
 * RPC operations the deployment script needs from a provider and signer
 */
export interface IDeploymentClient {
  getChainId(): Promise<number>;

  getDeployerAddress(): Promise<string>;

  getBalance(address: string): Promise<bigint>;

  estimateDeployGas(bytecode: string): Promise<bigint>;

  getGasPrice(): Promise<bigint>;

  /**
   * Submit the contract creation transaction and return its hash
   */
  sendDeployTransaction(request: DeployTransactionRequest): Promise<string>;

  waitForReceipt(transactionHash: string, confirmations: number): Promise<DeploymentReceipt>;

  getCode(address: string): Promise<string>;

  /**
   * Read-only calls against the deployed contract, used as a smoke test
   */
  readNetworkInfo(address: string, abi: unknown[]): Promise<DeployedNetworkInfo>;

  readBalance(address: string, abi: unknown[]): Promise<bigint>;
}
