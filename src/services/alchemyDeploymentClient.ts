import { Alchemy, Network, Utils, Wallet } from 'alchemy-sdk';
import { IDeploymentClient } from '../interfaces/IDeploymentClient.js';
import { DeployedNetworkInfo, DeploymentReceipt, DeployTransactionRequest } from '../types/deployment.js';

export interface AlchemyDeploymentClientOptions {
  apiKey: string;
  network: Network;
  privateKey: string;
  // Overrides the Alchemy endpoint, e.g. a public Base RPC
  rpcUrl?: string;
}

/**
 * Deployment client backed by the Alchemy SDK provider and wallet
 */
export class AlchemyDeploymentClient implements IDeploymentClient {
  private readonly alchemy: Alchemy;
  private readonly wallet: Wallet;

  constructor(options: AlchemyDeploymentClientOptions) {
    this.alchemy = new Alchemy({
      apiKey: options.apiKey,
      network: options.network,
      url: options.rpcUrl,
    });
    this.wallet = new Wallet(options.privateKey, this.alchemy);
    console.log(`✅ Alchemy deployment client initialized for ${options.network}`);
  }

  async getChainId(): Promise<number> {
    const provider = await this.alchemy.config.getProvider();
    const network = await provider.getNetwork();
    return network.chainId;
  }

  getDeployerAddress(): Promise<string> {
    return this.wallet.getAddress();
  }

  async getBalance(address: string): Promise<bigint> {
    const balance = await this.alchemy.core.getBalance(address);
    return BigInt(balance.toString());
  }

  async estimateDeployGas(bytecode: string): Promise<bigint> {
    const estimate = await this.alchemy.core.estimateGas({
      from: await this.wallet.getAddress(),
      data: bytecode,
    });
    return BigInt(estimate.toString());
  }

  async getGasPrice(): Promise<bigint> {
    const gasPrice = await this.alchemy.core.getGasPrice();
    return BigInt(gasPrice.toString());
  }

  async sendDeployTransaction(request: DeployTransactionRequest): Promise<string> {
    const response = await this.wallet.sendTransaction({
      data: request.bytecode,
      gasLimit: request.gasLimit.toString(),
      gasPrice: request.gasPrice.toString(),
    });
    return response.hash;
  }

  async waitForReceipt(transactionHash: string, confirmations: number): Promise<DeploymentReceipt> {
    const provider = await this.alchemy.config.getProvider();
    const receipt = await provider.waitForTransaction(transactionHash, confirmations);
    return {
      contractAddress: receipt.contractAddress ?? null,
      blockNumber: receipt.blockNumber,
      gasUsed: BigInt(receipt.gasUsed.toString()),
    };
  }

  getCode(address: string): Promise<string> {
    return this.alchemy.core.getCode(address);
  }

  async readNetworkInfo(address: string, abi: unknown[]): Promise<DeployedNetworkInfo> {
    const [chainId, bridge, blockNumber] = await this.callView(address, abi, 'getBaseNetworkInfo');
    return {
      chainId: BigInt(String(chainId)),
      bridge: String(bridge),
      blockNumber: BigInt(String(blockNumber)),
    };
  }

  async readBalance(address: string, abi: unknown[]): Promise<bigint> {
    const [balance] = await this.callView(address, abi, 'getBalance');
    return BigInt(String(balance));
  }

  private async callView(address: string, abi: unknown[], method: string): Promise<unknown[]> {
    const contractInterface = new Utils.Interface(JSON.stringify(abi));
    const data = contractInterface.encodeFunctionData(method);
    const raw = await this.alchemy.core.call({ to: address, data });
    return Array.from(contractInterface.decodeFunctionResult(method, raw));
  }
}
