import 'dotenv/config';
import {
  DeploymentConfig,
  DeploymentCredentials,
  getChainConfig,
  loadDeploymentConfig,
  loadDeploymentCredentials,
} from './config/index.js';
import { DeploymentRecord } from './types/deployment.js';
import { AlchemyDeploymentClient, AlchemyDeploymentClientOptions } from './services/alchemyDeploymentClient.js';
import { DeploymentService } from './services/deploymentService.js';

/**
 * Deploy BaseUtils to the configured Base network and save the deployment record
 */
export async function main(): Promise<DeploymentRecord> {
  const config = loadDeploymentConfig();
  const client = new AlchemyDeploymentClient(buildClientOptions(config, loadDeploymentCredentials()));

  return new DeploymentService({ config, client }).deploy();
}

/**
 * Alchemy endpoint for the designated chain, unless the operator set an explicit RPC URL
 */
export function buildClientOptions(
  config: DeploymentConfig,
  credentials: DeploymentCredentials
): AlchemyDeploymentClientOptions {
  const chain = getChainConfig(Number(config.network.chainId));
  if (!chain) {
    throw new Error(`No Alchemy network mapping for chain ${config.network.chainId}`);
  }

  return {
    apiKey: credentials.alchemyApiKey,
    network: chain.alchemyNetwork,
    privateKey: credentials.deployerPrivateKey,
    ...(config.rpcUrlOverride ? { rpcUrl: config.rpcUrlOverride } : {}),
  };
}

if (require.main === module) {
  main()
    .then(() => {
      console.log('✅ Deployment script completed');
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error('❌ Deployment failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
