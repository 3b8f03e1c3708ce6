import { LedgerConfig, NetworkConfig } from './config/index.js';
import { IAuditSink } from './interfaces/IAuditSink.js';
import { AuditTrail } from './services/auditTrail.js';
import { BaseUtilsService } from './services/baseUtilsService.js';
import { LedgerService } from './services/ledgerService.js';
import { LocalChainService } from './services/localChainService.js';
import { ConsoleAuditSink } from './services/sinks/consoleAuditSink.js';
import { MemoryAuditSink } from './services/sinks/memoryAuditSink.js';

export interface AppOptions {
  network: NetworkConfig;
  ledger: LedgerConfig;
  // Extra sinks on top of the memory and console sinks
  sinks?: IAuditSink[];
  clock?: () => number;
}

/**
 * Main application orchestrator: wires the ledger, chain environment,
 * audit trail and utility account together
 */
export class App {
  readonly ledger: LedgerService;
  readonly chain: LocalChainService;
  readonly auditTrail: AuditTrail;
  readonly auditLog: MemoryAuditSink;
  readonly baseUtils: BaseUtilsService;

  constructor(options: AppOptions) {
    this.ledger = new LedgerService(options.ledger.genesis);
    this.chain = new LocalChainService({ chainId: options.ledger.executionChainId, clock: options.clock });
    this.auditLog = new MemoryAuditSink();
    this.auditTrail = new AuditTrail([this.auditLog, new ConsoleAuditSink(), ...(options.sinks ?? [])]);
    this.baseUtils = new BaseUtilsService({
      network: options.network,
      accountAddress: options.ledger.accountAddress,
      ledger: this.ledger,
      chain: this.chain,
      auditTrail: this.auditTrail,
    });

    console.log(`🚀 BaseUtils account ${options.ledger.accountAddress} ready on chain ${options.ledger.executionChainId}`);
    if (options.ledger.executionChainId !== options.network.chainId) {
      console.warn(
        `⚠️ Execution chain ${options.ledger.executionChainId} is not the designated chain ${options.network.chainId}; ` +
        'batch transfers will be rejected'
      );
    }
  }
}
